import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import {
  REPORT_MAX_AGE_DAYS,
  REPORTS_DIR,
} from '../config/credibility.constants';
import { CredibilityReport, StoredReport } from '../types/credibility.types';
import { computeAgeDays } from '../utils/date.util';
import { normalizeDomain } from '../utils/text.util';

const REPORT_FILE = 'data.json';

@Injectable()
export class ReportStorageService {
  private readonly logger = new Logger(ReportStorageService.name);

  async save(
    domain: string,
    report: CredibilityReport,
    now: Date = new Date(),
  ): Promise<StoredReport> {
    const key = this.requireDomain(domain);
    const stored: StoredReport = {
      domain: key,
      savedAt: now.toISOString(),
      report,
    };
    await this.safeWriteJson(this.reportPath(key), stored);
    this.logger.log(`report saved: ${key}`);
    return stored;
  }

  /** Returns null when nothing is stored or the stored report is too old. */
  async load(
    domain: string,
    maxAgeDays: number = REPORT_MAX_AGE_DAYS,
    now: Date = new Date(),
  ): Promise<StoredReport | null> {
    const key = this.requireDomain(domain);
    const stored = await this.safeReadJson<StoredReport>(this.reportPath(key));
    if (!stored) {
      return null;
    }

    const ageDays = computeAgeDays(stored.savedAt, now);
    if (ageDays == null || ageDays > maxAgeDays) {
      this.logger.log(`stored report ignored: ${key} ageDays=${ageDays}`);
      return null;
    }
    return stored;
  }

  reportPath(domain: string): string {
    return path.join(REPORTS_DIR, domain, REPORT_FILE);
  }

  private requireDomain(domain: string): string {
    const key = normalizeDomain(domain);
    if (!key) {
      throw new BadRequestException(`invalid domain: ${domain}`);
    }
    return key;
  }

  private async safeReadJson<T>(filePath: string): Promise<T | null> {
    try {
      const raw = await fs.readFile(filePath, 'utf-8');
      return JSON.parse(raw) as T;
    } catch {
      return null;
    }
  }

  private async safeWriteJson(
    filePath: string,
    payload: unknown,
  ): Promise<void> {
    const dir = path.dirname(filePath);
    const base = path.basename(filePath);
    const tmpPath = path.join(dir, `.${base}.${process.pid}.${Date.now()}.tmp`);

    await fs.mkdir(dir, { recursive: true });
    try {
      await fs.writeFile(
        tmpPath,
        `${JSON.stringify(payload, null, 2)}\n`,
        'utf-8',
      );
      await fs.rename(tmpPath, filePath);
    } catch (error) {
      await fs.unlink(tmpPath).catch(() => undefined);
      throw error;
    }
  }
}
