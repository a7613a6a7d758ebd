import { BadRequestException, Logger } from '@nestjs/common';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { REPORTS_DIR } from '../config/credibility.constants';
import { CredibilityReport, StoredReport } from '../types/credibility.types';
import { ReportStorageService } from './report-storage.service';

function makeReport(): CredibilityReport {
  const emptyDimension = { score: 0, count: 0, noData: true };
  return {
    outlet: 'Example Daily',
    bias: {
      score: null,
      label: null,
      composite: {
        score: null,
        insufficientData: true,
        clamped: false,
        components: [],
      },
    },
    factuality: {
      score: null,
      label: null,
      composite: {
        score: null,
        insufficientData: true,
        clamped: false,
        components: [],
      },
    },
    credibility: null,
    dimensions: {
      economic: { dimension: 'economic', ...emptyDimension },
      social: { dimension: 'social', ...emptyDimension },
    },
    topics: [],
    insufficientData: ['economic', 'social', 'bias', 'factuality'],
  };
}

describe('ReportStorageService', () => {
  let service: ReportStorageService;
  const now = new Date('2026-03-10T00:00:00.000Z');

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    service = new ReportStorageService();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('writes the report atomically under its normalized domain', async () => {
    const mkdirSpy = jest.spyOn(fs, 'mkdir').mockResolvedValue(undefined);
    const writeSpy = jest.spyOn(fs, 'writeFile').mockResolvedValue(undefined);
    const renameSpy = jest.spyOn(fs, 'rename').mockResolvedValue(undefined);
    const unlinkSpy = jest.spyOn(fs, 'unlink').mockResolvedValue(undefined);

    const stored = await service.save(
      'https://www.Example.com/politics',
      makeReport(),
      now,
    );

    const target = path.join(REPORTS_DIR, 'example.com', 'data.json');
    expect(stored.domain).toBe('example.com');
    expect(stored.savedAt).toBe('2026-03-10T00:00:00.000Z');
    expect(mkdirSpy).toHaveBeenCalledWith(path.dirname(target), {
      recursive: true,
    });
    expect(writeSpy).toHaveBeenCalledTimes(1);
    expect(renameSpy).toHaveBeenCalledWith(writeSpy.mock.calls[0][0], target);
    expect(unlinkSpy).not.toHaveBeenCalled();
  });

  it('removes the temp file when the write fails', async () => {
    jest.spyOn(fs, 'mkdir').mockResolvedValue(undefined);
    jest.spyOn(fs, 'writeFile').mockRejectedValue(new Error('disk full'));
    const unlinkSpy = jest.spyOn(fs, 'unlink').mockResolvedValue(undefined);

    await expect(
      service.save('example.com', makeReport(), now),
    ).rejects.toThrow('disk full');
    expect(unlinkSpy).toHaveBeenCalledTimes(1);
  });

  it('loads a report younger than the age limit', async () => {
    const stored: StoredReport = {
      domain: 'example.com',
      savedAt: '2026-03-01T00:00:00.000Z',
      report: makeReport(),
    };
    jest.spyOn(fs, 'readFile').mockResolvedValue(JSON.stringify(stored));

    await expect(service.load('example.com', 30, now)).resolves.toEqual(
      stored,
    );
  });

  it('ignores a report older than the age limit', async () => {
    jest.spyOn(fs, 'readFile').mockResolvedValue(
      JSON.stringify({
        domain: 'example.com',
        savedAt: '2026-01-01T00:00:00.000Z',
        report: makeReport(),
      }),
    );

    await expect(service.load('example.com', 30, now)).resolves.toBeNull();
  });

  it('returns null when nothing is stored', async () => {
    jest.spyOn(fs, 'readFile').mockRejectedValue(new Error('ENOENT'));

    await expect(service.load('example.com', 30, now)).resolves.toBeNull();
  });

  it('rejects a domain that normalizes to nothing', async () => {
    await expect(service.load('../../', 30, now)).rejects.toBeInstanceOf(
      BadRequestException,
    );
  });
});
