import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  NotFoundException,
  Param,
  Post,
} from '@nestjs/common';
import { IdeologyOracle } from './oracle/ideology-oracle';
import { IdeologyOracleFactory } from './oracle/ideology-oracle.factory';
import { ScriptedTopicAnswers } from './oracle/scripted-oracle';
import { EvaluationService } from './services/evaluation.service';
import {
  QuestionBankService,
  TopicSummary,
} from './services/question-bank.service';
import { ReportAssemblerService } from './services/report-assembler.service';
import { ReportStorageService } from './services/report-storage.service';
import {
  ArticleSample,
  CredibilityReport,
  EditorialSignals,
  EvaluationEntry,
  EvaluationSummary,
  FactualitySignals,
  FreedomTier,
  NoMatchPolicy,
  StoredReport,
  TrafficTier,
} from './types/credibility.types';

const TRAFFIC_TIERS: TrafficTier[] = ['High', 'Medium', 'Minimal'];
const FREEDOM_TIERS: FreedomTier[] = [
  'Free',
  'Mostly Free',
  'Partly Free',
  'Limited Freedom',
  'Total Oppression',
];
const NO_MATCH_POLICIES: NoMatchPolicy[] = ['weak-default', 'exclude'];

@Controller()
export class CredibilityController {
  constructor(
    private readonly questionBank: QuestionBankService,
    private readonly oracleFactory: IdeologyOracleFactory,
    private readonly assembler: ReportAssemblerService,
    private readonly storage: ReportStorageService,
    private readonly evaluation: EvaluationService,
  ) {}

  @Get('ideology/topics')
  getTopics(): TopicSummary[] {
    return this.questionBank.summarize();
  }

  @Post('credibility/report')
  @HttpCode(200)
  async createReport(@Body() body: unknown): Promise<CredibilityReport> {
    const input = this.requireRecord(body, 'body');
    const outlet = this.requireString(input.outlet, 'outlet');
    const domain = this.optionalString(input.domain, 'domain');
    const oracle = this.parseIdeology(input.ideology);
    const bias = this.requireRecord(input.bias, 'bias');
    const factuality = this.requireRecord(input.factuality, 'factuality');

    const editorial: EditorialSignals = {
      newsReportingBalance: this.parseSignal(
        bias.newsReportingBalance,
        'bias.newsReportingBalance',
      ),
      editorialBias: this.parseSignal(bias.editorialBias, 'bias.editorialBias'),
    };
    const factualitySignals: FactualitySignals = {
      factCheck: this.parseSignal(
        factuality.factCheck,
        'factuality.factCheck',
      ),
      sourcing: this.parseSignal(factuality.sourcing, 'factuality.sourcing'),
      transparency: this.parseSignal(
        factuality.transparency,
        'factuality.transparency',
      ),
      propaganda: this.parseSignal(
        factuality.propaganda,
        'factuality.propaganda',
      ),
    };

    const report = await this.assembler.assemble({
      outlet,
      oracle,
      editorial,
      factuality: factualitySignals,
      auxiliary: {
        trafficTier: this.parseChoice(input.traffic, TRAFFIC_TIERS, 'traffic'),
        siteAgeYears: this.parseSiteAge(input.siteAgeYears),
        freedomTier: this.parseChoice(input.freedom, FREEDOM_TIERS, 'freedom'),
      },
      timeoutMs: this.parseTimeout(input.timeoutMs),
      noMatchPolicy:
        input.noMatchPolicy == null
          ? undefined
          : this.parseChoice(
              input.noMatchPolicy,
              NO_MATCH_POLICIES,
              'noMatchPolicy',
            ),
    });

    if (domain) {
      await this.storage.save(domain, report);
    }
    return report;
  }

  @Get('credibility/reports/:domain')
  async getReport(@Param('domain') domain: string): Promise<StoredReport> {
    const stored = await this.storage.load(domain);
    if (!stored) {
      throw new NotFoundException(`no current report for ${domain}`);
    }
    return stored;
  }

  @Post('evaluation')
  @HttpCode(200)
  evaluate(@Body('entries') entriesRaw?: unknown): EvaluationSummary {
    if (!Array.isArray(entriesRaw)) {
      throw new BadRequestException('entries must be an array');
    }
    const entries = entriesRaw.map((raw, index) =>
      this.parseEvaluationEntry(raw, index),
    );
    return this.evaluation.evaluate(entries);
  }

  private parseIdeology(value: unknown): IdeologyOracle {
    const ideology = this.requireRecord(value, 'ideology');
    if (ideology.answers != null) {
      return this.oracleFactory.scripted(this.parseAnswers(ideology.answers));
    }
    if (ideology.articles != null) {
      return this.oracleFactory.fromArticles(
        this.parseArticles(ideology.articles),
      );
    }
    throw new BadRequestException(
      'ideology must contain either answers or articles',
    );
  }

  private parseAnswers(value: unknown): Record<string, ScriptedTopicAnswers> {
    const raw = this.requireRecord(value, 'ideology.answers');
    const answers: Record<string, ScriptedTopicAnswers> = {};

    for (const [topicId, entryRaw] of Object.entries(raw)) {
      const field = `ideology.answers.${topicId}`;
      if (!this.questionBank.getTopic(topicId)) {
        throw new BadRequestException(`unknown topic: ${topicId}`);
      }
      const entry = this.requireRecord(entryRaw, field);
      if (typeof entry.relevant !== 'boolean') {
        throw new BadRequestException(`${field}.relevant must be a boolean`);
      }

      const confirmed = entry.confirmed ?? [];
      if (
        !Array.isArray(confirmed) ||
        !confirmed.every((id): id is string => typeof id === 'string')
      ) {
        throw new BadRequestException(
          `${field}.confirmed must be an array of question ids`,
        );
      }
      const unknown = confirmed.find((id) => !this.questionBank.hasPrompt(id));
      if (unknown) {
        throw new BadRequestException(`unknown question: ${unknown}`);
      }
      const foreign = confirmed.find((id) => !id.startsWith(`${topicId}.`));
      if (foreign) {
        throw new BadRequestException(
          `question ${foreign} does not belong to ${topicId}`,
        );
      }

      answers[topicId] = {
        relevant: entry.relevant,
        stance:
          entry.stance == null
            ? undefined
            : this.parseChoice(
                entry.stance,
                ['left', 'right'] as const,
                `${field}.stance`,
              ),
        confirmed,
      };
    }
    return answers;
  }

  private parseArticles(value: unknown): ArticleSample[] {
    if (!Array.isArray(value) || !value.length) {
      throw new BadRequestException(
        'ideology.articles must be a non-empty array',
      );
    }
    return value.map((raw, index) => {
      const field = `ideology.articles[${index}]`;
      const article = this.requireRecord(raw, field);
      const url = this.optionalString(article.url, `${field}.url`);
      return {
        title: this.requireString(article.title, `${field}.title`),
        text: this.requireString(article.text, `${field}.text`),
        ...(url ? { url } : {}),
      };
    });
  }

  private parseEvaluationEntry(
    value: unknown,
    index: number,
  ): EvaluationEntry {
    const field = `entries[${index}]`;
    const entry = this.requireRecord(value, field);
    const predicted = this.requireRecord(
      entry.predicted,
      `${field}.predicted`,
    );
    const reference = this.requireRecord(
      entry.reference,
      `${field}.reference`,
    );
    return {
      name: this.requireString(entry.name, `${field}.name`),
      predicted: {
        bias: this.optionalString(predicted.bias, `${field}.predicted.bias`),
        factuality: this.optionalString(
          predicted.factuality,
          `${field}.predicted.factuality`,
        ),
      },
      reference: {
        bias: this.requireString(reference.bias, `${field}.reference.bias`),
        factuality: this.requireString(
          reference.factuality,
          `${field}.reference.factuality`,
        ),
      },
    };
  }

  private parseSignal(value: unknown, fieldName: string): number | null {
    if (value == null) {
      return null;
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new BadRequestException(`${fieldName} must be a number or null`);
    }
    return value;
  }

  private parseSiteAge(value: unknown): number | null {
    if (value == null || value === '') {
      return null;
    }
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < 0) {
      throw new BadRequestException('siteAgeYears must be a positive number');
    }
    return parsed;
  }

  private parseTimeout(value: unknown): number | undefined {
    if (value == null || value === '') {
      return undefined;
    }
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < 0) {
      throw new BadRequestException('timeoutMs must be a positive number');
    }
    return Math.floor(parsed);
  }

  private parseChoice<T extends string>(
    value: unknown,
    choices: readonly T[],
    fieldName: string,
  ): T {
    const match = choices.find((choice) => choice === value);
    if (match == null) {
      throw new BadRequestException(
        `${fieldName} must be one of: ${choices.join(', ')}`,
      );
    }
    return match;
  }

  private requireRecord(
    value: unknown,
    fieldName: string,
  ): Record<string, unknown> {
    if (!value || typeof value !== 'object' || Array.isArray(value)) {
      throw new BadRequestException(`${fieldName} must be an object`);
    }
    return value as Record<string, unknown>;
  }

  private requireString(value: unknown, fieldName: string): string {
    if (typeof value !== 'string' || !value.trim()) {
      throw new BadRequestException(`${fieldName} must be a non-empty string`);
    }
    return value.trim();
  }

  private optionalString(value: unknown, fieldName: string): string | null {
    if (value == null || value === '') {
      return null;
    }
    return this.requireString(value, fieldName);
  }
}
