import { Injectable, Logger } from '@nestjs/common';
import {
  ORACLE_RUN_TIMEOUT_MS,
  REPORT_SCORE_DECIMALS,
} from '../config/credibility.constants';
import { IdeologyOracle } from '../oracle/ideology-oracle';
import {
  AuxiliarySignals,
  CredibilityReport,
  DimensionScore,
  EditorialSignals,
  FactualitySignals,
  IdeologyEvaluation,
  NoMatchPolicy,
  TopicResult,
} from '../types/credibility.types';
import { roundHalfAwayFromZero } from '../utils/number.util';
import { CredibilityCalculatorService } from './credibility-calculator.service';
import { DecisionTreeService } from './decision-tree.service';
import { DimensionAggregatorService } from './dimension-aggregator.service';
import { LabelMapperService } from './label-mapper.service';
import { QuestionBankService } from './question-bank.service';
import { ScoreCombinerService } from './score-combiner.service';

export interface IdeologyRunOptions {
  timeoutMs?: number;
  noMatchPolicy?: NoMatchPolicy;
}

export interface ReportSignals {
  outlet: string;
  editorial: EditorialSignals;
  factuality: FactualitySignals;
  auxiliary: AuxiliarySignals;
}

export interface AssembleInput extends ReportSignals, IdeologyRunOptions {
  oracle: IdeologyOracle;
}

@Injectable()
export class ReportAssemblerService {
  private readonly logger = new Logger(ReportAssemblerService.name);

  constructor(
    private readonly questionBank: QuestionBankService,
    private readonly decisionTree: DecisionTreeService,
    private readonly aggregator: DimensionAggregatorService,
    private readonly combiner: ScoreCombinerService,
    private readonly labelMapper: LabelMapperService,
    private readonly calculator: CredibilityCalculatorService,
  ) {}

  async assemble(input: AssembleInput): Promise<CredibilityReport> {
    const ideology = await this.evaluateIdeology(input.oracle, {
      timeoutMs: input.timeoutMs,
      noMatchPolicy: input.noMatchPolicy,
    });
    return this.buildReport(ideology, input);
  }

  /**
   * Evaluates every topic concurrently and joins before aggregation. When the
   * run timeout fires, in-flight oracle calls are aborted and unfinished
   * topics are reported as timed out; the run itself still completes.
   */
  async evaluateIdeology(
    oracle: IdeologyOracle,
    options: IdeologyRunOptions = {},
  ): Promise<IdeologyEvaluation> {
    const topics = this.questionBank.getTopics();
    const timeoutMs = options.timeoutMs ?? ORACLE_RUN_TIMEOUT_MS;
    const controller = new AbortController();
    const settled = new Map<string, TopicResult>();
    const startedAt = Date.now();

    const tasks = topics.map(async (topic) => {
      const result = await this.decisionTree.evaluate(topic, oracle, {
        signal: controller.signal,
        noMatchPolicy: options.noMatchPolicy,
      });
      if (!controller.signal.aborted) {
        settled.set(topic.id, result);
      }
    });
    const all = Promise.all(tasks).then(() => 'done' as const);

    if (timeoutMs > 0) {
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<'timeout'>((resolve) => {
        timer = setTimeout(() => resolve('timeout'), timeoutMs);
      });
      try {
        const outcome = await Promise.race([all, timeout]);
        if (outcome === 'timeout') {
          controller.abort();
          this.logger.warn(
            `ideology run timed out: timeoutMs=${timeoutMs} finished=${settled.size}/${topics.length}`,
          );
        }
      } finally {
        clearTimeout(timer);
      }
    } else {
      await all;
    }

    const results = topics.map(
      (topic) => settled.get(topic.id) ?? this.decisionTree.timedOut(topic),
    );
    const economic = this.aggregator.aggregate('economic', results);
    const social = this.aggregator.aggregate('social', results);
    this.logger.log(
      `stage ideology done: scored=${economic.count + social.count}/${topics.length} elapsedMs=${Date.now() - startedAt}`,
    );

    return { topics: results, economic, social };
  }

  /** Pure: identical inputs give an identical report. */
  buildReport(
    ideology: IdeologyEvaluation,
    signals: ReportSignals,
  ): CredibilityReport {
    const insufficientData: string[] = [];
    if (ideology.economic.noData) {
      insufficientData.push('economic');
    }
    if (ideology.social.noData) {
      insufficientData.push('social');
    }

    const biasComposite = this.combiner.combineBias({
      economic: ideology.economic,
      social: ideology.social,
      editorial: signals.editorial,
    });
    const factualityComposite = this.combiner.combineFactuality(
      signals.factuality,
    );

    const biasScore = this.roundScore(biasComposite.score);
    const factualityScore = this.roundScore(factualityComposite.score);
    const biasLabel =
      biasScore == null ? null : this.labelMapper.biasLabel(biasScore);
    const factualityLabel =
      factualityScore == null
        ? null
        : this.labelMapper.factualityLabel(factualityScore);
    if (biasLabel == null) {
      insufficientData.push('bias');
    }
    if (factualityLabel == null) {
      insufficientData.push('factuality');
    }

    const credibility =
      biasLabel != null && factualityLabel != null
        ? this.calculator.credibility({
            biasLabel,
            factualityLabel,
            trafficTier: signals.auxiliary.trafficTier,
            siteAgeYears: signals.auxiliary.siteAgeYears,
            freedomTier: signals.auxiliary.freedomTier,
          })
        : null;

    return {
      outlet: signals.outlet,
      bias: { score: biasScore, label: biasLabel, composite: biasComposite },
      factuality: {
        score: factualityScore,
        label: factualityLabel,
        composite: factualityComposite,
      },
      credibility,
      dimensions: {
        economic: this.roundDimension(ideology.economic),
        social: this.roundDimension(ideology.social),
      },
      topics: ideology.topics,
      insufficientData,
    };
  }

  private roundScore(score: number | null): number | null {
    return score == null
      ? null
      : roundHalfAwayFromZero(score, REPORT_SCORE_DECIMALS);
  }

  private roundDimension(dimension: DimensionScore): DimensionScore {
    return {
      ...dimension,
      score: roundHalfAwayFromZero(dimension.score, REPORT_SCORE_DECIMALS),
    };
  }
}
