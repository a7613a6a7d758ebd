import { Injectable, Logger } from '@nestjs/common';
import { NO_MATCH_POLICY } from '../config/credibility.constants';
import { IdeologyOracle } from '../oracle/ideology-oracle';
import {
  IdeologyQuestion,
  IdeologyTopic,
  NoMatchPolicy,
  Pole,
  TopicOutcome,
  TopicResult,
} from '../types/credibility.types';

export interface EvaluateOptions {
  signal?: AbortSignal;
  noMatchPolicy?: NoMatchPolicy;
}

@Injectable()
export class DecisionTreeService {
  private readonly logger = new Logger(DecisionTreeService.name);

  /**
   * Walks one topic: relevance, a single stance fork, then the chosen ladder
   * from its most extreme rung to its most moderate. The first confirmed
   * rung wins, so an extreme position is never read as a moderate one that
   * it also satisfies. Oracle errors exclude this topic only.
   */
  async evaluate(
    topic: IdeologyTopic,
    oracle: IdeologyOracle,
    options: EvaluateOptions = {},
  ): Promise<TopicResult> {
    const { signal } = options;
    const callOptions = { signal };
    let pole: Pole | null = null;

    try {
      this.throwIfAborted(signal);
      const relevant = await oracle.relevant(topic.relevanceCheck, callOptions);
      if (!relevant) {
        return this.result(topic, null, 'not-relevant', null);
      }

      this.throwIfAborted(signal);
      const stance: string = await oracle.stance(topic, callOptions);
      if (stance !== 'left' && stance !== 'right') {
        throw new Error(`invalid stance: ${stance}`);
      }
      pole = stance;
      const ladder = pole === 'left' ? topic.leftLadder : topic.rightLadder;

      for (let index = 0; index < ladder.length; index += 1) {
        const question = ladder[index];
        this.throwIfAborted(signal);
        if (await oracle.confirms(question, callOptions)) {
          return this.result(topic, question.score, 'rung', pole, {
            pole,
            index,
            questionId: question.id,
            ...(question.citation ? { citation: question.citation } : {}),
          });
        }
      }

      this.throwIfAborted(signal);
      if (await oracle.confirms(topic.centrismCheck, callOptions)) {
        return this.result(topic, 0, 'centrist', pole);
      }

      return this.noMatch(
        topic,
        pole,
        ladder,
        options.noMatchPolicy ?? NO_MATCH_POLICY,
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`topic excluded: ${topic.id} (${message})`);
      return this.result(topic, null, 'oracle-failure', pole);
    }
  }

  timedOut(topic: IdeologyTopic): TopicResult {
    return this.result(topic, null, 'timed-out', null);
  }

  private noMatch(
    topic: IdeologyTopic,
    pole: Pole,
    ladder: IdeologyQuestion[],
    policy: NoMatchPolicy,
  ): TopicResult {
    if (policy === 'exclude') {
      return this.result(topic, null, 'no-signal', pole);
    }
    const moderate = ladder[ladder.length - 1];
    return this.result(topic, moderate.score, 'weak-default', pole);
  }

  private result(
    topic: IdeologyTopic,
    score: number | null,
    outcome: TopicOutcome,
    pole: Pole | null,
    stoppedAt: TopicResult['stoppedAt'] = null,
  ): TopicResult {
    return Object.freeze({
      topicId: topic.id,
      dimension: topic.dimension,
      score,
      outcome,
      pole,
      stoppedAt,
    });
  }

  private throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new Error('evaluation aborted');
    }
  }
}
