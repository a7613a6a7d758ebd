import {
  IdeologyQuestion,
  IdeologyTopic,
  Pole,
  TopicPrompt,
} from '../types/credibility.types';
import { OracleFailure } from '../errors/credibility.errors';
import { IdeologyOracle } from './ideology-oracle';

export interface ScriptedTopicAnswers {
  relevant: boolean;
  stance?: Pole;
  confirmed?: string[];
}

/**
 * Deterministic oracle built from explicit answers keyed by topic id.
 * Topics without an entry are treated as not relevant. Every question the
 * tree asks is recorded in `asked`, in order.
 */
export class ScriptedOracle implements IdeologyOracle {
  readonly asked: string[] = [];

  constructor(
    private readonly answers: Record<string, ScriptedTopicAnswers>,
  ) {}

  async relevant(check: TopicPrompt): Promise<boolean> {
    this.asked.push(check.id);
    return this.answers[check.topicId]?.relevant ?? false;
  }

  async stance(topic: IdeologyTopic): Promise<Pole> {
    this.asked.push(`${topic.id}.stance`);
    const stance = this.answers[topic.id]?.stance;
    if (!stance) {
      throw new OracleFailure(`no scripted stance for ${topic.id}`);
    }
    return stance;
  }

  async confirms(question: IdeologyQuestion): Promise<boolean> {
    this.asked.push(question.id);
    const confirmed = this.answers[question.topicId]?.confirmed ?? [];
    return confirmed.includes(question.id);
  }
}
