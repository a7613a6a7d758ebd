import { Inject, Injectable, Optional } from '@nestjs/common';
import { QUESTION_BANK } from '../config/question-bank';
import { Dimension, IdeologyTopic } from '../types/credibility.types';

export const QUESTION_BANK_TOPICS = Symbol('QUESTION_BANK_TOPICS');

export interface TopicSummary {
  id: string;
  dimension: Dimension;
  title: string;
  questionCount: number;
}

@Injectable()
export class QuestionBankService {
  private readonly topics: IdeologyTopic[];
  private readonly topicsById: Map<string, IdeologyTopic>;
  private readonly promptIds = new Set<string>();

  constructor(
    @Optional()
    @Inject(QUESTION_BANK_TOPICS)
    topics?: IdeologyTopic[],
  ) {
    this.topics = topics ?? QUESTION_BANK;
    this.topicsById = new Map(this.topics.map((topic) => [topic.id, topic]));
    for (const topic of this.topics) {
      for (const prompt of [
        topic.relevanceCheck,
        ...topic.leftLadder,
        ...topic.rightLadder,
        topic.centrismCheck,
      ]) {
        this.promptIds.add(prompt.id);
      }
    }
  }

  getTopics(): IdeologyTopic[] {
    return this.topics;
  }

  getTopic(topicId: string): IdeologyTopic | null {
    return this.topicsById.get(topicId) ?? null;
  }

  hasPrompt(promptId: string): boolean {
    return this.promptIds.has(promptId);
  }

  summarize(): TopicSummary[] {
    return this.topics.map((topic) => ({
      id: topic.id,
      dimension: topic.dimension,
      title: topic.title,
      questionCount: topic.leftLadder.length + topic.rightLadder.length + 2,
    }));
  }
}
