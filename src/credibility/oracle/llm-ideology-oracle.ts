import { Logger } from '@nestjs/common';
import {
  AI_INPUT_MAX_CHARS,
  ORACLE_MAX_ARTICLES,
} from '../config/credibility.constants';
import { OracleFailure } from '../errors/credibility.errors';
import {
  STANCE_SYSTEM_PROMPT,
  YES_NO_SYSTEM_PROMPT,
  buildQuestionPrompt,
  buildStancePrompt,
} from '../prompts/ideology.prompt';
import { LlmClientService } from '../services/llm-client.service';
import {
  ArticleSample,
  IdeologyQuestion,
  IdeologyTopic,
  Pole,
  TopicPrompt,
} from '../types/credibility.types';
import { cleanText, countKeywordHits } from '../utils/text.util';
import { IdeologyOracle, OracleCallOptions } from './ideology-oracle';

export interface LlmOracleOptions {
  maxArticles?: number;
  maxChars?: number;
}

/**
 * Oracle backed by the LLM client. Each topic sees only the article samples
 * that mention its keywords; a topic with no matching sample is reported as
 * not relevant without a model call.
 */
export class LlmIdeologyOracle implements IdeologyOracle {
  private readonly logger = new Logger(LlmIdeologyOracle.name);
  private readonly excerptsByTopic = new Map<string, string[]>();
  private readonly maxArticles: number;
  private readonly maxChars: number;

  constructor(
    private readonly llm: LlmClientService,
    private readonly topics: IdeologyTopic[],
    private readonly articles: ArticleSample[],
    options: LlmOracleOptions = {},
  ) {
    this.maxArticles = options.maxArticles ?? ORACLE_MAX_ARTICLES;
    this.maxChars = options.maxChars ?? AI_INPUT_MAX_CHARS;
  }

  async relevant(
    check: TopicPrompt,
    options: OracleCallOptions = {},
  ): Promise<boolean> {
    const topic = this.requireTopic(check.topicId);
    const excerpts = this.excerpts(topic);
    if (!excerpts.length) {
      this.logger.debug(`no matching articles: ${topic.id}`);
      return false;
    }
    return this.askYesNo(topic, check, excerpts, options);
  }

  async stance(
    topic: IdeologyTopic,
    options: OracleCallOptions = {},
  ): Promise<Pole> {
    const left = topic.leftLadder[topic.leftLadder.length - 1];
    const right = topic.rightLadder[topic.rightLadder.length - 1];
    const stance = await this.llm.askWord(
      {
        systemPrompt: STANCE_SYSTEM_PROMPT,
        userPrompt: buildStancePrompt(
          topic.title,
          left.text,
          right.text,
          this.excerpts(topic),
        ),
        field: 'stance',
      },
      { signal: options.signal },
    );
    if (stance === 'left' || stance === 'right') {
      return stance;
    }
    throw new OracleFailure(
      `invalid stance answer for ${topic.id}`,
      `${topic.id}.stance`,
    );
  }

  async confirms(
    question: IdeologyQuestion,
    options: OracleCallOptions = {},
  ): Promise<boolean> {
    const topic = this.requireTopic(question.topicId);
    return this.askYesNo(topic, question, this.excerpts(topic), options);
  }

  private async askYesNo(
    topic: IdeologyTopic,
    prompt: TopicPrompt,
    excerpts: string[],
    options: OracleCallOptions,
  ): Promise<boolean> {
    const answer = await this.llm.askWord(
      {
        systemPrompt: YES_NO_SYSTEM_PROMPT,
        userPrompt: buildQuestionPrompt(topic.title, prompt.text, excerpts),
        field: 'answer',
      },
      { signal: options.signal },
    );
    if (answer === 'yes') {
      return true;
    }
    if (answer === 'no') {
      return false;
    }
    throw new OracleFailure(`invalid answer for ${prompt.id}`, prompt.id);
  }

  private excerpts(topic: IdeologyTopic): string[] {
    const cached = this.excerptsByTopic.get(topic.id);
    if (cached) {
      return cached;
    }

    const perArticle = Math.max(
      80,
      Math.floor(this.maxChars / this.maxArticles),
    );
    const excerpts = this.articles
      .map((article, index) => ({
        article,
        index,
        hits: countKeywordHits(
          `${article.title} ${article.text}`,
          topic.keywords,
        ),
      }))
      .filter((entry) => entry.hits > 0)
      .sort((a, b) => b.hits - a.hits || a.index - b.index)
      .slice(0, this.maxArticles)
      .map(({ article }) =>
        cleanText(`${article.title}. ${article.text}`).slice(0, perArticle),
      );

    this.excerptsByTopic.set(topic.id, excerpts);
    return excerpts;
  }

  private requireTopic(topicId: string): IdeologyTopic {
    const topic = this.topics.find((candidate) => candidate.id === topicId);
    if (!topic) {
      throw new OracleFailure(`unknown topic: ${topicId}`);
    }
    return topic;
  }
}
