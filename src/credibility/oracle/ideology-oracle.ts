import {
  IdeologyQuestion,
  IdeologyTopic,
  Pole,
  TopicPrompt,
} from '../types/credibility.types';

export interface OracleCallOptions {
  signal?: AbortSignal;
}

/**
 * Answers the three questions the decision tree asks. Implementations may be
 * slow or fail; a rejected call excludes only the topic being evaluated.
 */
export interface IdeologyOracle {
  relevant(check: TopicPrompt, options?: OracleCallOptions): Promise<boolean>;
  stance(topic: IdeologyTopic, options?: OracleCallOptions): Promise<Pole>;
  confirms(
    question: IdeologyQuestion,
    options?: OracleCallOptions,
  ): Promise<boolean>;
}
