import { Injectable } from '@nestjs/common';
import { LlmClientService } from '../services/llm-client.service';
import { QuestionBankService } from '../services/question-bank.service';
import { ArticleSample } from '../types/credibility.types';
import { IdeologyOracle } from './ideology-oracle';
import { LlmIdeologyOracle } from './llm-ideology-oracle';
import { ScriptedOracle, ScriptedTopicAnswers } from './scripted-oracle';

@Injectable()
export class IdeologyOracleFactory {
  constructor(
    private readonly llm: LlmClientService,
    private readonly questionBank: QuestionBankService,
  ) {}

  scripted(answers: Record<string, ScriptedTopicAnswers>): IdeologyOracle {
    return new ScriptedOracle(answers);
  }

  fromArticles(articles: ArticleSample[]): IdeologyOracle {
    return new LlmIdeologyOracle(
      this.llm,
      this.questionBank.getTopics(),
      articles,
    );
  }
}
