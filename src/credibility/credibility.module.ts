import { Module } from '@nestjs/common';
import { CredibilityController } from './credibility.controller';
import { IdeologyOracleFactory } from './oracle/ideology-oracle.factory';
import { CredibilityCalculatorService } from './services/credibility-calculator.service';
import { DecisionTreeService } from './services/decision-tree.service';
import { DimensionAggregatorService } from './services/dimension-aggregator.service';
import { EvaluationService } from './services/evaluation.service';
import { LabelMapperService } from './services/label-mapper.service';
import { LlmClientService } from './services/llm-client.service';
import { QuestionBankService } from './services/question-bank.service';
import { ReportAssemblerService } from './services/report-assembler.service';
import { ReportStorageService } from './services/report-storage.service';
import { ScoreCombinerService } from './services/score-combiner.service';

@Module({
  controllers: [CredibilityController],
  providers: [
    QuestionBankService,
    DecisionTreeService,
    DimensionAggregatorService,
    ScoreCombinerService,
    LabelMapperService,
    CredibilityCalculatorService,
    ReportAssemblerService,
    ReportStorageService,
    EvaluationService,
    LlmClientService,
    IdeologyOracleFactory,
  ],
})
export class CredibilityModule {}
