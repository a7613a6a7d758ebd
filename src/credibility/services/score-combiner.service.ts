import { Injectable } from '@nestjs/common';
import {
  BIAS_COMBINER_CONFIG,
  FACTUALITY_COMBINER_CONFIG,
} from '../config/credibility.constants';
import {
  BiasComponentName,
  CompositeScore,
  DimensionScore,
  EditorialSignals,
  FactualityComponentName,
  FactualitySignals,
} from '../types/credibility.types';
import { WeightedScoreCombiner } from './weighted-score-combiner';

@Injectable()
export class ScoreCombinerService {
  // Built with the provider, so a bad weight table fails bootstrap.
  readonly bias = new WeightedScoreCombiner<BiasComponentName>(
    BIAS_COMBINER_CONFIG,
  );
  readonly factuality = new WeightedScoreCombiner<FactualityComponentName>(
    FACTUALITY_COMBINER_CONFIG,
  );

  combineBias(params: {
    economic: DimensionScore;
    social: DimensionScore;
    editorial: EditorialSignals;
  }): CompositeScore<BiasComponentName> {
    return this.bias.combineValues({
      economic: params.economic.noData ? null : params.economic.score,
      social: params.social.noData ? null : params.social.score,
      newsReportingBalance: params.editorial.newsReportingBalance,
      editorialBias: params.editorial.editorialBias,
    });
  }

  combineFactuality(
    signals: FactualitySignals,
  ): CompositeScore<FactualityComponentName> {
    return this.factuality.combineValues({ ...signals });
  }
}
