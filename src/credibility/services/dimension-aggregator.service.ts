import { Injectable } from '@nestjs/common';
import {
  Dimension,
  DimensionScore,
  TopicResult,
} from '../types/credibility.types';
import { mean } from '../utils/number.util';

@Injectable()
export class DimensionAggregatorService {
  /**
   * Unweighted mean of the scored topics in one dimension. Excluded topics
   * (null scores) change the count, never the sum. With nothing scored the
   * result reads 0 but carries `noData` so it is not mistaken for centrist.
   */
  aggregate(dimension: Dimension, results: TopicResult[]): DimensionScore {
    const scores = results
      .filter((result) => result.dimension === dimension)
      .map((result) => result.score)
      .filter((score): score is number => score != null);

    const average = mean(scores);
    return Object.freeze({
      dimension,
      score: average ?? 0,
      count: scores.length,
      noData: average == null,
    });
  }
}
