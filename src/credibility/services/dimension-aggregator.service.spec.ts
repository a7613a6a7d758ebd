import { TopicResult } from '../types/credibility.types';
import { DimensionAggregatorService } from './dimension-aggregator.service';

function result(
  topicId: string,
  score: number | null,
  dimension: TopicResult['dimension'] = 'economic',
): TopicResult {
  return {
    topicId,
    dimension,
    score,
    outcome: score == null ? 'not-relevant' : 'rung',
    pole: null,
    stoppedAt: null,
  };
}

describe('DimensionAggregatorService', () => {
  const service = new DimensionAggregatorService();

  it('flags a dimension with no scored topics', () => {
    const score = service.aggregate('economic', [
      result('a', null),
      result('b', null),
    ]);

    expect(score).toEqual({
      dimension: 'economic',
      score: 0,
      count: 0,
      noData: true,
    });
  });

  it('returns a single score unchanged', () => {
    const score = service.aggregate('social', [result('a', -7.5, 'social')]);

    expect(score.score).toBe(-7.5);
    expect(score.count).toBe(1);
    expect(score.noData).toBe(false);
  });

  it('ignores topics of the other dimension', () => {
    const score = service.aggregate('economic', [
      result('a', 5),
      result('b', -10, 'social'),
    ]);

    expect(score.score).toBe(5);
    expect(score.count).toBe(1);
  });

  it('leaves a not relevant topic out of the average entirely', () => {
    const scored = [result('a', -5), result('b', 2.5)];
    const without = service.aggregate('economic', scored);
    const withIrrelevant = service.aggregate('economic', [
      ...scored,
      result('c', null),
    ]);

    expect(without.score).toBe(-1.25);
    expect(withIrrelevant.score).toBe(-1.25);
    expect(withIrrelevant.count).toBe(2);
  });

  it('counts a centrist zero as a real score', () => {
    const score = service.aggregate('economic', [
      result('a', -5),
      result('b', 0),
    ]);

    expect(score.score).toBe(-2.5);
    expect(score.count).toBe(2);
  });
});
