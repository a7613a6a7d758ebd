import { Injectable } from '@nestjs/common';
import {
  BIAS_POINTS,
  CREDIBILITY_FLOOR_LEVEL,
  CREDIBILITY_LEVELS,
  FACTUALITY_POINTS,
  FREEDOM_PENALTY,
  LONGEVITY_BONUS_MIN_YEARS,
  LONGEVITY_BONUS_POINTS,
  TRAFFIC_POINTS,
} from '../config/credibility.constants';
import {
  CredibilityInputs,
  CredibilityLevel,
  CredibilityResult,
} from '../types/credibility.types';

@Injectable()
export class CredibilityCalculatorService {
  /**
   * Points are not clamped: stacked bonuses may pass 10 and penalties may go
   * below 0. The level saturates at the nearest band instead.
   */
  credibility(inputs: CredibilityInputs): CredibilityResult {
    const longevity =
      inputs.siteAgeYears != null &&
      Number.isFinite(inputs.siteAgeYears) &&
      inputs.siteAgeYears > LONGEVITY_BONUS_MIN_YEARS
        ? LONGEVITY_BONUS_POINTS
        : 0;

    const breakdown = {
      factuality: FACTUALITY_POINTS[inputs.factualityLabel],
      bias: BIAS_POINTS[inputs.biasLabel],
      traffic: TRAFFIC_POINTS[inputs.trafficTier],
      longevity,
      freedom: FREEDOM_PENALTY[inputs.freedomTier],
    };
    const points =
      breakdown.factuality +
      breakdown.bias +
      breakdown.traffic +
      breakdown.longevity +
      breakdown.freedom;

    return { points, level: this.level(points), breakdown };
  }

  level(points: number): CredibilityLevel {
    const band = CREDIBILITY_LEVELS.find((entry) => points >= entry.minPoints);
    return band?.level ?? CREDIBILITY_FLOOR_LEVEL;
  }
}
