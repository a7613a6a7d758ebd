import { Logger } from '@nestjs/common';
import { WeightConfigError } from '../errors/credibility.errors';
import {
  CombinerConfig,
  ComponentBreakdown,
  CompositeScore,
  WeightedComponent,
} from '../types/credibility.types';
import { clamp } from '../utils/number.util';

const WEIGHT_SUM_TOLERANCE = 1e-9;

export type ComponentValues<K extends string> = Partial<
  Record<K, number | null>
>;

export class WeightedScoreCombiner<K extends string> {
  private readonly logger: Logger;
  private readonly names: K[];

  constructor(readonly config: CombinerConfig<K>) {
    this.logger = new Logger(`WeightedScoreCombiner:${config.name}`);
    this.names = Object.keys(config.weights) as K[];
    validateWeights(config);
  }

  /** Pairs each configured weight with its value; absent values are null. */
  components(values: ComponentValues<K>): WeightedComponent<K>[] {
    return this.names.map((name) => ({
      name,
      value: values[name] ?? null,
      weight: this.config.weights[name],
    }));
  }

  combineValues(values: ComponentValues<K>): CompositeScore<K> {
    return this.combine(this.components(values));
  }

  /**
   * Σ value × weight, clamped to the range. Missing or non-finite values drop
   * out and the remaining weights are scaled back up to 1. Values outside
   * the range are clamped first and logged.
   */
  combine(components: readonly WeightedComponent<K>[]): CompositeScore<K> {
    const { min, max } = this.config.range;
    const usable = components.map((component) => {
      const value = component.value;
      if (value == null || !Number.isFinite(value)) {
        return { component, value: null, clamped: false };
      }
      const bounded = clamp(value, min, max);
      if (bounded !== value) {
        this.logger.warn(
          `scale violation: ${component.name}=${value} outside [${min}, ${max}], clamped to ${bounded}`,
        );
      }
      return { component, value: bounded, clamped: bounded !== value };
    });

    const presentWeight = usable.reduce(
      (sum, item) => (item.value == null ? sum : sum + item.component.weight),
      0,
    );

    const complete = Math.abs(presentWeight - 1) <= WEIGHT_SUM_TOLERANCE;
    const breakdown: ComponentBreakdown<K>[] = usable.map((item) => {
      let effectiveWeight = 0;
      if (item.value != null && presentWeight > 0) {
        effectiveWeight = complete
          ? item.component.weight
          : item.component.weight / presentWeight;
      }
      return {
        name: item.component.name,
        value: item.value,
        weight: item.component.weight,
        effectiveWeight,
        contribution: item.value == null ? 0 : item.value * effectiveWeight,
        clamped: item.clamped,
      };
    });

    if (presentWeight <= 0) {
      return {
        score: null,
        insufficientData: true,
        clamped: false,
        components: breakdown,
      };
    }

    const raw = breakdown.reduce((sum, item) => sum + item.contribution, 0);
    const score = clamp(raw, min, max);
    return {
      score,
      insufficientData: false,
      clamped: score !== raw,
      components: breakdown,
    };
  }
}

export function validateWeights<K extends string>(
  config: CombinerConfig<K>,
): void {
  const entries = Object.entries(config.weights) as [K, number][];
  if (entries.length === 0) {
    throw new WeightConfigError(`${config.name} combiner has no components`);
  }
  for (const [name, weight] of entries) {
    if (!Number.isFinite(weight) || weight <= 0 || weight > 1) {
      throw new WeightConfigError(
        `${config.name} combiner weight for ${name} must be in (0, 1], got ${weight}`,
      );
    }
  }
  const sum = weightSum(config.weights);
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new WeightConfigError(
      `${config.name} combiner weights must sum to 1.0, got ${sum}`,
    );
  }
  if (config.range.min >= config.range.max) {
    throw new WeightConfigError(`${config.name} combiner has an empty range`);
  }
}

export function weightSum(weights: Record<string, number>): number {
  return Object.values(weights).reduce((sum, weight) => sum + weight, 0);
}
