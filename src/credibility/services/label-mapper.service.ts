import { Injectable } from '@nestjs/common';
import {
  BIAS_LABEL_TABLE,
  FACTUALITY_LABEL_TABLE,
} from '../config/credibility.constants';
import { LabelTableConfigError } from '../errors/credibility.errors';
import {
  BiasLabel,
  FactualityLabel,
  LabelBin,
  LabelTable,
} from '../types/credibility.types';
import { clamp } from '../utils/number.util';

/**
 * Checks that the bins cover the whole range in ascending order with no gap
 * and no overlap: each shared edge belongs to exactly one side, and both
 * range ends are closed.
 */
export function validateLabelTable<L extends string>(
  table: LabelTable<L>,
): void {
  const { bins, range } = table;
  if (bins.length === 0) {
    throw new LabelTableConfigError(`${table.name} table has no bins`);
  }

  const first = bins[0];
  const last = bins[bins.length - 1];
  if (first.min !== range.min || !first.minInclusive) {
    throw new LabelTableConfigError(
      `${table.name} table must start closed at ${range.min}`,
    );
  }
  if (last.max !== range.max || !last.maxInclusive) {
    throw new LabelTableConfigError(
      `${table.name} table must end closed at ${range.max}`,
    );
  }

  for (let i = 0; i < bins.length; i += 1) {
    const bin = bins[i];
    const degenerate =
      bin.min === bin.max && !(bin.minInclusive && bin.maxInclusive);
    if (bin.min > bin.max || degenerate) {
      throw new LabelTableConfigError(`${table.name} bin ${bin.label} is empty`);
    }
    if (i === 0) {
      continue;
    }
    const previous = bins[i - 1];
    if (previous.max !== bin.min) {
      throw new LabelTableConfigError(
        `${table.name} bins ${previous.label} and ${bin.label} leave a gap or overlap`,
      );
    }
    if (previous.maxInclusive === bin.minInclusive) {
      throw new LabelTableConfigError(
        `${table.name} edge ${bin.min} must belong to exactly one of ${previous.label} and ${bin.label}`,
      );
    }
  }
}

function inBin<L extends string>(score: number, bin: LabelBin<L>): boolean {
  const aboveMin = bin.minInclusive ? score >= bin.min : score > bin.min;
  const belowMax = bin.maxInclusive ? score <= bin.max : score < bin.max;
  return aboveMin && belowMax;
}

@Injectable()
export class LabelMapperService {
  constructor() {
    validateLabelTable(BIAS_LABEL_TABLE);
    validateLabelTable(FACTUALITY_LABEL_TABLE);
  }

  label<L extends string>(score: number, table: LabelTable<L>): L {
    if (Number.isNaN(score)) {
      throw new RangeError(`${table.name} score is NaN`);
    }
    const bounded = clamp(score, table.range.min, table.range.max);
    const bin = table.bins.find((candidate) => inBin(bounded, candidate));
    if (!bin) {
      throw new RangeError(`${table.name} table has no bin for ${bounded}`);
    }
    return bin.label;
  }

  biasLabel(score: number): BiasLabel {
    return this.label(score, BIAS_LABEL_TABLE);
  }

  factualityLabel(score: number): FactualityLabel {
    return this.label(score, FACTUALITY_LABEL_TABLE);
  }
}
