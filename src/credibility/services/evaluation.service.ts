import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import {
  BIAS_ORDINALS,
  FACTUALITY_ORDINALS,
} from '../config/credibility.constants';
import {
  EvaluationEntry,
  EvaluationRow,
  EvaluationSummary,
} from '../types/credibility.types';
import { mean } from '../utils/number.util';
import { normalizeLabelKey } from '../utils/text.util';

@Injectable()
export class EvaluationService {
  private readonly logger = new Logger(EvaluationService.name);

  biasOrdinal(label: string | null): number | null {
    return this.ordinal(label, BIAS_ORDINALS);
  }

  factualityOrdinal(label: string | null): number | null {
    return this.ordinal(label, FACTUALITY_ORDINALS);
  }

  /**
   * Mean absolute error over ordinal classes. An unknown or missing predicted
   * label leaves that metric out for the entry; an unknown reference label is
   * rejected.
   */
  evaluate(entries: EvaluationEntry[]): EvaluationSummary {
    const rows = entries.map((entry) => this.row(entry));
    const biasErrors = rows
      .map((row) => row.biasError)
      .filter((error): error is number => error != null);
    const factualityErrors = rows
      .map((row) => row.factualityError)
      .filter((error): error is number => error != null);
    const evaluated = rows.filter(
      (row) => row.biasError != null || row.factualityError != null,
    ).length;

    const summary: EvaluationSummary = {
      total: rows.length,
      evaluated,
      biasMae: mean(biasErrors),
      factualityMae: mean(factualityErrors),
      biasExactMatch: this.exactMatchRate(biasErrors),
      factualityExactMatch: this.exactMatchRate(factualityErrors),
      rows,
    };
    this.logger.log(
      `evaluation done: evaluated=${evaluated}/${rows.length} biasMae=${summary.biasMae} factualityMae=${summary.factualityMae}`,
    );
    return summary;
  }

  private row(entry: EvaluationEntry): EvaluationRow {
    const referenceBias = this.biasOrdinal(entry.reference.bias);
    const referenceFactuality = this.factualityOrdinal(
      entry.reference.factuality,
    );
    if (referenceBias == null || referenceFactuality == null) {
      throw new BadRequestException(
        `unknown reference label for ${entry.name}`,
      );
    }

    const predictedBias = this.biasOrdinal(entry.predicted.bias);
    const predictedFactuality = this.factualityOrdinal(
      entry.predicted.factuality,
    );
    return {
      name: entry.name,
      referenceBiasOrdinal: referenceBias,
      referenceFactualityOrdinal: referenceFactuality,
      predictedBiasOrdinal: predictedBias,
      predictedFactualityOrdinal: predictedFactuality,
      biasError:
        predictedBias == null ? null : Math.abs(predictedBias - referenceBias),
      factualityError:
        predictedFactuality == null
          ? null
          : Math.abs(predictedFactuality - referenceFactuality),
    };
  }

  private ordinal(
    label: string | null,
    table: Record<string, number>,
  ): number | null {
    if (!label) {
      return null;
    }
    const key = normalizeLabelKey(label).replace(/ BIAS$/, '');
    return Object.prototype.hasOwnProperty.call(table, key)
      ? table[key]
      : null;
  }

  private exactMatchRate(errors: number[]): number | null {
    if (!errors.length) {
      return null;
    }
    return errors.filter((error) => error === 0).length / errors.length;
  }
}
