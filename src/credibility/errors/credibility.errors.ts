/**
 * Raised by oracle adapters when a single relevance, stance or confirmation
 * call cannot produce an answer. The decision tree catches it per topic.
 */
export class OracleFailure extends Error {
  constructor(
    message: string,
    readonly questionId?: string,
  ) {
    super(message);
    this.name = 'OracleFailure';
  }
}

/**
 * Methodology configuration is broken. Only raised while services are
 * constructed, so a bad table stops bootstrap before any run starts.
 */
export class MethodologyConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MethodologyConfigError';
  }
}

export class WeightConfigError extends MethodologyConfigError {
  constructor(message: string) {
    super(message);
    this.name = 'WeightConfigError';
  }
}

export class LabelTableConfigError extends MethodologyConfigError {
  constructor(message: string) {
    super(message);
    this.name = 'LabelTableConfigError';
  }
}

export class QuestionBankConfigError extends MethodologyConfigError {
  constructor(message: string) {
    super(message);
    this.name = 'QuestionBankConfigError';
  }
}
