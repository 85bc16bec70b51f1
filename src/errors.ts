export class ValidationError extends Error {
  field: string;
  reason: string;
  received: unknown;

  constructor(field: string, reason: string, received: unknown) {
    super(`${field}: ${reason}`);
    this.name = 'ValidationError';
    this.field = field;
    this.reason = reason;
    this.received = received;
  }
}

/**
 * A fault inside the analysis machinery itself (bad keyword data, a defect in
 * a stage). Never produced by bad input.
 */
export class InfrastructureError extends Error {
  stage: string;

  constructor(message: string, stage: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InfrastructureError';
    this.stage = stage;
  }
}

export class KeywordTableError extends InfrastructureError {
  source: string;

  constructor(message: string, source: string, options?: { cause?: unknown }) {
    super(message, 'keyword-tables', options);
    this.name = 'KeywordTableError';
    this.source = source;
  }
}
