/**
 * Error taxonomy for the sampling and risk pipeline.
 * Every error carries a stable `code` plus optional structured details for logging.
 */

export type RiskPipelineErrorCode =
  | 'NOT_FOUND'
  | 'PARSE_ERROR'
  | 'SCHEMA_ERROR'
  | 'VALIDATION_ERROR'
  | 'DATA_UNAVAILABLE'
  | 'COMPUTATION_ERROR';

export class RiskPipelineError extends Error {
  constructor(
    message: string,
    public readonly code: RiskPipelineErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RiskPipelineError';
  }
}

export class NotFoundError extends RiskPipelineError {
  constructor(public readonly path: string) {
    super(`The file '${path}' does not exist.`, 'NOT_FOUND', { path });
    this.name = 'NotFoundError';
  }
}

export class ParseError extends RiskPipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PARSE_ERROR', details);
    this.name = 'ParseError';
  }
}

export class SchemaError extends RiskPipelineError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'SCHEMA_ERROR', { issues });
    this.name = 'SchemaError';
  }
}

export class ValidationError extends RiskPipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class DataUnavailableError extends RiskPipelineError {
  constructor(message: string, public readonly symbols: string[]) {
    super(message, 'DATA_UNAVAILABLE', { symbols });
    this.name = 'DataUnavailableError';
  }
}

export class ComputationError extends RiskPipelineError {
  constructor(
    message: string,
    public readonly shape: readonly [rows: number, columns: number]
  ) {
    super(message, 'COMPUTATION_ERROR', { rows: shape[0], columns: shape[1] });
    this.name = 'ComputationError';
  }
}
