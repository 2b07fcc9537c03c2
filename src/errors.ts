export enum PayrollErrorCode {
  INVALID_INPUT = 'INVALID_INPUT',
  INVALID_DATE = 'INVALID_DATE',
  INVALID_TIME = 'INVALID_TIME',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

export interface PayrollErrorParams {
  code: PayrollErrorCode;
  message: string;
  details?: Record<string, unknown>;
  originalError?: unknown;
}

/** Structural input that cannot be interpreted. Business-data findings are returned as issues instead. */
export class PayrollError extends Error {
  public readonly code: PayrollErrorCode;
  public readonly details?: Record<string, unknown>;
  public readonly originalError?: unknown;

  constructor(params: PayrollErrorParams) {
    super(params.message);
    this.code = params.code;
    this.details = params.details;
    this.originalError = params.originalError;
    this.name = 'PayrollError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PayrollError);
    }
  }
}
