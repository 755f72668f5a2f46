export type ReportingErrorCode =
  | 'INSUFFICIENT_DATA'
  | 'IMPLAUSIBLE_READING'
  | 'SOURCE_UNAVAILABLE'
  | 'REQUEST_FAILED'
  | 'CONFIGURATION_ERROR';

export class ReportingError extends Error {
  readonly code: ReportingErrorCode;

  constructor(code: ReportingErrorCode, message: string) {
    super(message);
    this.name = 'ReportingError';
    this.code = code;
  }
}

/** No usable samples for the interval; it is retried on a later tick. */
export class InsufficientDataError extends ReportingError {
  constructor(message: string) {
    super('INSUFFICIENT_DATA', message);
    this.name = 'InsufficientDataError';
  }
}

export class ImplausibleReadingError extends ReportingError {
  constructor(message: string) {
    super('IMPLAUSIBLE_READING', message);
    this.name = 'ImplausibleReadingError';
  }
}

export class SourceUnavailableError extends ReportingError {
  constructor(message: string) {
    super('SOURCE_UNAVAILABLE', message);
    this.name = 'SourceUnavailableError';
  }
}

export class RequestFailedError extends ReportingError {
  readonly retryable: boolean;
  readonly status_code?: number;

  constructor(message: string, retryable: boolean, status_code?: number) {
    super('REQUEST_FAILED', message);
    this.name = 'RequestFailedError';
    this.retryable = retryable;
    this.status_code = status_code;
  }
}

export class ConfigurationError extends ReportingError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message);
    this.name = 'ConfigurationError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
