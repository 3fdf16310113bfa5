export type DomainErrorCode =
  | 'INVALID_INPUT'
  | 'UNCONFIGURED'
  | 'NOT_FOUND'
  | 'UNKNOWN_ERROR';

export type DomainErrorDetails = Record<string, unknown>;

export class DomainError extends Error {
  readonly code: DomainErrorCode;
  readonly details?: DomainErrorDetails;
  readonly cause?: unknown;
  readonly retryable: boolean;

  constructor(args: {
    code: DomainErrorCode;
    message: string;
    details?: DomainErrorDetails;
    retryable?: boolean;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = 'DomainError';
    this.code = args.code;
    this.details = args.details;
    this.cause = args.cause;
    this.retryable = args.retryable ?? false;
  }
}

export const isDomainError = (err: unknown): err is DomainError =>
  err instanceof DomainError ||
  (typeof err === 'object' &&
    err !== null &&
    'name' in err &&
    err.name === 'DomainError' &&
    'code' in err &&
    typeof err.code === 'string');

export const asDomainError = (err: unknown): DomainError => {
  if (err instanceof DomainError) return err;
  const message = err instanceof Error ? err.message : 'Unexpected error.';
  return new DomainError({
    code: 'UNKNOWN_ERROR',
    message,
    retryable: false,
    cause: err,
  });
};

export const invalidInput = (message: string, details?: DomainErrorDetails) =>
  new DomainError({ code: 'INVALID_INPUT', message, details });

export const unconfigured = (message: string, details?: DomainErrorDetails) =>
  new DomainError({ code: 'UNCONFIGURED', message, details });

export const notFound = (message: string, details?: DomainErrorDetails) =>
  new DomainError({ code: 'NOT_FOUND', message, details });
