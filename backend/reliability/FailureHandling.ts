import crypto from 'node:crypto';

import { telemetry as defaultTelemetry, type Telemetry } from '../telemetry/Telemetry';
import { asDomainError, type DomainError, type DomainErrorCode } from './DomainError';

export type FailureReport = {
  errorId: string;
  operation: string;
  code: DomainErrorCode;
  message: string;
  retryable: boolean;
};

const publicMessageFor = (err: DomainError): string => {
  // Details go to the error log only.
  switch (err.code) {
    case 'INVALID_INPUT':
      return err.message || 'Invalid input.';
    case 'UNCONFIGURED':
      return err.message || 'Required collaborator is not configured.';
    case 'NOT_FOUND':
      return err.message || 'Requested resource not found.';
    case 'UNKNOWN_ERROR':
    default:
      return 'Unexpected error.';
  }
};

/**
 * Normalizes any thrown value into a FailureReport, records an `engine.error`
 * telemetry event and writes one structured line to stderr.
 */
export function reportFailure(
  err: unknown,
  context: { operation: string; telemetry?: Telemetry },
): FailureReport {
  const errorId = crypto.randomUUID();
  const domain = asDomainError(err);
  const sink = context.telemetry ?? defaultTelemetry;

  sink.record({
    name: 'engine.error',
    durationMs: 0,
    tags: {
      operation: context.operation,
      code: domain.code,
      errorId,
    },
  });

  if (sink.logsEnabled()) {
    // eslint-disable-next-line no-console
    console.error(
      JSON.stringify({
        type: 'archmap.error',
        errorId,
        operation: context.operation,
        code: domain.code,
        retryable: domain.retryable,
        message: domain.message,
        details: domain.details,
        stack: domain.stack,
      }),
    );
  }

  return {
    errorId,
    operation: context.operation,
    code: domain.code,
    message: publicMessageFor(domain),
    retryable: domain.retryable,
  };
}
