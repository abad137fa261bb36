import { ZodError } from 'zod';
import { EnvConfigError } from '@marketlake/shared';

export class MarketlakeError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'MarketlakeError';
    this.code = code;
  }
}

export class InvalidRangeError extends MarketlakeError {
  constructor(message: string) {
    super(message, 'INVALID_RANGE');
    this.name = 'InvalidRangeError';
  }
}

export class EmptyExpansionError extends MarketlakeError {
  constructor(message: string) {
    super(message, 'EMPTY_EXPANSION');
    this.name = 'EmptyExpansionError';
  }
}

export class SchemaMismatchError extends MarketlakeError {
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'SCHEMA_MISMATCH');
    this.name = 'SchemaMismatchError';
    this.details = details;
  }
}

export class TransientFetchError extends MarketlakeError {
  readonly statusCode: number | null;

  constructor(message: string, statusCode: number | null = null) {
    super(message, 'TRANSIENT_FETCH');
    this.name = 'TransientFetchError';
    this.statusCode = statusCode;
  }
}

export type PermanentFetchReason = 'http_status' | 'timeout' | 'retries_exhausted' | 'invalid_response';

export class PermanentFetchError extends MarketlakeError {
  readonly reason: PermanentFetchReason;
  readonly statusCode: number | null;

  constructor(message: string, reason: PermanentFetchReason, statusCode: number | null = null) {
    super(message, 'PERMANENT_FETCH');
    this.name = 'PermanentFetchError';
    this.reason = reason;
    this.statusCode = statusCode;
  }
}

export class JobAlreadyFinalizedError extends MarketlakeError {
  constructor(jobId: string) {
    super(`Job ${jobId} is already finalized`, 'JOB_ALREADY_FINALIZED');
    this.name = 'JobAlreadyFinalizedError';
  }
}

export class InvalidJobError extends MarketlakeError {
  constructor(message: string) {
    super(message, 'INVALID_JOB');
    this.name = 'InvalidJobError';
  }
}

export class MissingPartitionError extends MarketlakeError {
  readonly key: string;

  constructor(key: string) {
    super(`Partition ${key} does not exist`, 'MISSING_PARTITION');
    this.name = 'MissingPartitionError';
    this.key = key;
  }
}

export class ProviderNotReadyError extends MarketlakeError {
  constructor(message = 'Data provider is not ready') {
    super(message, 'PROVIDER_NOT_READY');
    this.name = 'ProviderNotReadyError';
  }
}

export class UnknownDatasetKindError extends MarketlakeError {
  readonly kind: unknown;

  constructor(kind: unknown) {
    super(`Unknown dataset kind: ${String(kind)}`, 'UNKNOWN_DATASET_KIND');
    this.name = 'UnknownDatasetKindError';
    this.kind = kind;
  }
}

export class SubmissionNotFoundError extends MarketlakeError {
  constructor(submissionId: string) {
    super(`Submission ${submissionId} was not found`, 'SUBMISSION_NOT_FOUND');
    this.name = 'SubmissionNotFoundError';
  }
}

export interface ErrorResponse {
  statusCode: number;
  code: string;
  message: string;
  details?: unknown;
}

export const mapErrorToResponse = (error: unknown): ErrorResponse => {
  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      code: 'VALIDATION_FAILED',
      message: 'Request validation failed',
      details: error.flatten()
    };
  }

  if (
    error instanceof InvalidRangeError ||
    error instanceof EmptyExpansionError ||
    error instanceof UnknownDatasetKindError
  ) {
    return { statusCode: 400, code: error.code, message: error.message };
  }

  if (error instanceof SubmissionNotFoundError) {
    return { statusCode: 404, code: error.code, message: error.message };
  }

  if (error instanceof MissingPartitionError) {
    return { statusCode: 409, code: error.code, message: error.message, details: { key: error.key } };
  }

  if (error instanceof SchemaMismatchError) {
    return { statusCode: 422, code: error.code, message: error.message, details: error.details };
  }

  if (error instanceof ProviderNotReadyError) {
    return { statusCode: 503, code: error.code, message: error.message };
  }

  if (error instanceof EnvConfigError) {
    return { statusCode: 500, code: 'CONFIG_INVALID', message: error.message, details: error.issues };
  }

  return {
    statusCode: 500,
    code: 'INTERNAL',
    message: 'Unexpected error'
  };
};
