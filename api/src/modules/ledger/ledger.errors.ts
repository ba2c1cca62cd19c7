import {
  BadGatewayException,
  BadRequestException,
  ConflictException,
  HttpException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';

export type LedgerEntityName = 'tenant' | 'member' | 'token' | 'sync_record';

export type ConflictReason =
  | 'already_exists'
  | 'duplicate_idempotency_key'
  | 'code_exhausted'
  | 'token_used'
  | 'token_expired'
  | 'state_changed';

export type LedgerError =
  | { kind: 'validation'; message: string; field?: string }
  | {
      kind: 'cap_exceeded';
      message: string;
      currentPercent: number;
      requestedPercent: number;
      maxPercent: number;
    }
  | { kind: 'not_found'; message: string; entity: LedgerEntityName }
  | { kind: 'conflict'; message: string; reason: ConflictReason }
  | { kind: 'external_sync'; message: string; retryable: boolean };

export type Success<T> = { ok: true; value: T };
export type Failure = { ok: false; error: LedgerError };
export type Result<T> = Success<T> | Failure;

export const ok = <T>(value: T): Success<T> => ({ ok: true, value });
export const fail = (error: LedgerError): Failure => ({ ok: false, error });

export const validationError = (
  message: string,
  field?: string,
): LedgerError => ({ kind: 'validation', message, field });

export const notFoundError = (
  entity: LedgerEntityName,
  message: string,
): LedgerError => ({ kind: 'not_found', entity, message });

export const conflictError = (
  reason: ConflictReason,
  message: string,
): LedgerError => ({ kind: 'conflict', reason, message });

/**
 * Thrown inside a database transaction to roll it back; converted back into a
 * `Failure` by `runLedger` at the service boundary.
 */
export class LedgerFailure extends Error {
  constructor(readonly error: LedgerError) {
    super(error.message);
    this.name = 'LedgerFailure';
  }
}

export async function runLedger<T>(
  work: () => Promise<T>,
): Promise<Result<T>> {
  try {
    return ok(await work());
  } catch (err) {
    if (err instanceof LedgerFailure) return fail(err.error);
    throw err;
  }
}

/** Raised by CRM clients; the sync worker is the only place that catches it. */
export class ExternalSyncError extends Error {
  constructor(
    message: string,
    readonly retryable: boolean,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'ExternalSyncError';
  }
}

export function toHttpException(error: LedgerError): HttpException {
  switch (error.kind) {
    case 'validation':
      return new BadRequestException({
        code: 'validation',
        message: error.message,
        field: error.field,
      });
    case 'cap_exceeded':
      return new UnprocessableEntityException({
        code: 'cap_exceeded',
        message: error.message,
        currentPercent: error.currentPercent,
        requestedPercent: error.requestedPercent,
        maxPercent: error.maxPercent,
      });
    case 'not_found':
      return new NotFoundException({
        code: 'not_found',
        message: error.message,
        entity: error.entity,
      });
    case 'conflict':
      return new ConflictException({
        code: 'conflict',
        message: error.message,
        reason: error.reason,
      });
    case 'external_sync':
      return new BadGatewayException({
        code: 'external_sync',
        message: error.message,
        retryable: error.retryable,
      });
    default: {
      const unreachable: never = error;
      return unreachable;
    }
  }
}

/** Unwraps a result for HTTP handlers, throwing the mapped Nest exception. */
export function unwrapOrThrow<T>(result: Result<T>): T {
  if (result.ok) return result.value;
  throw toHttpException(result.error);
}
