/**
 * Error taxonomy shared by the command surface and the HTTP API.
 *
 * Every core operation returns a `Result`; failures carry one of these tagged
 * errors and the reporter projects them by `kind`.
 */

export type NotFoundSubject = 'tenant' | 'member' | 'game' | 'user';

/** Caller-fixable request shape problem. `reason` is shown to the caller. */
export interface ValidationError {
  kind: 'validation';
  reason: string;
}

export type AuthError =
  | { kind: 'auth'; reason: 'unauthorized'; detail: string }
  | { kind: 'auth'; reason: 'forbidden'; requiredScope: string };

export interface NotFoundError {
  kind: 'not-found';
  subject: NotFoundSubject;
  id: string;
}

/** Retryable, upstream-dependent failure. */
export interface TransientError {
  kind: 'transient';
  detail: string;
  cause?: unknown;
}

/** Persistence failure; not retried by the gateway. */
export interface PersistenceError {
  kind: 'persistence';
  detail: string;
  cause?: unknown;
}

/** The unit of work was cancelled before anything was committed. */
export interface CancelledError {
  kind: 'cancelled';
}

export interface InternalError {
  kind: 'internal';
  cause: unknown;
}

export type GatewayError =
  | ValidationError
  | AuthError
  | NotFoundError
  | TransientError
  | PersistenceError
  | CancelledError
  | InternalError;

export type Result<T, E = GatewayError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export const validationError = (reason: string): ValidationError => ({ kind: 'validation', reason });

export const notFound = (subject: NotFoundSubject, id: string): NotFoundError => ({
  kind: 'not-found',
  subject,
  id,
});

export const unauthorized = (detail: string): AuthError => ({ kind: 'auth', reason: 'unauthorized', detail });

export const forbidden = (requiredScope: string): AuthError => ({
  kind: 'auth',
  reason: 'forbidden',
  requiredScope,
});
