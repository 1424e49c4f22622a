import type { GatewayError } from './gateway-error';

/**
 * Carries a tagged `GatewayError` out of a guard or controller so the global
 * filter can project it. Never constructed from inside the core services.
 */
export class GatewayException extends Error {
  constructor(readonly gatewayError: GatewayError) {
    super(`Gateway error: ${gatewayError.kind}`);
    this.name = 'GatewayException';
  }
}

/** Unwrap a result at a controller boundary. */
export function unwrapOrThrow<T>(result: { ok: true; value: T } | { ok: false; error: GatewayError }): T {
  if (!result.ok) {
    throw new GatewayException(result.error);
  }
  return result.value;
}
