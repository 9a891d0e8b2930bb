/**
 * Result type for exchange calls.
 *
 * Gateway methods never throw; they return either a value or a typed
 * GatewayError the caller matches on.
 */

export type Result<T, E = GatewayError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export type GatewayErrorKind =
  | 'network'
  | 'rate_limited'
  | 'auth'
  | 'rejected'
  | 'not_found'
  | 'invalid_response';

export interface GatewayError {
  kind: GatewayErrorKind;
  /** Gateway method that failed, e.g. "getSpotTicker" */
  operation: string;
  message: string;
  /** Exchange return code, when the exchange answered */
  code?: number;
}

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function gatewayError(
  kind: GatewayErrorKind,
  operation: string,
  message: string,
  code?: number,
): GatewayError {
  return code === undefined
    ? { kind, operation, message }
    : { kind, operation, message, code };
}

/** Transient errors are worth retrying on the next attempt or tick */
export function isTransient(error: GatewayError): boolean {
  return error.kind === 'network' || error.kind === 'rate_limited';
}

export function describeError(error: GatewayError): string {
  const code = error.code === undefined ? '' : ` (code: ${error.code})`;
  return `${error.operation} ${error.kind}: ${error.message}${code}`;
}
