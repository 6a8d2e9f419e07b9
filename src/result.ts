/**
 * Outcome of one parse or evaluate call.
 */

export type Result<T, E> =
  | { type: 'ok'; value: T }
  | { type: 'error'; value: E };

export function ok<T>(value: T): { type: 'ok'; value: T } {
  return { type: 'ok', value };
}

export function error<E>(value: E): { type: 'error'; value: E } {
  return { type: 'error', value };
}

export function isOk<T, E>(result: Result<T, E>): result is { type: 'ok'; value: T } {
  return result.type === 'ok';
}
