import { errorMessage } from './errors.js';

export type Result<T, E = string> = { ok: true; data: T } | { ok: false; reason: E };

export function success<T>(data: T): Result<T, never> {
  return { ok: true, data };
}

export function failure<E = string>(reason: E): Result<never, E> {
  return { ok: false, reason };
}

/**
 * Run an async operation and capture a thrown error as a failure reason.
 */
export async function attempt<T>(fn: () => Promise<T>): Promise<Result<T>> {
  try {
    return success(await fn());
  } catch (err) {
    return failure(errorMessage(err));
  }
}
