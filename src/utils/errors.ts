/**
 * @file src/utils/errors.ts
 * @description Helpers for inspecting caught values without casting them.
 */

/**
 * Narrow an unknown thrown value to a Node system error with the given `code` (e.g. "ENOENT").
 */
export function hasErrorCode(err: unknown, code: string): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && err.code === code;
}

/**
 * Normalise an unknown thrown value into an Error instance.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
