/**
 * Failure-signaling policies for cursor operations.
 *
 * A container picks one policy when it is created and every operation that
 * can fail returns that policy's outcome type.
 */

export const EMPTY_CONTAINER = 'Empty container';
export const CURSOR_OUT_OF_RANGE = 'Cursor out of range';

export type OpOutcome = { ok: true } | { ok: false; error: string };

export interface OpPolicy<R> {
  ok(): R;
  error(reason: string): R;
  isOk(result: R): boolean;
}

/** Plain success flag. Failure reasons are dropped. */
export const flagPolicy: OpPolicy<boolean> = {
  ok: () => true,
  error: () => false,
  isOk: (result) => result,
};

/** Structured outcome carrying a short description on failure. */
export const strictPolicy: OpPolicy<OpOutcome> = {
  ok: () => ({ ok: true }),
  error: (reason) => ({ ok: false, error: reason }),
  isOk: (result) => result.ok,
};
