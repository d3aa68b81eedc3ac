/**
 * Result of a cursor-aware read on a CursorVec.
 */
export type CursorState<T> =
  | { kind: 'valid'; value: T }
  | { kind: 'emptyContainer' }
  | { kind: 'outOfRange' }
  | { kind: 'maxOut' }
  | { kind: 'minOut' };

export type CursorStateKind = CursorState<unknown>['kind'];

export function valid<T>(value: T): CursorState<T> {
  return { kind: 'valid', value };
}

export const EMPTY_CONTAINER_STATE = { kind: 'emptyContainer' } as const;
export const OUT_OF_RANGE_STATE = { kind: 'outOfRange' } as const;
export const MAX_OUT_STATE = { kind: 'maxOut' } as const;
export const MIN_OUT_STATE = { kind: 'minOut' } as const;

export function isValid<T>(state: CursorState<T>): state is { kind: 'valid'; value: T } {
  return state.kind === 'valid';
}

/**
 * Value carried by a valid state, null for every other state.
 */
export function cursorValue<T>(state: CursorState<T>): T | null {
  return state.kind === 'valid' ? state.value : null;
}
