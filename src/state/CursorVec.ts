import { Cursor } from './Cursor.js';
import {
  EMPTY_CONTAINER_STATE,
  MAX_OUT_STATE,
  MIN_OUT_STATE,
  OUT_OF_RANGE_STATE,
  valid,
  type CursorState,
} from './CursorState.js';
import {
  EMPTY_CONTAINER,
  flagPolicy,
  strictPolicy,
  type OpOutcome,
  type OpPolicy,
} from './opResult.js';
import type { Config } from '../config.js';
import { debug } from '../utils/logger.js';

type Direction = 'next' | 'prev';

function isStepCount(amount: number): boolean {
  return Number.isInteger(amount) && amount >= 0;
}

/**
 * Array paired with a cursor that tracks the current element.
 *
 * Mutations made through `withContainer`, `setContainer`, `modify` and `retain`
 * keep the cursor in sync. Edits made directly on `items` leave it stale until
 * `updateCursor()` is called; reads in between may report `outOfRange`.
 *
 * `R` is the outcome type of every fallible operation, fixed by the policy the
 * subclass passes in. Use `CursorVec` for boolean flags and `StrictCursorVec`
 * for `{ ok, error }` outcomes.
 */
export abstract class BaseCursorVec<T, R> implements Iterable<T> {
  private vector: T[] = [];
  private readonly cursor: Cursor<R>;

  protected constructor(private readonly policy: OpPolicy<R>) {
    this.cursor = new Cursor(policy);
  }

  // Builders

  withContainer(items: T[]): this {
    this.setContainer(items);
    return this;
  }

  rotatable(rotation: boolean): this {
    this.cursor.setRotation(rotation);
    return this;
  }

  withEndPosition(endPosition: boolean): this {
    this.cursor.setEndPosition(endPosition);
    return this;
  }

  withConfig(config: Pick<Config, 'rotation' | 'endPosition'>): this {
    this.cursor.setRotation(config.rotation);
    this.cursor.setEndPosition(config.endPosition);
    return this;
  }

  // Configuration

  setRotatable(rotation: boolean): void {
    this.cursor.setRotation(rotation);
  }

  isRotatable(): boolean {
    return this.cursor.getRotation();
  }

  setContainer(items: T[]): void {
    this.vector = items;
    this.updateCursor();
  }

  /**
   * Run an in-place edit on the backing array, then resync the cursor.
   * The resync also happens when the mutator throws.
   */
  modify(mutator: (items: T[]) => void): void {
    try {
      mutator(this.vector);
    } finally {
      this.updateCursor();
    }
  }

  /** Keep only the elements matching `predicate`, preserving order. */
  retain(predicate: (item: T, index: number) => boolean): void {
    this.modify((items) => {
      // Evaluate everything first so a throwing predicate leaves items untouched.
      const kept = items.filter(predicate);
      for (let i = 0; i < kept.length; i++) {
        items[i] = kept[i];
      }
      items.length = kept.length;
    });
  }

  updateCursor(): void {
    this.cursor.setCapacity(this.vector.length);
  }

  // Raw access

  /** Live backing array. Structural edits here need `updateCursor()` afterwards. */
  get items(): T[] {
    return this.vector;
  }

  get length(): number {
    return this.vector.length;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.vector[Symbol.iterator]();
  }

  // Cursor reads

  getCurrent(): CursorState<T> {
    if (this.isEmptyContainer()) return EMPTY_CONTAINER_STATE;
    return this.readCursor();
  }

  moveNextAndGet(): CursorState<T> {
    return this.moveNthAndGet('next', 1);
  }

  /**
   * Take `amount` forward steps, stopping with `maxOut` at the first that fails.
   * A count that is not a non-negative integer also yields `maxOut` without moving.
   */
  moveNextNthAndGet(amount: number): CursorState<T> {
    return this.moveNthAndGet('next', amount);
  }

  movePrevAndGet(): CursorState<T> {
    return this.moveNthAndGet('prev', 1);
  }

  /** Backward counterpart of `moveNextNthAndGet`, reporting `minOut`. */
  movePrevNthAndGet(amount: number): CursorState<T> {
    return this.moveNthAndGet('prev', amount);
  }

  /**
   * Move forward and return the element under the cursor, whether or not the
   * move succeeded. Null for an empty container and for a stale cursor, so with
   * a `T` that includes null the result does not tell those apart from a stored
   * null element; use `moveNextAndGet()` when that matters.
   */
  moveNextAndGetAlways(): T | null {
    return this.moveNthAndGetAlways('next', 1);
  }

  /**
   * Stops at the first step that fails and returns the element there.
   * A count that is not a non-negative integer reads without moving.
   */
  moveNextNthAndGetAlways(amount: number): T | null {
    return this.moveNthAndGetAlways('next', amount);
  }

  movePrevAndGetAlways(): T | null {
    return this.moveNthAndGetAlways('prev', 1);
  }

  movePrevNthAndGetAlways(amount: number): T | null {
    return this.moveNthAndGetAlways('prev', amount);
  }

  // Plain moves

  moveNext(): R {
    if (this.isEmptyContainer()) return this.policy.error(EMPTY_CONTAINER);
    return this.cursor.increase();
  }

  movePrev(): R {
    if (this.isEmptyContainer()) return this.policy.error(EMPTY_CONTAINER);
    return this.cursor.decrease();
  }

  // Manual cursor access

  /** Cursor index, or null when the container is empty. */
  getCursor(): number | null {
    return this.isEmptyContainer() ? null : this.cursor.getValue();
  }

  setCursor(index: number): R {
    return this.cursor.setValue(index);
  }

  private step(direction: Direction): boolean {
    const result = direction === 'next' ? this.cursor.increase() : this.cursor.decrease();
    return this.policy.isOk(result);
  }

  private moveNthAndGet(direction: Direction, amount: number): CursorState<T> {
    if (this.isEmptyContainer()) return EMPTY_CONTAINER_STATE;
    if (!isStepCount(amount)) {
      debug(`rejected step count ${amount}`);
      return direction === 'next' ? MAX_OUT_STATE : MIN_OUT_STATE;
    }

    for (let i = 0; i < amount; i++) {
      if (!this.step(direction)) {
        return direction === 'next' ? MAX_OUT_STATE : MIN_OUT_STATE;
      }
    }
    return this.readCursor();
  }

  private moveNthAndGetAlways(direction: Direction, amount: number): T | null {
    if (this.isEmptyContainer()) return null;

    const steps = isStepCount(amount) ? amount : 0;
    for (let i = 0; i < steps; i++) {
      if (!this.step(direction)) break;
    }
    const state = this.readCursor();
    return state.kind === 'valid' ? state.value : null;
  }

  private readCursor(): CursorState<T> {
    const index = this.cursor.getValue();
    if (index >= this.vector.length) {
      debug(`stale cursor ${index} for length ${this.vector.length}`);
      return OUT_OF_RANGE_STATE;
    }
    return valid(this.vector[index]);
  }

  private isEmptyContainer(): boolean {
    return this.vector.length === 0;
  }
}

/**
 * @example
 * ```ts
 * const vec = new CursorVec<string>().withContainer(['first', 'second', 'third']);
 * vec.moveNextAndGet(); // { kind: 'valid', value: 'second' }
 * vec.moveNextNthAndGet(5); // { kind: 'maxOut' }
 * vec.setCursor(7); // false
 * ```
 */
export class CursorVec<T> extends BaseCursorVec<T, boolean> {
  constructor() {
    super(flagPolicy);
  }
}

/**
 * Same container, but `moveNext`, `movePrev` and `setCursor` report failures as
 * `{ ok: false, error }` with a short reason.
 */
export class StrictCursorVec<T> extends BaseCursorVec<T, OpOutcome> {
  constructor() {
    super(strictPolicy);
  }
}
