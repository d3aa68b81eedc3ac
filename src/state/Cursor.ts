import { CURSOR_OUT_OF_RANGE, EMPTY_CONTAINER, type OpPolicy } from './opResult.js';
import { debug } from '../utils/logger.js';

/**
 * Bounded position over a sequence of `capacity` slots.
 *
 * The cursor only knows the capacity number, never the sequence itself.
 * Moving past either end fails, or wraps around when rotation is enabled.
 */
export class Cursor<R> {
  private capacity: number;
  private rotation = false;
  private endPosition = false;
  private index = 0;

  constructor(
    private readonly policy: OpPolicy<R>,
    capacity: number = 0
  ) {
    this.capacity = capacity;
  }

  getCapacity(): number {
    return this.capacity;
  }

  /**
   * Shrinking below the current index clamps it to the last slot.
   * Zero capacity parks the index at 0.
   */
  setCapacity(capacity: number): void {
    this.capacity = capacity;
    if (this.index >= capacity) {
      const clamped = capacity === 0 ? 0 : capacity - 1;
      if (clamped !== this.index) {
        debug(`cursor clamped from ${this.index} to ${clamped} (capacity ${capacity})`);
      }
      this.index = clamped;
    }
  }

  getRotation(): boolean {
    return this.rotation;
  }

  setRotation(rotation: boolean): void {
    this.rotation = rotation;
  }

  getEndPosition(): boolean {
    return this.endPosition;
  }

  /**
   * Allow `setValue(capacity)`, i.e. parking the cursor one past the last slot.
   */
  setEndPosition(endPosition: boolean): void {
    this.endPosition = endPosition;
  }

  getValue(): number {
    return this.index;
  }

  setValue(value: number): R {
    const limit = this.endPosition ? this.capacity : this.capacity - 1;
    if (!Number.isInteger(value) || value < 0 || value > limit) {
      return this.policy.error(CURSOR_OUT_OF_RANGE);
    }
    this.index = value;
    return this.policy.ok();
  }

  increase(): R {
    if (this.capacity === 0) return this.policy.error(EMPTY_CONTAINER);

    if (this.index >= this.capacity - 1) {
      if (!this.rotation) return this.policy.error(CURSOR_OUT_OF_RANGE);
      this.index = 0;
    } else {
      this.index += 1;
    }
    return this.policy.ok();
  }

  decrease(): R {
    if (this.capacity === 0) return this.policy.error(EMPTY_CONTAINER);

    if (this.index === 0) {
      if (!this.rotation) return this.policy.error(CURSOR_OUT_OF_RANGE);
      this.index = this.capacity - 1;
    } else {
      this.index -= 1;
    }
    return this.policy.ok();
  }
}
