/**
 * cursorvec: an array with a built-in cursor.
 *
 * The cursor moves forward and backward within the array's bounds, optionally
 * wrapping around at either end. Edits made through the container keep the
 * cursor in range; edits made directly on `items` need `updateCursor()`.
 */

import { CursorVec } from './state/CursorVec.js';
import { setDebug } from './utils/logger.js';
import type { Config } from './config.js';

export { Cursor } from './state/Cursor.js';
export { BaseCursorVec, CursorVec, StrictCursorVec } from './state/CursorVec.js';
export {
  cursorValue,
  isValid,
  type CursorState,
  type CursorStateKind,
} from './state/CursorState.js';
export {
  CURSOR_OUT_OF_RANGE,
  EMPTY_CONTAINER,
  flagPolicy,
  strictPolicy,
  type OpOutcome,
  type OpPolicy,
} from './state/opResult.js';
export { CONFIG_PATH, parseBooleanFlag, loadConfig, type Config } from './config.js';
export { isDebugEnabled, setDebug } from './utils/logger.js';

/**
 * Apply process-wide settings from a loaded config.
 */
export function configure(config: Pick<Config, 'debug'>): void {
  setDebug(config.debug);
}

/**
 * Build a boolean-flag container over `items` with rotation and end-position
 * taken from `config`.
 */
export function fromConfig<T>(items: T[], config: Config): CursorVec<T> {
  return new CursorVec<T>().withConfig(config).withContainer(items);
}
