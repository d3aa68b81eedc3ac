/**
 * Minimal stderr logger for cursorvec.
 *
 * - `debug()` is gated by `setDebug(true)` (see `configure()` / CURSORVEC_DEBUG)
 * - `warn()` and `error()` always write to stderr
 *
 * The container itself only ever calls `debug()`.
 */

let debugEnabled = false;

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

function timestamp(): string {
  return new Date().toISOString();
}

export function debug(message: string): void {
  if (debugEnabled) {
    process.stderr.write(`[cursorvec ${timestamp()}] ${message}\n`);
  }
}

export function warn(message: string): void {
  process.stderr.write(`[cursorvec warn] ${message}\n`);
}

function formatError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (err) return String(err);
  return '';
}

export function error(message: string, err?: unknown): void {
  const detail = err ? `: ${formatError(err)}` : '';
  process.stderr.write(`[cursorvec error] ${message}${detail}\n`);
}
