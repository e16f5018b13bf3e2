import {isAppIntervalsEnabled} from '../../config.js';

/**
 * Start a one-shot setTimeout only when app intervals are enabled. Returns a cleanup function.
 */
export function startTimeoutIfEnabled(callback: () => void, delayMs: number): () => void {
  if (!isAppIntervalsEnabled()) return () => {};
  const id = setTimeout(callback, delayMs);
  return () => clearTimeout(id);
}
