import { CancelledError } from "../errors.js";

/**
 * Pre-flight cancellation gate.
 *
 * Checked before a session is acquired and again before every statement is
 * dispatched. A statement already sent is not interrupted: the Bolt session
 * protocol has no mid-statement abort, so an abort signalled while a query is
 * in flight only takes effect at the next gate.
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError(signal.reason);
  }
}
