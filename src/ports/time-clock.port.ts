/**
 * Time source for deadlines and run durations.
 *
 * Pipeline code must not read `Date.now()` directly so tests can move time.
 *
 * Guarantees:
 * - Synchronous
 * - Non-decreasing within one process
 */
export interface TimeClockPort {
  /** Milliseconds since the Unix epoch. */
  nowMs(): number;
}
