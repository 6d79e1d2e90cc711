import { ResultAsync, err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { TimeClockPort } from '../../../ports/time-clock.port.js';
import { describeCause } from '../../../errors/formatter.js';
import { deadlineReached } from '../../../domain/orchestration/repair-state.js';

export type CollaboratorName = 'validator' | 'generative_fixer';

export type CollaboratorError =
  | { readonly code: 'DEADLINE_EXCEEDED'; readonly collaborator: CollaboratorName; readonly message: string }
  | { readonly code: 'CANCELLED'; readonly collaborator: CollaboratorName; readonly message: string }
  | { readonly code: 'COLLABORATOR_THREW'; readonly collaborator: CollaboratorName; readonly message: string; readonly cause: unknown }
  | { readonly code: 'MALFORMED_RESPONSE'; readonly collaborator: CollaboratorName; readonly message: string };

export interface CallBounds {
  readonly clock: TimeClockPort;
  readonly deadlineMs: number;
  /** Run-level signal: aborted on external cancellation. */
  readonly signal: AbortSignal;
}

/**
 * Issues one collaborator call bounded by the run deadline.
 *
 * - an expired deadline or aborted run issues no call at all
 * - the call races a timer for the remaining time; the loser is abandoned and its
 *   signal aborted
 * - a result that arrives once the deadline is reached (per the clock port) is discarded
 */
export function callWithDeadline<T>(
  collaborator: CollaboratorName,
  bounds: CallBounds,
  invoke: (signal: AbortSignal) => Promise<T>,
): ResultAsync<T, CollaboratorError> {
  return new ResultAsync(race(collaborator, bounds, invoke));
}

async function race<T>(
  collaborator: CollaboratorName,
  bounds: CallBounds,
  invoke: (signal: AbortSignal) => Promise<T>,
): Promise<Result<T, CollaboratorError>> {
  if (bounds.signal.aborted) return err(cancelled(collaborator));
  const now = bounds.clock.nowMs();
  if (deadlineReached(now, bounds.deadlineMs)) return err(expired(collaborator));
  const remaining = bounds.deadlineMs - now;

  const attempt = new AbortController();
  const onAbort = (): void => attempt.abort();
  bounds.signal.addEventListener('abort', onAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timedOut = new Promise<Result<T, CollaboratorError>>((resolve) => {
    timer = setTimeout(() => resolve(err(expired(collaborator))), remaining);
  });
  const aborted = new Promise<Result<T, CollaboratorError>>((resolve) => {
    attempt.signal.addEventListener('abort', () => resolve(err(cancelled(collaborator))), { once: true });
  });

  let call: Promise<T>;
  try {
    call = invoke(attempt.signal);
  } catch (e) {
    call = Promise.reject(e);
  }
  const settled = call.then(
    (value): Result<T, CollaboratorError> => ok(value),
    (e: unknown): Result<T, CollaboratorError> =>
      err({ code: 'COLLABORATOR_THREW', collaborator, message: describeCause(e), cause: e }),
  );

  try {
    const outcome = await Promise.race([settled, timedOut, aborted]);
    if (outcome.isOk() && deadlineReached(bounds.clock.nowMs(), bounds.deadlineMs)) return err(expired(collaborator));
    return outcome;
  } finally {
    clearTimeout(timer);
    bounds.signal.removeEventListener('abort', onAbort);
    attempt.abort();
  }
}

function expired(collaborator: CollaboratorName): CollaboratorError {
  return { code: 'DEADLINE_EXCEEDED', collaborator, message: `Deadline elapsed while awaiting ${collaborator}` };
}

function cancelled(collaborator: CollaboratorName): CollaboratorError {
  return { code: 'CANCELLED', collaborator, message: `Run cancelled while awaiting ${collaborator}` };
}
