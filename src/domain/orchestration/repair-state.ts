/**
 * Repair loop state machine.
 *
 * CLASSIFY → DETERMINISTIC_FIX → VALIDATE_1 → {PASS | FEEDBACK_FIX | GENERATIVE_FIX | FAIL}
 * FEEDBACK_FIX → VALIDATE_1 (at most once per run)
 * GENERATIVE_FIX → VALIDATE_2 → {PASS | GENERATIVE_FIX | FAIL}
 * any → TIMEOUT once the deadline is reached, unless a validation in hand clears the bar
 *
 * `nextState` is pure: the orchestrator performs the phase's work, then asks
 * where to go with the facts that work produced.
 */

export type RepairPhase =
  | 'CLASSIFY'
  | 'DETERMINISTIC_FIX'
  | 'VALIDATE_1'
  | 'FEEDBACK_FIX'
  | 'GENERATIVE_FIX'
  | 'VALIDATE_2';
export type TerminalState = 'PASS' | 'FAIL' | 'TIMEOUT';
export type RepairState = RepairPhase | TerminalState;

export interface TransitionInput {
  readonly state: RepairPhase;
  /** Global score of the validation just performed; null if it failed or none ran. */
  readonly score: number | null;
  /** Best global score recorded so far, before this step's entry. */
  readonly bestScore: number | null;
  readonly defectCount: number;
  /** Deterministic defects a report surfaced that the feedback pass may still fix; 0 once it ran. */
  readonly feedbackEligible: number;
  readonly generativeEligible: number;
  readonly attemptsRemaining: number;
  readonly deadlineExpired: boolean;
  readonly passBar: number;
  readonly catastrophicDrop: number;
}

export type Transition = { readonly next: RepairState; readonly reason: string };

export function isTerminal(state: RepairState): state is TerminalState {
  return state === 'PASS' || state === 'FAIL' || state === 'TIMEOUT';
}

/** The one deadline comparison used by the loop and by collaborator calls. */
export function deadlineReached(nowMs: number, deadlineMs: number): boolean {
  return nowMs >= deadlineMs;
}

export function nextState(input: TransitionInput): Transition {
  const validating = input.state === 'VALIDATE_1' || input.state === 'VALIDATE_2';
  if (validating && passes(input)) return { next: 'PASS', reason: `Score ${fmt(input.score)} meets pass bar` };
  if (input.deadlineExpired) return { next: 'TIMEOUT', reason: 'Global deadline elapsed' };

  switch (input.state) {
    case 'CLASSIFY':
      return input.defectCount === 0
        ? { next: 'PASS', reason: 'No defects detected' }
        : { next: 'DETERMINISTIC_FIX', reason: `${input.defectCount} defect(s) classified` };

    case 'DETERMINISTIC_FIX':
      return { next: 'VALIDATE_1', reason: 'Deterministic pass applied' };

    case 'VALIDATE_1':
      if (input.feedbackEligible > 0) {
        return { next: 'FEEDBACK_FIX', reason: `${input.feedbackEligible} defect(s) found by validation have rules` };
      }
      return towardsGenerative(input);

    case 'FEEDBACK_FIX':
      return { next: 'VALIDATE_1', reason: 'Feedback pass applied' };

    case 'GENERATIVE_FIX':
      return { next: 'VALIDATE_2', reason: 'Generative proposal applied' };

    case 'VALIDATE_2': {
      if (input.score !== null && input.bestScore !== null && input.bestScore - input.score > input.catastrophicDrop) {
        return {
          next: 'FAIL',
          reason: `Score fell from ${fmt(input.bestScore)} to ${fmt(input.score)}; stopping generative attempts`,
        };
      }
      return towardsGenerative(input);
    }
  }
}

function towardsGenerative(input: TransitionInput): Transition {
  if (input.attemptsRemaining <= 0) {
    return { next: 'FAIL', reason: `Generative attempt budget exhausted (score ${fmt(input.score)})` };
  }
  if (input.generativeEligible === 0) {
    return { next: 'FAIL', reason: `No defects eligible for generative repair (score ${fmt(input.score)})` };
  }
  return { next: 'GENERATIVE_FIX', reason: `${input.generativeEligible} defect(s) need generative repair` };
}

function passes(input: TransitionInput): boolean {
  return input.score !== null && input.score >= input.passBar;
}

function fmt(score: number | null): string {
  return score === null ? 'n/a' : score.toFixed(2);
}
