import { describe, it, expect } from 'vitest';
import type { RepairState, TransitionInput } from '../../../src/domain/orchestration/repair-state.js';
import { deadlineReached, isTerminal, nextState } from '../../../src/domain/orchestration/repair-state.js';

function input(overrides: Partial<TransitionInput>): TransitionInput {
  return {
    state: 'CLASSIFY',
    score: null,
    bestScore: null,
    defectCount: 1,
    feedbackEligible: 0,
    generativeEligible: 1,
    attemptsRemaining: 3,
    deadlineExpired: false,
    passBar: 0.9,
    catastrophicDrop: 0.25,
    ...overrides,
  };
}

describe('nextState', () => {
  it('passes immediately when classification finds nothing', () => {
    expect(nextState(input({ state: 'CLASSIFY', defectCount: 0 }))).toEqual({ next: 'PASS', reason: 'No defects detected' });
    expect(nextState(input({ state: 'CLASSIFY', defectCount: 2 })).next).toBe('DETERMINISTIC_FIX');
  });

  it('always validates after a fix step', () => {
    expect(nextState(input({ state: 'DETERMINISTIC_FIX' })).next).toBe('VALIDATE_1');
    expect(nextState(input({ state: 'GENERATIVE_FIX' })).next).toBe('VALIDATE_2');
  });

  it('times out from any state once the deadline has passed', () => {
    for (const state of ['CLASSIFY', 'DETERMINISTIC_FIX', 'VALIDATE_1', 'FEEDBACK_FIX', 'GENERATIVE_FIX', 'VALIDATE_2'] as const) {
      expect(nextState(input({ state, deadlineExpired: true, score: 0.5 }))).toEqual({
        next: 'TIMEOUT',
        reason: 'Global deadline elapsed',
      });
    }
  });

  it('keeps a passing validation that lands on the deadline', () => {
    expect(nextState(input({ state: 'VALIDATE_1', deadlineExpired: true, score: 1 }))).toEqual({
      next: 'PASS',
      reason: 'Score 1.00 meets pass bar',
    });
    expect(nextState(input({ state: 'VALIDATE_2', deadlineExpired: true, score: 0.9, bestScore: 0.4 })).next).toBe('PASS');
  });

  it('runs one feedback pass when validation surfaces rule-fixable defects', () => {
    expect(nextState(input({ state: 'VALIDATE_1', score: 0.5, feedbackEligible: 2 }))).toEqual({
      next: 'FEEDBACK_FIX',
      reason: '2 defect(s) found by validation have rules',
    });
    expect(nextState(input({ state: 'FEEDBACK_FIX' }))).toEqual({ next: 'VALIDATE_1', reason: 'Feedback pass applied' });
  });

  it('prefers passing over a feedback pass', () => {
    expect(nextState(input({ state: 'VALIDATE_1', score: 0.95, feedbackEligible: 1 })).next).toBe('PASS');
  });

  it('passes at or above the bar', () => {
    expect(nextState(input({ state: 'VALIDATE_1', score: 0.95 }))).toEqual({
      next: 'PASS',
      reason: 'Score 0.95 meets pass bar',
    });
    expect(nextState(input({ state: 'VALIDATE_2', score: 0.9, bestScore: 0.5 })).next).toBe('PASS');
  });

  it('moves to generative repair while budget and eligible defects remain', () => {
    expect(nextState(input({ state: 'VALIDATE_1', score: 0.5, generativeEligible: 2 }))).toEqual({
      next: 'GENERATIVE_FIX',
      reason: '2 defect(s) need generative repair',
    });
  });

  it('fails when the generative budget is spent', () => {
    expect(nextState(input({ state: 'VALIDATE_1', score: 0.5, attemptsRemaining: 0 }))).toEqual({
      next: 'FAIL',
      reason: 'Generative attempt budget exhausted (score 0.50)',
    });
  });

  it('fails when nothing is eligible for generative repair', () => {
    expect(nextState(input({ state: 'VALIDATE_1', score: 0.5, generativeEligible: 0 })).next).toBe('FAIL');
  });

  it('treats a failed validation as not passing', () => {
    expect(nextState(input({ state: 'VALIDATE_1', score: null })).next).toBe('GENERATIVE_FIX');
    expect(nextState(input({ state: 'VALIDATE_1', score: null, attemptsRemaining: 0 })).reason).toBe(
      'Generative attempt budget exhausted (score n/a)',
    );
  });

  it('stops on a catastrophic drop below the best score', () => {
    expect(nextState(input({ state: 'VALIDATE_2', score: 0.5, bestScore: 0.8 }))).toEqual({
      next: 'FAIL',
      reason: 'Score fell from 0.80 to 0.50; stopping generative attempts',
    });
  });

  it('retries after a moderate drop', () => {
    expect(nextState(input({ state: 'VALIDATE_2', score: 0.4, bestScore: 0.6 })).next).toBe('GENERATIVE_FIX');
  });
});

describe('isTerminal', () => {
  it('recognises the three terminal states only', () => {
    const terminal: readonly RepairState[] = ['PASS', 'FAIL', 'TIMEOUT'];
    expect(terminal.every(isTerminal)).toBe(true);
    expect(isTerminal('VALIDATE_1')).toBe(false);
  });
});

describe('deadlineReached', () => {
  it('counts the deadline instant itself as reached', () => {
    expect(deadlineReached(999, 1_000)).toBe(false);
    expect(deadlineReached(1_000, 1_000)).toBe(true);
    expect(deadlineReached(1_001, 1_000)).toBe(true);
  });
});
