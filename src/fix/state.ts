/**
 * Fix attempt state machine
 *
 * Steps run strictly in order; any non-terminal step can fail into ERROR. An attempt may
 * stop successfully at DIFF_READY, COMMITTING or PUSHING depending on its options.
 */

import { IllegalTransitionError } from '../shared/errors.js';

export const FIX_STATES = [
  'pending',
  'branching',
  'fixing',
  'reviewing',
  'diff_ready',
  'committing',
  'pushing',
  'creating_pr',
  'completed',
  'error'
] as const;

export type FixState = typeof FIX_STATES[number];

export const FIX_TRANSITIONS: Readonly<Record<FixState, readonly FixState[]>> = {
  pending: ['branching', 'error'],
  branching: ['fixing', 'error'],
  fixing: ['reviewing', 'error'],
  reviewing: ['diff_ready', 'error'],
  diff_ready: ['committing', 'error'],
  committing: ['pushing', 'error'],
  pushing: ['creating_pr', 'error'],
  creating_pr: ['completed', 'error'],
  completed: [],
  error: []
};

export function isTerminalFixState(state: FixState): boolean {
  return FIX_TRANSITIONS[state].length === 0;
}

/**
 * Re-announcing the current state is not a transition and is always allowed
 */
export function assertFixTransition(from: FixState, to: FixState): void {
  if (from === to) {
    return;
  }
  if (!FIX_TRANSITIONS[from].includes(to)) {
    throw new IllegalTransitionError('fix', from, to);
  }
}

export interface ReviewFinding {
  title: string;
  body: string;
  /** 0 (must fix) to 3 (nit) */
  priority: number;
  /** 0 to 1 */
  confidence: number;
  file: string;
  line: number | null;
}

export interface ParsedReview {
  findings: ReviewFinding[];
  overallCorrectness: string;
  overallConfidence: number;
}

export interface FixResult {
  issueNumber: number;
  issueTitle: string;
  success: boolean;
  status: FixState;
  branchName: string;
  diff: string;
  review: ParsedReview | null;
  prUrl: string;
  error: string;
  output: string;
}

export function createFixResult(issueNumber: number, issueTitle: string): FixResult {
  return {
    issueNumber,
    issueTitle,
    success: false,
    status: 'pending',
    branchName: '',
    diff: '',
    review: null,
    prUrl: '',
    error: '',
    output: ''
  };
}
