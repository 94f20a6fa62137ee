import { decimalFromRatio } from '../math/decimal.js';

export type RejectedReason = '' | 'Quorum not reached' | 'Threshold not reached';

export interface TallyInput {
  yesVotes: bigint;
  noVotes: bigint;
  /** Staked weight the turnout is measured against. */
  denominator: bigint;
  quorum: bigint;
  threshold: bigint;
}

export interface TallyResult {
  passed: boolean;
  rejectedReason: RejectedReason;
}

/**
 * Resolve a poll. Quorum must be met or exceeded; the yes share must
 * strictly exceed the threshold.
 */
export function tallyPoll(input: TallyInput): TallyResult {
  const tallied = input.yesVotes + input.noVotes;

  if (input.denominator === 0n || tallied === 0n) {
    return { passed: false, rejectedReason: 'Quorum not reached' };
  }

  const turnout = decimalFromRatio(tallied, input.denominator);
  if (turnout < input.quorum) {
    return { passed: false, rejectedReason: 'Quorum not reached' };
  }

  const approval = decimalFromRatio(input.yesVotes, tallied);
  if (approval <= input.threshold) {
    return { passed: false, rejectedReason: 'Threshold not reached' };
  }

  return { passed: true, rejectedReason: '' };
}
