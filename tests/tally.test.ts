import { describe, expect, it } from 'vitest';
import { tallyPoll } from '../src/domain/governance/tally.js';
import { parseDecimal } from '../src/domain/math/decimal.js';

const quorum = parseDecimal('0.3') ?? 0n;
const threshold = parseDecimal('0.5') ?? 0n;

describe('tallyPoll', () => {
  it('passes when turnout meets quorum and yes strictly exceeds threshold', () => {
    expect(tallyPoll({ yesVotes: 1000n, noVotes: 0n, denominator: 1000n, quorum, threshold }))
      .toEqual({ passed: true, rejectedReason: '' });
  });

  it('accepts turnout exactly at quorum', () => {
    expect(tallyPoll({ yesVotes: 300n, noVotes: 0n, denominator: 1000n, quorum, threshold }).passed)
      .toBe(true);
  });

  it('rejects on low turnout', () => {
    expect(tallyPoll({ yesVotes: 10n, noVotes: 0n, denominator: 1000n, quorum, threshold }))
      .toEqual({ passed: false, rejectedReason: 'Quorum not reached' });
  });

  it('rejects on a zero denominator or an empty tally', () => {
    expect(tallyPoll({ yesVotes: 10n, noVotes: 0n, denominator: 0n, quorum, threshold }).rejectedReason)
      .toBe('Quorum not reached');
    expect(tallyPoll({ yesVotes: 0n, noVotes: 0n, denominator: 1000n, quorum: 0n, threshold }).rejectedReason)
      .toBe('Quorum not reached');
  });

  it('rejects a tie at the threshold', () => {
    expect(tallyPoll({ yesVotes: 500n, noVotes: 500n, denominator: 1000n, quorum, threshold }))
      .toEqual({ passed: false, rejectedReason: 'Threshold not reached' });
  });
});
