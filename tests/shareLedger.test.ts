import { describe, expect, it } from 'vitest';
import { quoteBalance, sharesToBurn, sharesToMint } from '../src/domain/ledger/shareLedger.js';

describe('share ledger math', () => {
  it('mints 1:1 into an empty pool', () => {
    expect(sharesToMint(100n, 0n, 0n)).toBe(100n);
    expect(sharesToMint(100n, 50n, 0n)).toBe(100n);
  });

  it('prices new shares against the pre-deposit balance', () => {
    // 100 shares backed by 200 tokens: each share is worth 2.
    expect(sharesToMint(100n, 100n, 200n)).toBe(50n);
    expect(sharesToMint(3n, 100n, 200n)).toBe(1n);
  });

  it('quotes a floored token balance', () => {
    expect(quoteBalance(11n, 11n, 22n)).toBe(22n);
    expect(quoteBalance(1n, 3n, 10n)).toBe(3n);
    expect(quoteBalance(5n, 0n, 100n)).toBe(0n);
  });

  it('burns floored shares for a token amount', () => {
    expect(sharesToBurn(11n, 11n, 22n)).toBe(5n);
    expect(sharesToBurn(22n, 11n, 22n)).toBe(11n);
    expect(sharesToBurn(10n, 11n, 0n)).toBe(0n);
  });
});
