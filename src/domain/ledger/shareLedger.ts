/**
 * Share accounting for the staking pool.
 *
 * Stakers hold shares, not tokens. The token value of a share floats with the
 * pool balance: rewards paid into the contract raise it, nothing but
 * withdrawals lowers it. All conversions floor.
 */

import { mulDivFloor } from '../math/decimal.js';

/**
 * Shares minted for a deposit of `amount`, priced against the pool balance
 * as it stood before the deposit arrived.
 */
export function sharesToMint(amount: bigint, totalShare: bigint, preDepositBalance: bigint): bigint {
  if (totalShare === 0n || preDepositBalance === 0n) {
    return amount;
  }
  return mulDivFloor(amount, totalShare, preDepositBalance);
}

/** Token value of `share` at the current exchange rate. */
export function quoteBalance(share: bigint, totalShare: bigint, poolBalance: bigint): bigint {
  if (totalShare === 0n) return 0n;
  return mulDivFloor(share, poolBalance, totalShare);
}

/** Shares to burn when `amount` tokens leave the pool. */
export function sharesToBurn(amount: bigint, totalShare: bigint, poolBalance: bigint): bigint {
  if (poolBalance === 0n) return 0n;
  return mulDivFloor(amount, totalShare, poolBalance);
}
