/**
 * Staking pool ledger.
 *
 * Operates on a governance state draft handed in by GovernanceService. The
 * pool's underlying balance is what the voting token reports for the contract
 * minus the escrowed proposal deposits.
 */

import type { GovernanceState, OutboundMessage } from '../domain/governance/governanceTypes.js';
import { releaseLocks } from '../domain/governance/pollBook.js';
import { quoteBalance, sharesToBurn, sharesToMint } from '../domain/ledger/shareLedger.js';
import { DomainError, ErrorCode, resourceError } from '../errors/taxonomy.js';
import type { TokenQuerier } from '../integrations/token/types.js';

export interface StakeResult {
  share: bigint;
}

export interface WithdrawResult {
  amount: bigint;
  burned: bigint;
  releasedPolls: number[];
  message: OutboundMessage;
}

export const requireVotingToken = (state: GovernanceState): string => {
  const token = state.config?.votingToken;
  if (!token) {
    throw new DomainError(ErrorCode.NotInitialized, 409, 'Voting token is not registered');
  }
  return token;
};

export class StakingService {
  constructor(private readonly token: TokenQuerier) {}

  async poolBalance(state: GovernanceState): Promise<bigint> {
    const held = await this.token.balanceOf(requireVotingToken(state), state.pool.contractAddress);
    if (held < state.pool.totalDeposit) {
      throw new DomainError(
        ErrorCode.PoolUnderfunded,
        500,
        'Contract balance is below the escrowed deposits',
        { held: held.toString(), totalDeposit: state.pool.totalDeposit.toString() },
      );
    }
    return held - state.pool.totalDeposit;
  }

  /**
   * Mint shares for `amount` tokens that already sit in the contract's
   * balance when this runs.
   */
  async stake(state: GovernanceState, staker: string, amount: bigint): Promise<StakeResult> {
    if (amount === 0n) {
      throw resourceError(ErrorCode.InsufficientFunds, 'Insufficient funds sent');
    }

    const balance = await this.poolBalance(state);
    if (balance < amount) {
      throw new DomainError(
        ErrorCode.PoolUnderfunded,
        500,
        'Staked amount has not reached the contract balance',
      );
    }

    const share = sharesToMint(amount, state.pool.totalShare, balance - amount);
    const manager = state.bank[staker] ?? { share: 0n, lockedBalance: [] };
    manager.share += share;
    state.bank[staker] = manager;
    state.pool.totalShare += share;

    return { share };
  }

  async withdraw(state: GovernanceState, staker: string, amount?: bigint): Promise<WithdrawResult> {
    const manager = state.bank[staker];
    if (!manager) {
      throw resourceError(ErrorCode.NothingStaked, 'Nothing staked');
    }

    const poolBalance = await this.poolBalance(state);
    const { totalShare } = state.pool;
    const userBalance = quoteBalance(manager.share, totalShare, poolBalance);
    const withdrawAmount = amount ?? userBalance;

    if (withdrawAmount > userBalance) {
      throw resourceError(ErrorCode.ExceedsBalance, 'User is trying to withdraw too many tokens.');
    }

    const burned = amount === undefined
      ? manager.share
      : sharesToBurn(amount, totalShare, poolBalance);

    const releasedPolls = releaseLocks(state, staker);
    manager.share -= burned;
    state.pool.totalShare -= burned;

    return {
      amount: withdrawAmount,
      burned,
      releasedPolls,
      message: {
        kind: 'token_transfer',
        token: requireVotingToken(state),
        recipient: staker,
        amount: withdrawAmount,
      },
    };
  }

  async quotedBalance(state: GovernanceState, staker: string): Promise<bigint> {
    const manager = state.bank[staker];
    if (!manager || state.pool.totalShare === 0n) return 0n;
    return quoteBalance(manager.share, state.pool.totalShare, await this.poolBalance(state));
  }
}
