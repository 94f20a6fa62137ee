/**
 * In-process stand-in for the voting token contract.
 *
 * Keeps balances per holder, answers balance queries, settles the transfers
 * the governance contract emits and records delegated calls in an outbox
 * instead of executing them. Used by the paper deployment and by tests.
 */

import type { OutboundMessage } from '../../domain/governance/governanceTypes.js';
import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import { isoNow } from '../../utils/time.js';
import type {
  DelegatedCallRecord,
  MessageDispatcher,
  TokenQuerier,
  TokenTransferer,
} from './types.js';

export class PaperToken implements TokenQuerier, TokenTransferer, MessageDispatcher {
  private readonly balances: Map<string, bigint> = new Map();
  private readonly outbox: DelegatedCallRecord[] = [];

  constructor(readonly address: string) {}

  async balanceOf(token: string, holder: string): Promise<bigint> {
    this.assertToken(token);
    return this.balance(holder);
  }

  balance(holder: string): bigint {
    return this.balances.get(holder) ?? 0n;
  }

  /** Overwrite a holder's balance, e.g. to model rewards paid into the pool. */
  setBalance(holder: string, amount: bigint): void {
    this.balances.set(holder, amount);
  }

  mint(holder: string, amount: bigint): void {
    this.balances.set(holder, this.balance(holder) + amount);
  }

  transfer(from: string, to: string, amount: bigint): void {
    const available = this.balance(from);
    if (available < amount) {
      throw new DomainError(
        ErrorCode.InsufficientFunds,
        422,
        `Insufficient token balance: ${from} holds ${available}, needs ${amount}`,
      );
    }
    this.balances.set(from, available - amount);
    this.balances.set(to, this.balance(to) + amount);
  }

  async dispatch(sender: string, messages: OutboundMessage[]): Promise<void> {
    for (const message of messages) {
      if (message.kind === 'token_transfer') {
        this.assertToken(message.token);
        this.transfer(sender, message.recipient, message.amount);
        continue;
      }

      this.outbox.push({
        sender,
        target: message.target,
        payload: message.payload,
        dispatchedAt: isoNow(),
      });
    }
  }

  listOutbox(limit = 50): DelegatedCallRecord[] {
    return this.outbox.slice(-limit).map((record) => ({ ...record }));
  }

  private assertToken(token: string): void {
    if (token !== this.address) {
      throw new DomainError(
        ErrorCode.InternalError,
        500,
        `Unknown token contract: ${token}`,
      );
    }
  }
}
