import type { OutboundMessage } from '../../domain/governance/governanceTypes.js';

/** Read side of the voting token contract. */
export interface TokenQuerier {
  balanceOf(token: string, holder: string): Promise<bigint>;
}

/**
 * Carries out the messages an invocation returned, after its state change has
 * been committed. `sender` is the governance contract itself.
 */
export interface MessageDispatcher {
  dispatch(sender: string, messages: OutboundMessage[]): Promise<void>;
}

/** Moves voting tokens between holders; used to deliver deposits. */
export interface TokenTransferer {
  readonly address: string;
  transfer(from: string, to: string, amount: bigint): void;
}

export interface DelegatedCallRecord {
  sender: string;
  target: string;
  payload: string;
  dispatchedAt: string;
}
