import type { ExecuteData, OrderBy, PollStatus, VoteOption } from './governanceTypes.js';

export interface InstantiateMsg {
  quorum: bigint;
  threshold: bigint;
  votingPeriod: number;
  timelockPeriod: number;
  expirationPeriod: number;
  proposalDeposit: bigint;
  snapshotPeriod: number;
}

export interface CreatePollHook {
  type: 'create_poll';
  title: string;
  description: string;
  link?: string;
  executeMsgs?: ExecuteData[];
}

/** Sub-message carried by a deposit notification from the voting token. */
export type ReceiveHook = { type: 'stake_voting_tokens' } | CreatePollHook;

export interface UpdateConfigMsg {
  type: 'update_config';
  owner?: string;
  quorum?: bigint;
  threshold?: bigint;
  votingPeriod?: number;
  timelockPeriod?: number;
  expirationPeriod?: number;
  proposalDeposit?: bigint;
  snapshotPeriod?: number;
}

export type ExecuteMsg =
  | { type: 'receive'; sender: string; amount: bigint; msg: ReceiveHook }
  | { type: 'register_contracts'; votingToken: string }
  | UpdateConfigMsg
  | { type: 'cast_vote'; pollId: number; vote: VoteOption; amount: bigint }
  | { type: 'withdraw_voting_tokens'; amount?: bigint }
  | { type: 'snapshot_poll'; pollId: number }
  | { type: 'end_poll'; pollId: number }
  | { type: 'execute_poll'; pollId: number }
  | { type: 'expire_poll'; pollId: number };

export interface PollsQuery {
  filter?: PollStatus;
  startAfter?: number;
  limit?: number;
  orderBy?: OrderBy;
}

export interface VotersQuery {
  pollId: number;
  startAfter?: string;
  limit?: number;
  orderBy?: OrderBy;
}
