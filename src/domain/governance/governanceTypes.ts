/**
 * Governance state types.
 *
 * Stakers deposit the voting token into a shared pool and receive shares.
 * Polls are raised by depositing tokens, voted on with staked weight and,
 * once passed, execute an ordered batch of delegated operations.
 *
 * Token amounts are bigint; ratios are 18-digit fixed-point bigint atomics
 * (see domain/math/decimal.ts).
 */

export type PollStatus = 'in_progress' | 'passed' | 'rejected' | 'executed' | 'expired';

export type VoteOption = 'yes' | 'no';

export type OrderBy = 'asc' | 'desc';

/** One delegated operation scheduled by a poll. The payload is opaque base64. */
export interface ExecuteData {
  order: number;
  target: string;
  payload: string;
}

export interface GovConfig {
  owner: string;
  votingToken: string | null;
  quorum: bigint;
  threshold: bigint;
  votingPeriod: number;
  timelockPeriod: number;
  expirationPeriod: number;
  proposalDeposit: bigint;
  snapshotPeriod: number;
}

export interface PoolState {
  contractAddress: string;
  pollCount: number;
  totalShare: bigint;
  totalDeposit: bigint;
}

export interface Poll {
  id: number;
  creator: string;
  status: PollStatus;
  yesVotes: bigint;
  noVotes: bigint;
  endHeight: number;
  title: string;
  description: string;
  link?: string;
  executeData?: ExecuteData[];
  depositAmount: bigint;
  /** Denominator frozen by SnapshotPoll. */
  stakedAmount?: bigint;
  /** Denominator actually used by EndPoll. */
  totalBalanceAtEndPoll?: bigint;
}

export interface VoterInfo {
  vote: VoteOption;
  balance: bigint;
}

export interface TokenManager {
  share: bigint;
  /** Non-owning (pollId, VoterInfo) cross-references, oldest first. */
  lockedBalance: Array<[number, VoterInfo]>;
}

export interface GovernanceState {
  config: GovConfig | null;
  pool: PoolState;
  polls: Record<string, Poll>;
  /** pollId → voter address → VoterInfo */
  pollVoters: Record<string, Record<string, VoterInfo>>;
  /** staker address → TokenManager */
  bank: Record<string, TokenManager>;
}

/** Explicit invocation context; height is supplied by the caller, never read from a clock. */
export interface Env {
  sender: string;
  height: number;
}

export interface Attribute {
  key: string;
  value: string;
}

export type OutboundMessage =
  | { kind: 'token_transfer'; token: string; recipient: string; amount: bigint }
  | { kind: 'delegated_call'; target: string; payload: string };

export interface HandleResponse {
  messages: OutboundMessage[];
  attributes: Attribute[];
}
