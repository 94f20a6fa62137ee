/**
 * Wire shapes for query results. Amounts are decimal strings and ratios are
 * decimal fractions, so every response is plain JSON.
 */

import { formatDecimal } from '../math/decimal.js';
import type {
  ExecuteData,
  GovConfig,
  Poll,
  PollStatus,
  PoolState,
  VoteOption,
  VoterInfo,
} from './governanceTypes.js';

export interface ConfigResponse {
  owner: string;
  votingToken: string | null;
  quorum: string;
  threshold: string;
  votingPeriod: number;
  timelockPeriod: number;
  expirationPeriod: number;
  proposalDeposit: string;
  snapshotPeriod: number;
}

export interface StateResponse {
  pollCount: number;
  totalShare: string;
  totalDeposit: string;
}

export interface PollResponse {
  id: number;
  creator: string;
  status: PollStatus;
  endHeight: number;
  title: string;
  description: string;
  link: string | null;
  depositAmount: string;
  executeData: ExecuteData[] | null;
  yesVotes: string;
  noVotes: string;
  stakedAmount: string | null;
  totalBalanceAtEndPoll: string | null;
}

export interface VoterInfoResponse {
  vote: VoteOption;
  balance: string;
}

export interface StakerResponse {
  balance: string;
  share: string;
  lockedBalance: Array<[number, VoterInfoResponse]>;
}

export interface VotersResponseItem {
  voter: string;
  vote: VoteOption;
  balance: string;
}

export const toConfigResponse = (config: GovConfig): ConfigResponse => ({
  owner: config.owner,
  votingToken: config.votingToken,
  quorum: formatDecimal(config.quorum),
  threshold: formatDecimal(config.threshold),
  votingPeriod: config.votingPeriod,
  timelockPeriod: config.timelockPeriod,
  expirationPeriod: config.expirationPeriod,
  proposalDeposit: config.proposalDeposit.toString(),
  snapshotPeriod: config.snapshotPeriod,
});

export const toStateResponse = (pool: PoolState): StateResponse => ({
  pollCount: pool.pollCount,
  totalShare: pool.totalShare.toString(),
  totalDeposit: pool.totalDeposit.toString(),
});

export const toPollResponse = (poll: Poll): PollResponse => ({
  id: poll.id,
  creator: poll.creator,
  status: poll.status,
  endHeight: poll.endHeight,
  title: poll.title,
  description: poll.description,
  link: poll.link ?? null,
  depositAmount: poll.depositAmount.toString(),
  executeData: poll.executeData ? poll.executeData.map((op) => ({ ...op })) : null,
  yesVotes: poll.yesVotes.toString(),
  noVotes: poll.noVotes.toString(),
  stakedAmount: poll.stakedAmount?.toString() ?? null,
  totalBalanceAtEndPoll: poll.totalBalanceAtEndPoll?.toString() ?? null,
});

export const toVoterInfoResponse = (info: VoterInfo): VoterInfoResponse => ({
  vote: info.vote,
  balance: info.balance.toString(),
});
