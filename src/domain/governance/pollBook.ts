/**
 * Poll records and per-voter lock bookkeeping on a governance state draft.
 *
 * Voter records are never removed when a poll resolves. They disappear from
 * staker views as soon as the poll leaves in_progress and are physically
 * deleted the next time that staker withdraws.
 */

import { pollNotFound } from '../../errors/taxonomy.js';
import type {
  ExecuteData,
  GovernanceState,
  OrderBy,
  Poll,
  PollStatus,
  VoterInfo,
} from './governanceTypes.js';

export const DEFAULT_PAGE_LIMIT = 10;
export const MAX_PAGE_LIMIT = 30;

export interface NewPoll {
  creator: string;
  depositAmount: bigint;
  endHeight: number;
  title: string;
  description: string;
  link?: string;
  executeData?: ExecuteData[];
}

export interface PollPage {
  filter?: PollStatus;
  startAfter?: number;
  limit?: number;
  orderBy?: OrderBy;
}

export interface VoterPage {
  startAfter?: string;
  limit?: number;
  orderBy?: OrderBy;
}

const pageLimit = (limit: number | undefined): number => (
  Math.min(limit ?? DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT)
);

const compareAddresses = (a: string, b: string): number => {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};

/** Array.prototype.sort is stable, so equal orders keep insertion order. */
export function sortExecuteData(ops: ExecuteData[]): ExecuteData[] {
  return [...ops].sort((a, b) => a.order - b.order);
}

export function findPoll(state: GovernanceState, pollId: number): Poll | undefined {
  return state.polls[String(pollId)];
}

export function requirePoll(state: GovernanceState, pollId: number): Poll {
  const poll = findPoll(state, pollId);
  if (!poll) throw pollNotFound();
  return poll;
}

export function openPoll(state: GovernanceState, input: NewPoll): Poll {
  const id = state.pool.pollCount + 1;
  const poll: Poll = {
    id,
    creator: input.creator,
    status: 'in_progress',
    yesVotes: 0n,
    noVotes: 0n,
    endHeight: input.endHeight,
    title: input.title,
    description: input.description,
    depositAmount: input.depositAmount,
  };
  if (input.link !== undefined) poll.link = input.link;
  if (input.executeData !== undefined) poll.executeData = sortExecuteData(input.executeData);

  state.polls[String(id)] = poll;
  state.pollVoters[String(id)] = {};
  state.pool.pollCount = id;
  state.pool.totalDeposit += input.depositAmount;
  return poll;
}

export function findVote(state: GovernanceState, pollId: number, voter: string): VoterInfo | undefined {
  return state.pollVoters[String(pollId)]?.[voter];
}

/**
 * Tally a vote and store it twice: the owning record under the poll and the
 * cross-reference in the voter's token manager.
 */
export function recordVote(state: GovernanceState, poll: Poll, voter: string, info: VoterInfo): void {
  if (info.vote === 'yes') {
    poll.yesVotes += info.balance;
  } else {
    poll.noVotes += info.balance;
  }

  const key = String(poll.id);
  const voters = state.pollVoters[key] ?? {};
  voters[voter] = { ...info };
  state.pollVoters[key] = voters;

  const manager = state.bank[voter] ?? { share: 0n, lockedBalance: [] };
  manager.lockedBalance.push([poll.id, { ...info }]);
  state.bank[voter] = manager;
}

const isLive = (state: GovernanceState, pollId: number): boolean => (
  findPoll(state, pollId)?.status === 'in_progress'
);

/** Locks of `staker` on polls still in progress. */
export function activeLocks(state: GovernanceState, staker: string): Array<[number, VoterInfo]> {
  const manager = state.bank[staker];
  if (!manager) return [];
  return manager.lockedBalance.filter(([pollId]) => isLive(state, pollId));
}

/**
 * Delete every lock of `staker` whose poll has left in_progress, including
 * the voter record the poll holds. Returns the poll ids released.
 */
export function releaseLocks(state: GovernanceState, staker: string): number[] {
  const manager = state.bank[staker];
  if (!manager) return [];

  const released: number[] = [];
  manager.lockedBalance = manager.lockedBalance.filter(([pollId]) => {
    if (isLive(state, pollId)) return true;
    const voters = state.pollVoters[String(pollId)];
    if (voters) delete voters[staker];
    released.push(pollId);
    return false;
  });
  return released;
}

export function listPolls(state: GovernanceState, page: PollPage = {}): Poll[] {
  const orderBy = page.orderBy ?? 'desc';
  const { startAfter, filter } = page;

  return Object.values(state.polls)
    .filter((poll) => filter === undefined || poll.status === filter)
    .filter((poll) => {
      if (startAfter === undefined) return true;
      return orderBy === 'asc' ? poll.id > startAfter : poll.id < startAfter;
    })
    .sort((a, b) => (orderBy === 'asc' ? a.id - b.id : b.id - a.id))
    .slice(0, pageLimit(page.limit));
}

export function listVoters(
  state: GovernanceState,
  pollId: number,
  page: VoterPage = {},
): Array<[string, VoterInfo]> {
  const poll = requirePoll(state, pollId);
  if (poll.status !== 'in_progress') return [];

  const orderBy = page.orderBy ?? 'desc';
  const { startAfter } = page;

  return Object.entries(state.pollVoters[String(pollId)] ?? {})
    .filter(([voter]) => {
      if (startAfter === undefined) return true;
      const cmp = compareAddresses(voter, startAfter);
      return orderBy === 'asc' ? cmp > 0 : cmp < 0;
    })
    .sort(([a], [b]) => (orderBy === 'asc' ? compareAddresses(a, b) : compareAddresses(b, a)))
    .slice(0, pageLimit(page.limit));
}
