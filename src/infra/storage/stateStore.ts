import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { GovernanceState } from '../../domain/governance/governanceTypes.js';
import { toJson } from '../../utils/json.js';
import { createDefaultState } from './defaultState.js';

// Bigints are stored as decimal strings.
const uint = z
  .string()
  .regex(/^\d+$/)
  .transform((value) => BigInt(value));

const voterInfoSchema = z.object({
  vote: z.enum(['yes', 'no']),
  balance: uint,
});

const pollSchema = z.object({
  id: z.number().int().positive(),
  creator: z.string(),
  status: z.enum(['in_progress', 'passed', 'rejected', 'executed', 'expired']),
  yesVotes: uint,
  noVotes: uint,
  endHeight: z.number().int().nonnegative(),
  title: z.string(),
  description: z.string(),
  link: z.string().optional(),
  executeData: z.array(z.object({
    order: z.number().int().nonnegative(),
    target: z.string(),
    payload: z.string(),
  })).optional(),
  depositAmount: uint,
  stakedAmount: uint.optional(),
  totalBalanceAtEndPoll: uint.optional(),
});

const stateFileSchema = z.object({
  config: z.object({
    owner: z.string(),
    votingToken: z.string().nullable().default(null),
    quorum: uint,
    threshold: uint,
    votingPeriod: z.number().int().nonnegative(),
    timelockPeriod: z.number().int().nonnegative(),
    expirationPeriod: z.number().int().nonnegative(),
    proposalDeposit: uint,
    snapshotPeriod: z.number().int().nonnegative(),
  }).nullable().default(null),
  pool: z.object({
    contractAddress: z.string(),
    pollCount: z.number().int().nonnegative(),
    totalShare: uint,
    totalDeposit: uint,
  }),
  polls: z.record(z.string(), pollSchema).default({}),
  pollVoters: z.record(z.string(), z.record(z.string(), voterInfoSchema)).default({}),
  bank: z.record(z.string(), z.object({
    share: uint,
    lockedBalance: z.array(z.tuple([z.number().int().positive(), voterInfoSchema])).default([]),
  })).default({}),
});

const normalizeState = (raw: unknown): GovernanceState => stateFileSchema.parse(raw);

const isMissingFile = (error: unknown): boolean => (
  error instanceof Error && 'code' in error && error.code === 'ENOENT'
);

/**
 * Holds the governance state in memory and persists it as JSON.
 *
 * Transactions are serialized and run against a draft copy; the draft is
 * written to disk and then replaces the live state. A transaction that throws
 * leaves both untouched.
 */
export class StateStore {
  private state: GovernanceState;
  private lock: Promise<void> = Promise.resolve();

  constructor(
    private readonly stateFilePath: string,
    private readonly contractAddress: string,
  ) {
    this.state = createDefaultState(contractAddress);
  }

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.stateFilePath), { recursive: true });

    let raw: string;
    try {
      raw = await fs.readFile(this.stateFilePath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      this.state = createDefaultState(this.contractAddress);
      await this.persist(this.state);
      return;
    }

    this.state = normalizeState(JSON.parse(raw));
  }

  snapshot(): GovernanceState {
    return structuredClone(this.state);
  }

  /**
   * Runs `work` against a draft under the store lock. When `work` or the write
   * fails, `undo` runs before the lock is released, so side effects kept
   * outside the state can be reverted before the next transaction sees them.
   */
  async transaction<T>(work: (draft: GovernanceState) => Promise<T> | T, undo?: () => void): Promise<T> {
    const previous = this.lock;
    let release: () => void = () => {};

    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      const draft = structuredClone(this.state);
      const result = await work(draft);
      await this.persist(draft);
      this.state = draft;
      return result;
    } catch (error) {
      undo?.();
      throw error;
    } finally {
      release();
    }
  }

  async flush(): Promise<void> {
    await this.lock;
    await this.persist(this.state);
  }

  private async persist(state: GovernanceState): Promise<void> {
    await fs.writeFile(this.stateFilePath, toJson(state, 2));
  }
}
