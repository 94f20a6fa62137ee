import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { expect } from 'vitest';
import type { Env } from '../../src/domain/governance/governanceTypes.js';
import type { CreatePollHook, InstantiateMsg, ReceiveHook } from '../../src/domain/governance/messages.js';
import { parseDecimal } from '../../src/domain/math/decimal.js';
import { DomainError } from '../../src/errors/taxonomy.js';
import { EventLogger } from '../../src/infra/logger.js';
import { StateStore } from '../../src/infra/storage/stateStore.js';
import { PaperToken } from '../../src/integrations/token/paperToken.js';
import type { MessageDispatcher } from '../../src/integrations/token/types.js';
import { GovernanceService, type ExecuteResult } from '../../src/services/governanceService.js';

export const CONTRACT = 'gov_contract';
export const TOKEN = 'voting_token';
export const OWNER = 'owner';

export const ratio = (input: string): bigint => {
  const parsed = parseDecimal(input);
  if (parsed === null) throw new Error(`bad ratio in test: ${input}`);
  return parsed;
};

/** quorum 30%, threshold 50%, voting 10, timelock 5, expiration 20, deposit 100, snapshot 3 */
export const defaultInstantiate = (): InstantiateMsg => ({
  quorum: ratio('0.3'),
  threshold: ratio('0.5'),
  votingPeriod: 10,
  timelockPeriod: 5,
  expirationPeriod: 20,
  proposalDeposit: 100n,
  snapshotPeriod: 3,
});

export interface Harness {
  dir: string;
  store: StateStore;
  logger: EventLogger;
  token: PaperToken;
  governance: GovernanceService;
  /** Mint to `from`, move it into the contract and deliver the notification. */
  deposit(from: string, amount: bigint, hook: ReceiveHook, height?: number): Promise<ExecuteResult>;
  stake(from: string, amount: bigint, height?: number): Promise<ExecuteResult>;
  createPoll(creator: string, overrides?: Partial<CreatePollHook>, height?: number, amount?: bigint): Promise<ExecuteResult>;
  env(sender: string, height?: number): Env;
  cleanup(): Promise<void>;
}

export interface HarnessOptions {
  instantiate?: Partial<InstantiateMsg>;
  register?: boolean;
  dispatcher?: MessageDispatcher;
}

export async function createHarness(options: HarnessOptions = {}): Promise<Harness> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'gov-test-'));
  const store = new StateStore(path.join(dir, 'state.json'), CONTRACT);
  await store.init();
  const logger = new EventLogger(path.join(dir, 'events.ndjson'));
  await logger.init();

  const token = new PaperToken(TOKEN);
  const governance = new GovernanceService(store, token, options.dispatcher ?? token, logger);

  await governance.instantiate({ sender: OWNER, height: 0 }, { ...defaultInstantiate(), ...options.instantiate });
  if (options.register ?? true) {
    await governance.execute({ sender: OWNER, height: 0 }, { type: 'register_contracts', votingToken: TOKEN });
  }

  const env = (sender: string, height = 0): Env => ({ sender, height });

  const deposit = async (from: string, amount: bigint, hook: ReceiveHook, height = 0): Promise<ExecuteResult> => {
    token.mint(from, amount);
    return governance.deposit(token, height, from, amount, hook);
  };

  return {
    dir,
    store,
    logger,
    token,
    governance,
    deposit,
    stake: (from, amount, height = 0) => deposit(from, amount, { type: 'stake_voting_tokens' }, height),
    createPoll: (creator, overrides = {}, height = 0, amount = 100n) => deposit(creator, amount, {
      type: 'create_poll',
      title: 'Raise quorum',
      description: 'Raise the quorum to forty percent',
      ...overrides,
    }, height),
    env,
    cleanup: async () => {
      await logger.flush();
      await fs.rm(dir, { recursive: true, force: true });
    },
  };
}

/** Await a rejection and assert it is a DomainError with this code and message. */
export async function expectDomainError(
  promise: Promise<unknown>,
  code: string,
  message: string,
): Promise<DomainError> {
  const error = await promise.then(
    () => null,
    (reason: unknown) => reason,
  );
  expect(error).toBeInstanceOf(DomainError);
  expect(error).toMatchObject({ code });
  expect(error instanceof Error ? error.message : null).toBe(message);
  if (!(error instanceof DomainError)) throw new Error('unreachable');
  return error;
}
