import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { type AppContext, buildApp } from '../src/app.js';
import { type AppConfig, config as baseConfig } from '../src/config.js';
import { eventBus } from '../src/infra/eventBus.js';

const makeTestConfig = (dir: string): AppConfig => ({
  ...baseConfig,
  app: { ...baseConfig.app, env: 'test', port: 0 },
  paths: {
    dataDir: dir,
    stateFile: path.join(dir, 'state.json'),
    logFile: path.join(dir, 'events.ndjson'),
  },
  governance: {
    ...baseConfig.governance,
    contractAddress: 'gov_contract',
    votingToken: 'voting_token',
    owner: 'owner',
    quorum: '0.3',
    threshold: '0.5',
    votingPeriod: 10,
    timelockPeriod: 5,
    expirationPeriod: 20,
    proposalDeposit: '100',
    snapshotPeriod: 3,
  },
});

let ctx: AppContext;
let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'gov-routes-'));
  ctx = await buildApp(makeTestConfig(dir));
});

afterEach(async () => {
  eventBus.clear();
  await ctx.app.close();
  await ctx.stateStore.flush();
  await ctx.logger.flush();
  await fs.rm(dir, { recursive: true, force: true });
});

const post = (url: string, payload: unknown) => ctx.app.inject({ method: 'POST', url, payload });
const get = (url: string) => ctx.app.inject({ method: 'GET', url });

const mintAndSend = async (from: string, amount: string, msg: unknown, height = 0) => {
  await post('/token/mint', { holder: from, amount });
  return post('/token/send', { from, amount, height, msg });
};

describe('bootstrap', () => {
  it('instantiates a fresh state from config', async () => {
    const res = await get('/config');
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      owner: 'owner',
      votingToken: 'voting_token',
      quorum: '0.3',
      threshold: '0.5',
      votingPeriod: 10,
      timelockPeriod: 5,
      expirationPeriod: 20,
      proposalDeposit: '100',
      snapshotPeriod: 3,
    });

    expect((await get('/')).json()).toEqual({ name: 'staked-governance-api', status: 'ok', initialized: true });
  });

  it('keeps an existing state on restart', async () => {
    await mintAndSend('alice', '250', { type: 'stake_voting_tokens' });
    await ctx.app.close();
    await ctx.stateStore.flush();

    ctx = await buildApp(makeTestConfig(dir));
    expect((await get('/state')).json()).toEqual({ pollCount: 0, totalShare: '250', totalDeposit: '0' });
  });
});

describe('governance over HTTP', () => {
  it('runs a poll from deposit to refund', async () => {
    const staked = await mintAndSend('alice', '1000', { type: 'stake_voting_tokens' });
    expect(staked.statusCode).toBe(200);
    expect(staked.json()).toEqual({
      messages: [],
      attributes: [
        { key: 'action', value: 'staking' },
        { key: 'sender', value: 'alice' },
        { key: 'share', value: '1000' },
        { key: 'amount', value: '1000' },
      ],
      dispatched: true,
    });

    const created = await mintAndSend('carol', '100', {
      type: 'create_poll',
      title: 'Fund the audit',
      description: 'Pay for an external audit',
      executeMsgs: [{ order: 1, target: 'treasury', payload: 'cGF5' }],
    });
    expect(created.json().attributes).toContainEqual({ key: 'poll_id', value: '1' });

    const voted = await post('/execute', {
      sender: 'alice',
      height: 2,
      msg: { type: 'cast_vote', pollId: 1, vote: 'yes', amount: '1000' },
    });
    expect(voted.statusCode).toBe(200);

    const voters = await get('/polls/1/voters');
    expect(voters.json()).toEqual({ voters: [{ voter: 'alice', vote: 'yes', balance: '1000' }] });

    const ended = await post('/execute', { sender: 'anyone', height: 11, msg: { type: 'end_poll', pollId: 1 } });
    expect(ended.json().messages).toEqual([
      { kind: 'token_transfer', token: 'voting_token', recipient: 'carol', amount: '100' },
    ]);
    expect((await get('/token/balances/carol')).json()).toEqual({ holder: 'carol', balance: '100' });

    const executed = await post('/execute', { sender: 'anyone', height: 15, msg: { type: 'execute_poll', pollId: 1 } });
    expect(executed.json().messages).toEqual([{ kind: 'delegated_call', target: 'treasury', payload: 'cGF5' }]);

    const outbox = await get('/outbox');
    expect(outbox.json().calls).toHaveLength(1);
    expect(outbox.json().calls[0]).toMatchObject({ sender: 'gov_contract', target: 'treasury', payload: 'cGF5' });

    const poll = await get('/polls/1');
    expect(poll.json()).toMatchObject({ id: 1, status: 'executed', totalBalanceAtEndPoll: '1000' });

    const listed = await get('/polls?filter=executed&orderBy=asc');
    expect(listed.json().polls.map((p: { id: number }) => p.id)).toEqual([1]);

    const staker = await get('/stakers/alice');
    expect(staker.json()).toEqual({ balance: '1000', share: '1000', lockedBalance: [] });
  });

  it('sends tokens back when the notification is rejected', async () => {
    const res = await mintAndSend('carol', '100', {
      type: 'create_poll',
      title: 'abc',
      description: 'Pay for an external audit',
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: { code: 'invalid_field', message: 'Title too short' } });
    expect((await get('/token/balances/carol')).json().balance).toBe('100');
    expect((await get('/token/balances/gov_contract')).json().balance).toBe('0');
  });

  it('prices deposits that arrive while another transaction runs', async () => {
    await mintAndSend('alice', '100', { type: 'stake_voting_tokens' });
    // Rewards double the pool: one share is now worth two tokens.
    ctx.token.setBalance('gov_contract', 200n);
    await post('/token/mint', { holder: 'bob', amount: '100' });
    await post('/token/mint', { holder: 'carl', amount: '100' });

    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const held = ctx.stateStore.transaction(() => gate);

    const sends = Promise.all(['bob', 'carl'].map((from) => post('/token/send', {
      from,
      amount: '100',
      height: 1,
      msg: { type: 'stake_voting_tokens' },
    })));
    await new Promise((resolve) => setTimeout(resolve, 20));
    release();
    await held;
    const results = await sends;

    expect(results.map((res) => res.statusCode)).toEqual([200, 200]);
    expect((await get('/stakers/bob')).json()).toMatchObject({ share: '50', balance: '100' });
    expect((await get('/stakers/carl')).json()).toMatchObject({ share: '50', balance: '100' });
    expect((await get('/state')).json()).toEqual({ pollCount: 0, totalShare: '200', totalDeposit: '0' });
  });

  it('keeps a committed deposit when logging it fails', async () => {
    vi.spyOn(ctx.logger, 'log').mockRejectedValueOnce(new Error('disk full'));
    vi.spyOn(console, 'error').mockImplementation(() => {});

    const res = await mintAndSend('alice', '100', { type: 'stake_voting_tokens' });

    expect(res.statusCode).toBe(200);
    expect((await get('/token/balances/alice')).json().balance).toBe('0');
    expect((await get('/token/balances/gov_contract')).json().balance).toBe('100');
    expect((await get('/stakers/alice')).json()).toEqual({ balance: '100', share: '100', lockedBalance: [] });
  });

  it('refuses to send more than the holder has', async () => {
    const res = await post('/token/send', { from: 'alice', amount: '5', height: 0, msg: { type: 'stake_voting_tokens' } });
    expect(res.statusCode).toBe(422);
    expect(res.json().error.code).toBe('insufficient_funds');
  });
});

describe('error mapping', () => {
  it('reports payload validation failures', async () => {
    const res = await post('/execute', { sender: 'alice', height: -1, msg: { type: 'end_poll' } });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('invalid_payload');
    expect(res.json().error.message).toBe('Invalid request payload.');
  });

  it('rejects malformed amounts and payloads', async () => {
    const amount = await post('/token/mint', { holder: 'alice', amount: '-5' });
    expect(amount.statusCode).toBe(400);

    const payload = await post('/execute', {
      sender: 'owner',
      height: 0,
      msg: { type: 'update_config', quorum: 'lots' },
    });
    expect(payload.statusCode).toBe(400);
  });

  it('maps domain errors to their status codes', async () => {
    const missing = await get('/polls/4');
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ error: { code: 'poll_not_found', message: 'Poll does not exist' } });

    const forbidden = await post('/execute', {
      sender: 'mallory',
      height: 0,
      msg: { type: 'update_config', quorum: '0.1' },
    });
    expect(forbidden.statusCode).toBe(401);

    const guard = await post('/execute', { sender: 'anyone', height: 0, msg: { type: 'expire_poll', pollId: 9 } });
    expect(guard.statusCode).toBe(404);

    const twice = await post('/instantiate', {
      sender: 'owner',
      height: 0,
      msg: {
        quorum: '0.3',
        threshold: '0.5',
        votingPeriod: 1,
        timelockPeriod: 1,
        expirationPeriod: 1,
        proposalDeposit: '1',
        snapshotPeriod: 1,
      },
    });
    expect(twice.statusCode).toBe(409);
    expect(twice.json().error.code).toBe('already_initialized');
  });

  it('reports an over-withdrawal as a resource error', async () => {
    await mintAndSend('alice', '10', { type: 'stake_voting_tokens' });
    const res = await post('/execute', {
      sender: 'alice',
      height: 1,
      msg: { type: 'withdraw_voting_tokens', amount: '11' },
    });
    expect(res.statusCode).toBe(422);
    expect(res.json().error.message).toBe('User is trying to withdraw too many tokens.');
  });
});
