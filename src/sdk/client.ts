// ─── GovernanceClient ──────────────────────────────────────────────────────
// Typed HTTP client for the staked governance API. Uses the global fetch of
// Node.js 20 unless another implementation is passed in.
// ────────────────────────────────────────────────────────────────────────────

import type { z } from 'zod';
import {
  configResponseSchema,
  errorEnvelopeSchema,
  executeResponseSchema,
  healthResponseSchema,
  outboxResponseSchema,
  pollResponseSchema,
  pollsResponseSchema,
  stakerResponseSchema,
  stateResponseSchema,
  tokenBalanceSchema,
  votersResponseSchema,
  type ConfigResponse,
  type CreatePollInput,
  type DelegatedCall,
  type ExecuteMsgInput,
  type ExecuteResponse,
  type HealthResponse,
  type InstantiateMsgInput,
  type PollResponse,
  type PollsQueryInput,
  type ReceiveHookInput,
  type StakerResponse,
  type StateResponse,
  type TokenBalance,
  type Voter,
  type VotersQueryInput,
} from './types.js';

export class GovernanceAPIError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'GovernanceAPIError';
  }
}

export interface GovernanceClientOptions {
  /** Base URL of the API server (e.g. "http://localhost:8787"). */
  baseUrl: string;
  /** Optional custom fetch implementation (defaults to globalThis.fetch). */
  fetch?: typeof globalThis.fetch;
}

type Amount = string | number | bigint;

const toQuery = (params: Record<string, string | number | undefined>): string => {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) search.set(key, String(value));
  }
  const qs = search.toString();
  return qs ? `?${qs}` : '';
};

export class GovernanceClient {
  private readonly baseUrl: string;
  private readonly _fetch: typeof globalThis.fetch;

  constructor(baseUrl: string);
  constructor(opts: GovernanceClientOptions);
  constructor(baseUrlOrOpts: string | GovernanceClientOptions) {
    const opts = typeof baseUrlOrOpts === 'string' ? { baseUrl: baseUrlOrOpts } : baseUrlOrOpts;
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this._fetch = opts.fetch ?? globalThis.fetch;
  }

  // ─── Internal helpers ──────────────────────────────────────────────────

  private async request<S extends z.ZodTypeAny>(
    schema: S,
    method: 'GET' | 'POST',
    path: string,
    body?: unknown,
  ): Promise<z.output<S>> {
    const res = await this._fetch(`${this.baseUrl}${path}`, {
      method,
      headers: body === undefined ? {} : { 'content-type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    // Error bodies from proxies may not be JSON; treat those as absent.
    const payload: unknown = await res.json().catch(() => undefined);

    if (!res.ok) {
      const envelope = errorEnvelopeSchema.safeParse(payload);
      if (envelope.success) {
        const { code, message, details } = envelope.data.error;
        throw new GovernanceAPIError(res.status, code, message, details);
      }
      throw new GovernanceAPIError(res.status, `HTTP_${res.status}`, `Request failed: ${method} ${path} → ${res.status}`);
    }

    return schema.parse(payload);
  }

  // ─── Execute ───────────────────────────────────────────────────────────

  async instantiate(sender: string, height: number, msg: InstantiateMsgInput): Promise<ExecuteResponse> {
    return this.request(executeResponseSchema, 'POST', '/instantiate', { sender, height, msg });
  }

  /** Submit an execute message on behalf of `sender` at block `height`. */
  async execute(sender: string, height: number, msg: ExecuteMsgInput): Promise<ExecuteResponse> {
    return this.request(executeResponseSchema, 'POST', '/execute', { sender, height, msg });
  }

  async castVote(
    voter: string,
    height: number,
    pollId: number,
    vote: 'yes' | 'no',
    amount: Amount,
  ): Promise<ExecuteResponse> {
    return this.execute(voter, height, { type: 'cast_vote', pollId, vote, amount: String(amount) });
  }

  async withdraw(staker: string, height: number, amount?: Amount): Promise<ExecuteResponse> {
    return this.execute(staker, height, {
      type: 'withdraw_voting_tokens',
      ...(amount === undefined ? {} : { amount: String(amount) }),
    });
  }

  // ─── Paper token ───────────────────────────────────────────────────────

  async mint(holder: string, amount: Amount): Promise<TokenBalance> {
    return this.request(tokenBalanceSchema, 'POST', '/token/mint', { holder, amount: String(amount) });
  }

  async balanceOf(holder: string): Promise<TokenBalance> {
    return this.request(tokenBalanceSchema, 'GET', `/token/balances/${encodeURIComponent(holder)}`);
  }

  /** Transfer tokens into the contract together with a deposit hook. */
  async send(from: string, amount: Amount, height: number, msg: ReceiveHookInput): Promise<ExecuteResponse> {
    return this.request(executeResponseSchema, 'POST', '/token/send', {
      from,
      amount: String(amount),
      height,
      msg,
    });
  }

  async stake(from: string, amount: Amount, height: number): Promise<ExecuteResponse> {
    return this.send(from, amount, height, { type: 'stake_voting_tokens' });
  }

  async createPoll(creator: string, deposit: Amount, height: number, poll: CreatePollInput): Promise<ExecuteResponse> {
    return this.send(creator, deposit, height, { type: 'create_poll', ...poll });
  }

  async listOutbox(limit?: number): Promise<DelegatedCall[]> {
    const result = await this.request(outboxResponseSchema, 'GET', `/outbox${toQuery({ limit })}`);
    return result.calls;
  }

  // ─── Queries ───────────────────────────────────────────────────────────

  async health(): Promise<HealthResponse> {
    return this.request(healthResponseSchema, 'GET', '/');
  }

  async getConfig(): Promise<ConfigResponse> {
    return this.request(configResponseSchema, 'GET', '/config');
  }

  async getState(): Promise<StateResponse> {
    return this.request(stateResponseSchema, 'GET', '/state');
  }

  async getPoll(pollId: number): Promise<PollResponse> {
    return this.request(pollResponseSchema, 'GET', `/polls/${pollId}`);
  }

  async listPolls(query: PollsQueryInput = {}): Promise<PollResponse[]> {
    const result = await this.request(pollsResponseSchema, 'GET', `/polls${toQuery(query)}`);
    return result.polls;
  }

  async listVoters(pollId: number, query: VotersQueryInput = {}): Promise<Voter[]> {
    const result = await this.request(votersResponseSchema, 'GET', `/polls/${pollId}/voters${toQuery(query)}`);
    return result.voters;
  }

  async getStaker(address: string): Promise<StakerResponse> {
    return this.request(stakerResponseSchema, 'GET', `/stakers/${encodeURIComponent(address)}`);
  }
}
