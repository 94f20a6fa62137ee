// ─── SDK Types ─────────────────────────────────────────────────────────────
// Wire types for the staked governance API. Request shapes are the input side
// of the server's own zod schemas; responses are validated on arrival.
// ────────────────────────────────────────────────────────────────────────────

import { z } from 'zod';
import type {
  executeMsgBodySchema,
  instantiateMsgSchema,
  pollsQuerySchema,
  tokenSendSchema,
  votersQuerySchema,
} from '../api/schemas.js';

// ─── Requests ──────────────────────────────────────────────────────────────

export type ExecuteMsgInput = z.input<typeof executeMsgBodySchema>;
export type InstantiateMsgInput = z.input<typeof instantiateMsgSchema>;
export type ReceiveHookInput = z.input<typeof tokenSendSchema>['msg'];
export type CreatePollInput = Omit<Extract<ReceiveHookInput, { type: 'create_poll' }>, 'type'>;
export type PollsQueryInput = z.input<typeof pollsQuerySchema>;
export type VotersQueryInput = z.input<typeof votersQuerySchema>;

// ─── Responses ─────────────────────────────────────────────────────────────

export const attributeSchema = z.object({ key: z.string(), value: z.string() });

export const outboundMessageSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('token_transfer'), token: z.string(), recipient: z.string(), amount: z.string() }),
  z.object({ kind: z.literal('delegated_call'), target: z.string(), payload: z.string() }),
]);

export const executeResponseSchema = z.object({
  messages: z.array(outboundMessageSchema),
  attributes: z.array(attributeSchema),
  dispatched: z.boolean(),
});

export const configResponseSchema = z.object({
  owner: z.string(),
  votingToken: z.string().nullable(),
  quorum: z.string(),
  threshold: z.string(),
  votingPeriod: z.number(),
  timelockPeriod: z.number(),
  expirationPeriod: z.number(),
  proposalDeposit: z.string(),
  snapshotPeriod: z.number(),
});

export const stateResponseSchema = z.object({
  pollCount: z.number(),
  totalShare: z.string(),
  totalDeposit: z.string(),
});

const pollStatusSchema = z.enum(['in_progress', 'passed', 'rejected', 'executed', 'expired']);
const voteSchema = z.enum(['yes', 'no']);

export const pollResponseSchema = z.object({
  id: z.number(),
  creator: z.string(),
  status: pollStatusSchema,
  endHeight: z.number(),
  title: z.string(),
  description: z.string(),
  link: z.string().nullable(),
  depositAmount: z.string(),
  executeData: z.array(z.object({ order: z.number(), target: z.string(), payload: z.string() })).nullable(),
  yesVotes: z.string(),
  noVotes: z.string(),
  stakedAmount: z.string().nullable(),
  totalBalanceAtEndPoll: z.string().nullable(),
});

export const pollsResponseSchema = z.object({ polls: z.array(pollResponseSchema) });

const voterInfoSchema = z.object({ vote: voteSchema, balance: z.string() });

export const votersResponseSchema = z.object({
  voters: z.array(voterInfoSchema.extend({ voter: z.string() })),
});

export const stakerResponseSchema = z.object({
  balance: z.string(),
  share: z.string(),
  lockedBalance: z.array(z.tuple([z.number(), voterInfoSchema])),
});

export const tokenBalanceSchema = z.object({ holder: z.string(), balance: z.string() });

export const outboxResponseSchema = z.object({
  calls: z.array(z.object({
    sender: z.string(),
    target: z.string(),
    payload: z.string(),
    dispatchedAt: z.string(),
  })),
});

export const healthResponseSchema = z.object({
  name: z.string(),
  status: z.string(),
  initialized: z.boolean(),
});

export const errorEnvelopeSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.unknown().optional(),
  }),
});

export type Attribute = z.infer<typeof attributeSchema>;
export type OutboundMessage = z.infer<typeof outboundMessageSchema>;
export type ExecuteResponse = z.infer<typeof executeResponseSchema>;
export type ConfigResponse = z.infer<typeof configResponseSchema>;
export type StateResponse = z.infer<typeof stateResponseSchema>;
export type PollResponse = z.infer<typeof pollResponseSchema>;
export type Voter = z.infer<typeof votersResponseSchema>['voters'][number];
export type StakerResponse = z.infer<typeof stakerResponseSchema>;
export type TokenBalance = z.infer<typeof tokenBalanceSchema>;
export type DelegatedCall = z.infer<typeof outboxResponseSchema>['calls'][number];
export type HealthResponse = z.infer<typeof healthResponseSchema>;
export type APIErrorEnvelope = z.infer<typeof errorEnvelopeSchema>;
