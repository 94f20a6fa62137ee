import { z } from 'zod';
import { parseDecimal } from '../domain/math/decimal.js';

/** Token amounts travel as decimal integer strings. */
export const amountSchema = z
  .union([z.string().regex(/^\d+$/, 'amount must be an unsigned integer string'), z.number().int().nonnegative()])
  .transform((value) => BigInt(value));

/** Ratios travel as decimal strings such as "0.3". */
export const ratioSchema = z.string().transform((value, ctx) => {
  const parsed = parseDecimal(value);
  if (parsed === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a decimal string' });
    return z.NEVER;
  }
  return parsed;
});

const address = z.string().min(1).max(128);
const height = z.number().int().nonnegative();
const period = z.number().int().nonnegative();
const pollId = z.number().int().positive();
const base64 = z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/, 'payload must be base64');

const executeMsgSchema = z.object({
  order: z.number().int().nonnegative(),
  target: address,
  payload: base64,
});

const receiveHookSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('stake_voting_tokens') }),
  z.object({
    type: z.literal('create_poll'),
    title: z.string(),
    description: z.string(),
    link: z.string().optional(),
    executeMsgs: z.array(executeMsgSchema).optional(),
  }),
]);

export const instantiateMsgSchema = z.object({
  quorum: ratioSchema,
  threshold: ratioSchema,
  votingPeriod: period,
  timelockPeriod: period,
  expirationPeriod: period,
  proposalDeposit: amountSchema,
  snapshotPeriod: period,
});

export const executeMsgBodySchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('receive'),
    sender: address,
    amount: amountSchema,
    msg: receiveHookSchema,
  }),
  z.object({ type: z.literal('register_contracts'), votingToken: address }),
  z.object({
    type: z.literal('update_config'),
    owner: address.optional(),
    quorum: ratioSchema.optional(),
    threshold: ratioSchema.optional(),
    votingPeriod: period.optional(),
    timelockPeriod: period.optional(),
    expirationPeriod: period.optional(),
    proposalDeposit: amountSchema.optional(),
    snapshotPeriod: period.optional(),
  }),
  z.object({
    type: z.literal('cast_vote'),
    pollId,
    vote: z.enum(['yes', 'no']),
    amount: amountSchema,
  }),
  z.object({ type: z.literal('withdraw_voting_tokens'), amount: amountSchema.optional() }),
  z.object({ type: z.literal('snapshot_poll'), pollId }),
  z.object({ type: z.literal('end_poll'), pollId }),
  z.object({ type: z.literal('execute_poll'), pollId }),
  z.object({ type: z.literal('expire_poll'), pollId }),
]);

export const executeRequestSchema = z.object({
  sender: address,
  height,
  msg: executeMsgBodySchema,
});

export const instantiateRequestSchema = z.object({
  sender: address,
  height,
  msg: instantiateMsgSchema,
});

/** Paper deposit notification: move tokens into the contract, then notify it. */
export const tokenSendSchema = z.object({
  from: address,
  amount: amountSchema,
  height,
  msg: receiveHookSchema,
});

export const tokenMintSchema = z.object({
  holder: address,
  amount: amountSchema,
});

const limit = z.coerce.number().int().positive();
const orderBy = z.enum(['asc', 'desc']);

export const pollsQuerySchema = z.object({
  filter: z.enum(['in_progress', 'passed', 'rejected', 'executed', 'expired']).optional(),
  startAfter: z.coerce.number().int().nonnegative().optional(),
  limit: limit.optional(),
  orderBy: orderBy.optional(),
});

export const votersQuerySchema = z.object({
  startAfter: z.string().min(1).optional(),
  limit: limit.optional(),
  orderBy: orderBy.optional(),
});

export const pollParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const stakerParamsSchema = z.object({
  address,
});

export const outboxQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
});
