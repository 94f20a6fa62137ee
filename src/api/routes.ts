import type { FastifyInstance, FastifyReply } from 'fastify';
import type { ZodError } from 'zod';
import type { AppConfig } from '../config.js';
import type { OutboundMessage } from '../domain/governance/governanceTypes.js';
import { DomainError, ErrorCode, toErrorEnvelope } from '../errors/taxonomy.js';
import type { PaperToken } from '../integrations/token/paperToken.js';
import type { ExecuteResult, GovernanceService } from '../services/governanceService.js';
import {
  executeRequestSchema,
  instantiateRequestSchema,
  outboxQuerySchema,
  pollParamsSchema,
  pollsQuerySchema,
  stakerParamsSchema,
  tokenMintSchema,
  tokenSendSchema,
  votersQuerySchema,
} from './schemas.js';

interface RouteDeps {
  config: AppConfig;
  governance: GovernanceService;
  token: PaperToken;
}

type MessageResponse =
  | { kind: 'token_transfer'; token: string; recipient: string; amount: string }
  | { kind: 'delegated_call'; target: string; payload: string };

const toMessageResponse = (message: OutboundMessage): MessageResponse => (
  message.kind === 'token_transfer'
    ? { ...message, amount: message.amount.toString() }
    : { ...message }
);

const toExecuteResponse = (result: ExecuteResult) => ({
  messages: result.messages.map(toMessageResponse),
  attributes: result.attributes,
  dispatched: result.dispatched,
});

const sendInvalid = (reply: FastifyReply, message: string, error: ZodError): FastifyReply => reply
  .code(400)
  .send(toErrorEnvelope(ErrorCode.InvalidPayload, message, error.flatten()));

const sendDomainError = (reply: FastifyReply, error: unknown): void => {
  if (error instanceof DomainError) {
    void reply.code(error.statusCode).send(toErrorEnvelope(error.code, error.message, error.details));
    return;
  }

  void reply.code(500).send(toErrorEnvelope(
    ErrorCode.InternalError,
    'Unexpected internal error',
    { error: String(error) },
  ));
};

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  app.get('/', async () => ({
    name: deps.config.app.name,
    status: 'ok',
    initialized: deps.governance.isInitialized(),
  }));

  // ─── Execute ────────────────────────────────────────────────────────

  app.post('/instantiate', async (request, reply) => {
    const parse = instantiateRequestSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'Invalid request payload.', parse.error);

    try {
      const { sender, height, msg } = parse.data;
      const result = await deps.governance.instantiate({ sender, height }, msg);
      return reply.code(201).send(toExecuteResponse(result));
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/execute', async (request, reply) => {
    const parse = executeRequestSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'Invalid request payload.', parse.error);

    try {
      const { sender, height, msg } = parse.data;
      const result = await deps.governance.execute({ sender, height }, msg);
      return toExecuteResponse(result);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  // ─── Paper token ────────────────────────────────────────────────────

  app.post('/token/mint', async (request, reply) => {
    const parse = tokenMintSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'Invalid request payload.', parse.error);

    deps.token.mint(parse.data.holder, parse.data.amount);
    return {
      holder: parse.data.holder,
      balance: deps.token.balance(parse.data.holder).toString(),
    };
  });

  app.get('/token/balances/:address', async (request, reply) => {
    const parse = stakerParamsSchema.safeParse(request.params);
    if (!parse.success) return sendInvalid(reply, 'Invalid path params.', parse.error);

    return {
      holder: parse.data.address,
      balance: deps.token.balance(parse.data.address).toString(),
    };
  });

  // Transfers into the contract and delivers the deposit notification as one
  // transaction; a rejected notification leaves balances unchanged.
  app.post('/token/send', async (request, reply) => {
    const parse = tokenSendSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'Invalid request payload.', parse.error);

    try {
      const { from, amount, height, msg } = parse.data;
      const result = await deps.governance.deposit(deps.token, height, from, amount, msg);
      return toExecuteResponse(result);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/outbox', async (request, reply) => {
    const parse = outboxQuerySchema.safeParse(request.query);
    if (!parse.success) return sendInvalid(reply, 'Invalid query params.', parse.error);

    return { calls: deps.token.listOutbox(parse.data.limit) };
  });

  // ─── Queries ────────────────────────────────────────────────────────

  app.get('/config', async (_request, reply) => {
    try {
      return deps.governance.getConfig();
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/state', async () => deps.governance.getState());

  app.get('/polls', async (request, reply) => {
    const parse = pollsQuerySchema.safeParse(request.query);
    if (!parse.success) return sendInvalid(reply, 'Invalid query params.', parse.error);

    return { polls: deps.governance.listPolls(parse.data) };
  });

  app.get('/polls/:id', async (request, reply) => {
    const parse = pollParamsSchema.safeParse(request.params);
    if (!parse.success) return sendInvalid(reply, 'Invalid path params.', parse.error);

    try {
      return deps.governance.getPoll(parse.data.id);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/polls/:id/voters', async (request, reply) => {
    const params = pollParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);
    const query = votersQuerySchema.safeParse(request.query);
    if (!query.success) return sendInvalid(reply, 'Invalid query params.', query.error);

    try {
      return { voters: deps.governance.listVoters({ pollId: params.data.id, ...query.data }) };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/stakers/:address', async (request, reply) => {
    const parse = stakerParamsSchema.safeParse(request.params);
    if (!parse.success) return sendInvalid(reply, 'Invalid path params.', parse.error);

    try {
      return await deps.governance.getStaker(parse.data.address);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });
}
