import Fastify from 'fastify';
import fastifyWebSocket from '@fastify/websocket';
import { registerRoutes } from './api/routes.js';
import { registerWebSocket } from './api/websocket.js';
import type { AppConfig } from './config.js';
import type { InstantiateMsg } from './domain/governance/messages.js';
import { parseDecimal } from './domain/math/decimal.js';
import { invalidConfig } from './errors/taxonomy.js';
import { eventBus } from './infra/eventBus.js';
import { EventLogger } from './infra/logger.js';
import { StateStore } from './infra/storage/stateStore.js';
import { PaperToken } from './integrations/token/paperToken.js';
import { GovernanceService } from './services/governanceService.js';

export interface AppContext {
  app: ReturnType<typeof Fastify>;
  governance: GovernanceService;
  token: PaperToken;
  stateStore: StateStore;
  logger: EventLogger;
}

const parseAmount = (label: string, input: string): bigint => {
  if (!/^\d+$/.test(input)) throw invalidConfig(`${label} must be an unsigned integer`);
  return BigInt(input);
};

const parseRatio = (label: string, input: string): bigint => {
  const parsed = parseDecimal(input);
  if (parsed === null) throw invalidConfig(`${label} must be a decimal`);
  return parsed;
};

export const instantiateMsgFromConfig = (governance: AppConfig['governance']): InstantiateMsg => ({
  quorum: parseRatio('quorum', governance.quorum),
  threshold: parseRatio('threshold', governance.threshold),
  votingPeriod: governance.votingPeriod,
  timelockPeriod: governance.timelockPeriod,
  expirationPeriod: governance.expirationPeriod,
  proposalDeposit: parseAmount('proposalDeposit', governance.proposalDeposit),
  snapshotPeriod: governance.snapshotPeriod,
});

export async function buildApp(config: AppConfig): Promise<AppContext> {
  const app = Fastify({
    logger: false,
  });

  // Register WebSocket plugin first so routes can use { websocket: true }.
  await app.register(fastifyWebSocket);

  const stateStore = new StateStore(config.paths.stateFile, config.governance.contractAddress);
  await stateStore.init();

  const logger = new EventLogger(config.paths.logFile);
  await logger.init();

  eventBus.onListenerError((event, error) => {
    logger.log('error', 'event.listener_failed', {
      event,
      error: error instanceof Error ? error.message : String(error),
    }).catch((logError: unknown) => {
      console.error(logError);
    });
  });

  const token = new PaperToken(config.governance.votingToken);
  const governance = new GovernanceService(stateStore, token, token, logger);

  // A fresh state file is instantiated from the configured parameters and
  // bound to the paper token.
  if (!governance.isInitialized()) {
    const env = { sender: config.governance.owner, height: 0 };
    await governance.instantiate(env, instantiateMsgFromConfig(config.governance));
    await governance.execute(env, { type: 'register_contracts', votingToken: token.address });
  }

  await registerRoutes(app, {
    config,
    governance,
    token,
  });

  // Register WebSocket live event feed endpoint.
  await registerWebSocket(app);

  return {
    app,
    governance,
    token,
    stateStore,
    logger,
  };
}
