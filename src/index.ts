import { buildApp } from './app.js';
import { config } from './config.js';

async function main(): Promise<void> {
  const { app, governance, stateStore, logger } = await buildApp(config);

  const shutdown = async (signal: string): Promise<void> => {
    await logger.log('info', 'shutdown.start', { signal });
    await app.close();
    await stateStore.flush();
    await logger.log('info', 'shutdown.complete', { signal });
    await logger.flush();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  await app.listen({ port: config.app.port, host: '0.0.0.0' });

  const { pollCount, totalShare } = governance.getState();
  await logger.log('info', 'server.started', {
    port: config.app.port,
    env: config.app.env,
    contractAddress: config.governance.contractAddress,
    votingToken: config.governance.votingToken,
    pollCount,
    totalShare,
  });
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
