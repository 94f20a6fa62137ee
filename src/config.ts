import dotenv from 'dotenv';
import path from 'node:path';

dotenv.config();

const parseNumber = (input: string | undefined, fallback: number): number => {
  if (input === undefined) return fallback;
  const n = Number(input);
  return Number.isFinite(n) ? n : fallback;
};

export const config = {
  app: {
    name: 'staked-governance-api',
    env: process.env.NODE_ENV ?? 'development',
    port: parseNumber(process.env.PORT, 8787),
  },
  paths: {
    dataDir: process.env.DATA_DIR ?? path.resolve(process.cwd(), 'data'),
    stateFile: process.env.STATE_FILE ?? path.resolve(process.cwd(), 'data', 'state.json'),
    logFile: process.env.LOG_FILE ?? path.resolve(process.cwd(), 'data', 'events.ndjson'),
  },
  governance: {
    contractAddress: process.env.GOV_CONTRACT_ADDRESS ?? 'gov_contract',
    votingToken: process.env.GOV_VOTING_TOKEN ?? 'voting_token',
    owner: process.env.GOV_OWNER ?? 'owner',
    // Ratios and token amounts stay strings here; they are validated when the
    // governance state is instantiated.
    quorum: process.env.GOV_QUORUM ?? '0.3',
    threshold: process.env.GOV_THRESHOLD ?? '0.5',
    votingPeriod: parseNumber(process.env.GOV_VOTING_PERIOD, 10000),
    timelockPeriod: parseNumber(process.env.GOV_TIMELOCK_PERIOD, 10000),
    expirationPeriod: parseNumber(process.env.GOV_EXPIRATION_PERIOD, 20000),
    proposalDeposit: process.env.GOV_PROPOSAL_DEPOSIT ?? '10000000000',
    snapshotPeriod: parseNumber(process.env.GOV_SNAPSHOT_PERIOD, 10),
  },
};

export type AppConfig = typeof config;
