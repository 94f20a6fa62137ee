import type { GovernanceState } from '../../domain/governance/governanceTypes.js';

export const createDefaultState = (contractAddress: string): GovernanceState => ({
  config: null,
  pool: {
    contractAddress,
    pollCount: 0,
    totalShare: 0n,
    totalDeposit: 0n,
  },
  polls: {},
  pollVoters: {},
  bank: {},
});
