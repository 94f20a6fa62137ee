// Staked governance API: SDK entry point
export { GovernanceClient, GovernanceAPIError } from './client.js';
export type { GovernanceClientOptions } from './client.js';
export type {
  // Requests
  ExecuteMsgInput,
  InstantiateMsgInput,
  ReceiveHookInput,
  CreatePollInput,
  PollsQueryInput,
  VotersQueryInput,

  // Responses
  Attribute,
  OutboundMessage,
  ExecuteResponse,
  ConfigResponse,
  StateResponse,
  PollResponse,
  Voter,
  StakerResponse,
  TokenBalance,
  DelegatedCall,
  HealthResponse,

  // Errors
  APIErrorEnvelope,
} from './types.js';
