export const ErrorCode = {
  InvalidPayload: 'invalid_payload',
  InvalidField: 'invalid_field',
  InvalidConfig: 'invalid_config',
  Unauthorized: 'unauthorized',
  AlreadyInitialized: 'already_initialized',
  NotInitialized: 'not_initialized',
  InsufficientFunds: 'insufficient_funds',
  InsufficientDeposit: 'insufficient_deposit',
  InsufficientStake: 'insufficient_stake',
  NothingStaked: 'nothing_staked',
  ExceedsBalance: 'exceeds_balance',
  PollNotFound: 'poll_not_found',
  PollNotInProgress: 'poll_not_in_progress',
  PollNotPassed: 'poll_not_passed',
  AlreadyVoted: 'already_voted',
  VotingNotExpired: 'voting_not_expired',
  TimelockNotExpired: 'timelock_not_expired',
  ExpirationNotReached: 'expiration_not_reached',
  SnapshotWindowNotOpen: 'snapshot_window_not_open',
  SnapshotAlreadyTaken: 'snapshot_already_taken',
  PoolUnderfunded: 'pool_underfunded',
  InternalError: 'internal_error',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export class DomainError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
  }
}

export const toErrorEnvelope = (
  code: ErrorCode,
  message: string,
  details?: unknown,
): {
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
  };
} => ({
  error: {
    code,
    message,
    ...(details === undefined ? {} : { details }),
  },
});

// ─── Shorthands for the governance taxonomy ─────────────────────────────

export const pollNotFound = (): DomainError => (
  new DomainError(ErrorCode.PollNotFound, 404, 'Poll does not exist')
);

export const unauthorized = (message = 'Unauthorized'): DomainError => (
  new DomainError(ErrorCode.Unauthorized, 401, message)
);

export const invalidField = (message: string): DomainError => (
  new DomainError(ErrorCode.InvalidField, 400, message)
);

export const invalidConfig = (message: string): DomainError => (
  new DomainError(ErrorCode.InvalidConfig, 400, message)
);

export const guardViolation = (code: ErrorCode, message: string): DomainError => (
  new DomainError(code, 409, message)
);

export const resourceError = (code: ErrorCode, message: string): DomainError => (
  new DomainError(code, 422, message)
);
