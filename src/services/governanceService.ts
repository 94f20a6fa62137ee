/**
 * Staked governance state machine.
 *
 * Every execute message runs inside one StateStore transaction against a
 * draft: either the whole change commits or the store is left untouched.
 * Outbound messages are dispatched only after the commit; a failed dispatch is
 * logged and does not undo the state change.
 */

import type {
  Attribute,
  Env,
  GovConfig,
  GovernanceState,
  HandleResponse,
  OutboundMessage,
} from '../domain/governance/governanceTypes.js';
import type {
  CreatePollHook,
  ExecuteMsg,
  InstantiateMsg,
  PollsQuery,
  ReceiveHook,
  UpdateConfigMsg,
  VotersQuery,
} from '../domain/governance/messages.js';
import {
  activeLocks,
  findVote,
  listPolls,
  listVoters,
  openPoll,
  recordVote,
  requirePoll,
} from '../domain/governance/pollBook.js';
import { validatePollText, validateQuorum, validateThreshold } from '../domain/governance/policy.js';
import {
  toConfigResponse,
  toPollResponse,
  toStateResponse,
  toVoterInfoResponse,
  type ConfigResponse,
  type PollResponse,
  type StakerResponse,
  type StateResponse,
  type VotersResponseItem,
} from '../domain/governance/responses.js';
import { tallyPoll } from '../domain/governance/tally.js';
import {
  DomainError,
  ErrorCode,
  guardViolation,
  resourceError,
  unauthorized,
} from '../errors/taxonomy.js';
import { eventBus, type EventType } from '../infra/eventBus.js';
import type { EventLogger, LogLevel } from '../infra/logger.js';
import type { StateStore } from '../infra/storage/stateStore.js';
import type { MessageDispatcher, TokenQuerier, TokenTransferer } from '../integrations/token/types.js';
import { requireVotingToken, StakingService } from './stakingService.js';

export interface ExecuteResult extends HandleResponse {
  /** False when the post-commit dispatch of `messages` failed. */
  dispatched: boolean;
}

const ACTION_EVENTS: Record<string, EventType> = {
  staking: 'stake.deposited',
  withdraw: 'stake.withdrawn',
  create_poll: 'poll.created',
  cast_vote: 'poll.voted',
  snapshot_poll: 'poll.snapshot',
  end_poll: 'poll.ended',
  execute_poll: 'poll.executed',
  expire_poll: 'poll.expired',
  update_config: 'config.updated',
};

const attr = (key: string, value: string | number | bigint | boolean): Attribute => ({
  key,
  value: String(value),
});

const respond = (attributes: Attribute[], messages: OutboundMessage[] = []): HandleResponse => ({
  messages,
  attributes,
});

export const attributesToRecord = (attributes: Attribute[]): Record<string, string> => (
  Object.fromEntries(attributes.map(({ key, value }) => [key, value]))
);

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const requireConfig = (state: GovernanceState): GovConfig => {
  if (!state.config) {
    throw new DomainError(ErrorCode.NotInitialized, 409, 'Contract is not initialized');
  }
  return state.config;
};

export class GovernanceService {
  private readonly staking: StakingService;

  constructor(
    private readonly store: StateStore,
    token: TokenQuerier,
    private readonly dispatcher: MessageDispatcher,
    private readonly logger: EventLogger,
  ) {
    this.staking = new StakingService(token);
  }

  // ─── Execute ─────────────────────────────────────────────────────────

  async instantiate(env: Env, msg: InstantiateMsg): Promise<ExecuteResult> {
    const response = await this.store.transaction((draft) => {
      if (draft.config) {
        throw guardViolation(ErrorCode.AlreadyInitialized, 'Contract is already initialized');
      }
      validateQuorum(msg.quorum);
      validateThreshold(msg.threshold);

      draft.config = {
        owner: env.sender,
        votingToken: null,
        quorum: msg.quorum,
        threshold: msg.threshold,
        votingPeriod: msg.votingPeriod,
        timelockPeriod: msg.timelockPeriod,
        expirationPeriod: msg.expirationPeriod,
        proposalDeposit: msg.proposalDeposit,
        snapshotPeriod: msg.snapshotPeriod,
      };
      draft.pool.pollCount = 0;
      draft.pool.totalShare = 0n;
      draft.pool.totalDeposit = 0n;

      return respond([attr('action', 'instantiate'), attr('owner', env.sender)]);
    });

    return this.settle(env, response);
  }

  async execute(env: Env, msg: ExecuteMsg): Promise<ExecuteResult> {
    const response = await this.store.transaction((draft) => this.handle(draft, env, msg));
    return this.settle(env, response);
  }

  /**
   * Moves `amount` from `from` into the contract and delivers the deposit
   * notification in the same transaction. A rejected notification or a failed
   * write sends the tokens back before another transaction can price against
   * them.
   */
  async deposit(
    token: TokenTransferer,
    height: number,
    from: string,
    amount: bigint,
    hook: ReceiveHook,
  ): Promise<ExecuteResult> {
    const env: Env = { sender: token.address, height };
    let contract: string | null = null;

    const response = await this.store.transaction(
      (draft) => {
        token.transfer(from, draft.pool.contractAddress, amount);
        contract = draft.pool.contractAddress;
        return this.handle(draft, env, { type: 'receive', sender: from, amount, msg: hook });
      },
      () => {
        if (contract !== null) token.transfer(contract, from, amount);
      },
    );
    return this.settle(env, response);
  }

  private async handle(state: GovernanceState, env: Env, msg: ExecuteMsg): Promise<HandleResponse> {
    switch (msg.type) {
      case 'receive':
        return this.receive(state, env, msg.sender, msg.amount, msg.msg);
      case 'register_contracts':
        return this.registerContracts(state, msg.votingToken);
      case 'update_config':
        return this.updateConfig(state, env, msg);
      case 'cast_vote':
        return this.castVote(state, env, msg.pollId, msg.vote, msg.amount);
      case 'withdraw_voting_tokens':
        return this.withdraw(state, env, msg.amount);
      case 'snapshot_poll':
        return this.snapshotPoll(state, env, msg.pollId);
      case 'end_poll':
        return this.endPoll(state, env, msg.pollId);
      case 'execute_poll':
        return this.executePoll(state, env, msg.pollId);
      case 'expire_poll':
        return this.expirePoll(state, env, msg.pollId);
    }
  }

  private registerContracts(state: GovernanceState, votingToken: string): HandleResponse {
    const config = requireConfig(state);
    if (config.votingToken !== null) {
      throw unauthorized();
    }
    config.votingToken = votingToken;
    return respond([attr('action', 'register_contracts'), attr('voting_token', votingToken)]);
  }

  /** Deposit notification from the voting token on behalf of `depositor`. */
  private async receive(
    state: GovernanceState,
    env: Env,
    depositor: string,
    amount: bigint,
    hook: ReceiveHook,
  ): Promise<HandleResponse> {
    const config = requireConfig(state);
    if (config.votingToken === null || env.sender !== config.votingToken) {
      throw unauthorized();
    }

    if (hook.type === 'stake_voting_tokens') {
      const { share } = await this.staking.stake(state, depositor, amount);
      return respond([
        attr('action', 'staking'),
        attr('sender', depositor),
        attr('share', share),
        attr('amount', amount),
      ]);
    }

    return this.createPoll(state, env, config, depositor, amount, hook);
  }

  private createPoll(
    state: GovernanceState,
    env: Env,
    config: GovConfig,
    creator: string,
    deposit: bigint,
    hook: CreatePollHook,
  ): HandleResponse {
    validatePollText(hook);
    if (deposit < config.proposalDeposit) {
      throw resourceError(
        ErrorCode.InsufficientDeposit,
        `Must deposit more than ${config.proposalDeposit} token`,
      );
    }

    const poll = openPoll(state, {
      creator,
      depositAmount: deposit,
      endHeight: env.height + config.votingPeriod,
      title: hook.title,
      description: hook.description,
      link: hook.link,
      executeData: hook.executeMsgs,
    });

    return respond([
      attr('action', 'create_poll'),
      attr('creator', creator),
      attr('poll_id', poll.id),
      attr('end_height', poll.endHeight),
    ]);
  }

  private async withdraw(state: GovernanceState, env: Env, amount?: bigint): Promise<HandleResponse> {
    requireConfig(state);
    const result = await this.staking.withdraw(state, env.sender, amount);
    return respond(
      [
        attr('action', 'withdraw'),
        attr('recipient', env.sender),
        attr('amount', result.amount),
      ],
      [result.message],
    );
  }

  private async castVote(
    state: GovernanceState,
    env: Env,
    pollId: number,
    vote: 'yes' | 'no',
    amount: bigint,
  ): Promise<HandleResponse> {
    requireConfig(state);
    const poll = requirePoll(state, pollId);
    if (poll.status !== 'in_progress' || env.height > poll.endHeight) {
      throw guardViolation(ErrorCode.PollNotInProgress, 'Poll is not in progress');
    }
    if (findVote(state, pollId, env.sender)) {
      throw guardViolation(ErrorCode.AlreadyVoted, 'User has already voted.');
    }

    const notEnough = (): DomainError => (
      resourceError(ErrorCode.InsufficientStake, 'User does not have enough staked tokens.')
    );
    if (!state.bank[env.sender]) throw notEnough();
    if (amount > await this.staking.quotedBalance(state, env.sender)) throw notEnough();

    recordVote(state, poll, env.sender, { vote, balance: amount });

    return respond([
      attr('action', 'cast_vote'),
      attr('poll_id', pollId),
      attr('amount', amount),
      attr('voter', env.sender),
      attr('vote_option', vote),
    ]);
  }

  private async snapshotPoll(state: GovernanceState, env: Env, pollId: number): Promise<HandleResponse> {
    const config = requireConfig(state);
    const poll = requirePoll(state, pollId);
    if (poll.status !== 'in_progress' || env.height > poll.endHeight) {
      throw guardViolation(ErrorCode.PollNotInProgress, 'Poll is not in progress');
    }
    if (env.height < poll.endHeight - config.snapshotPeriod) {
      throw guardViolation(ErrorCode.SnapshotWindowNotOpen, 'Cannot snapshot at this height');
    }
    if (poll.stakedAmount !== undefined) {
      throw guardViolation(ErrorCode.SnapshotAlreadyTaken, 'Snapshot has already occurred');
    }

    const stakedAmount = await this.staking.poolBalance(state);
    poll.stakedAmount = stakedAmount;

    return respond([
      attr('action', 'snapshot_poll'),
      attr('poll_id', pollId),
      attr('staked_amount', stakedAmount),
    ]);
  }

  private async endPoll(state: GovernanceState, env: Env, pollId: number): Promise<HandleResponse> {
    const config = requireConfig(state);
    const poll = requirePoll(state, pollId);
    if (env.height <= poll.endHeight) {
      throw guardViolation(ErrorCode.VotingNotExpired, 'Voting period has not expired');
    }
    if (poll.status !== 'in_progress') {
      throw guardViolation(ErrorCode.PollNotInProgress, 'Poll is not in progress');
    }

    let denominator: bigint;
    if (poll.stakedAmount !== undefined) {
      denominator = poll.stakedAmount;
    } else if (state.pool.totalShare === 0n) {
      denominator = 0n;
    } else {
      denominator = await this.staking.poolBalance(state);
    }

    const { passed, rejectedReason } = tallyPoll({
      yesVotes: poll.yesVotes,
      noVotes: poll.noVotes,
      denominator,
      quorum: config.quorum,
      threshold: config.threshold,
    });

    poll.totalBalanceAtEndPoll = denominator;
    const messages: OutboundMessage[] = [];

    if (passed) {
      poll.status = 'passed';
      state.pool.totalDeposit -= poll.depositAmount;
      if (poll.depositAmount > 0n) {
        messages.push({
          kind: 'token_transfer',
          token: requireVotingToken(state),
          recipient: poll.creator,
          amount: poll.depositAmount,
        });
      }
    } else {
      poll.status = 'rejected';
    }

    return respond(
      [
        attr('action', 'end_poll'),
        attr('poll_id', pollId),
        attr('rejected_reason', rejectedReason),
        attr('passed', passed),
      ],
      messages,
    );
  }

  private executePoll(state: GovernanceState, env: Env, pollId: number): HandleResponse {
    const config = requireConfig(state);
    const poll = requirePoll(state, pollId);
    if (poll.status !== 'passed') {
      throw guardViolation(ErrorCode.PollNotPassed, 'Poll is not in passed status');
    }
    if (env.height < poll.endHeight + config.timelockPeriod) {
      throw guardViolation(ErrorCode.TimelockNotExpired, 'Timelock period has not expired');
    }

    poll.status = 'executed';
    const messages: OutboundMessage[] = (poll.executeData ?? []).map((op) => ({
      kind: 'delegated_call',
      target: op.target,
      payload: op.payload,
    }));

    return respond([attr('action', 'execute_poll'), attr('poll_id', pollId)], messages);
  }

  private expirePoll(state: GovernanceState, env: Env, pollId: number): HandleResponse {
    const config = requireConfig(state);
    const poll = requirePoll(state, pollId);
    if (poll.status !== 'passed') {
      throw guardViolation(ErrorCode.PollNotPassed, 'Poll is not in passed status');
    }
    if (env.height < poll.endHeight + config.expirationPeriod) {
      throw guardViolation(ErrorCode.ExpirationNotReached, 'Expire height has not been reached');
    }

    poll.status = 'expired';
    return respond([attr('action', 'expire_poll'), attr('poll_id', pollId)]);
  }

  private updateConfig(state: GovernanceState, env: Env, msg: UpdateConfigMsg): HandleResponse {
    const config = requireConfig(state);
    if (env.sender !== config.owner) {
      throw unauthorized();
    }
    if (msg.quorum !== undefined) validateQuorum(msg.quorum);
    if (msg.threshold !== undefined) validateThreshold(msg.threshold);

    if (msg.owner !== undefined) config.owner = msg.owner;
    if (msg.quorum !== undefined) config.quorum = msg.quorum;
    if (msg.threshold !== undefined) config.threshold = msg.threshold;
    if (msg.votingPeriod !== undefined) config.votingPeriod = msg.votingPeriod;
    if (msg.timelockPeriod !== undefined) config.timelockPeriod = msg.timelockPeriod;
    if (msg.expirationPeriod !== undefined) config.expirationPeriod = msg.expirationPeriod;
    if (msg.proposalDeposit !== undefined) config.proposalDeposit = msg.proposalDeposit;
    if (msg.snapshotPeriod !== undefined) config.snapshotPeriod = msg.snapshotPeriod;

    return respond([attr('action', 'update_config')]);
  }

  /**
   * Post-commit work: dispatch, log, publish. Never throws; the state change
   * is already committed when this runs.
   */
  private async settle(env: Env, response: HandleResponse): Promise<ExecuteResult> {
    const fields = attributesToRecord(response.attributes);
    const action = fields.action ?? 'unknown';

    let dispatched = true;
    if (response.messages.length > 0) {
      try {
        await this.dispatcher.dispatch(this.store.snapshot().pool.contractAddress, response.messages);
      } catch (error) {
        dispatched = false;
        await this.report('error', 'gov.dispatch_failed', {
          action,
          messages: response.messages,
          error: errorMessage(error),
        });
      }
    }

    await this.report('info', `gov.${action}`, {
      caller: env.sender,
      height: env.height,
      ...fields,
    });

    const event = ACTION_EVENTS[action];
    if (event) {
      try {
        eventBus.emit(event, { ...fields, height: env.height });
      } catch (error) {
        await this.report('error', 'gov.publish_failed', { action, event, error: errorMessage(error) });
      }
    }

    return { ...response, dispatched };
  }

  private async report(level: LogLevel, event: string, data: Record<string, unknown>): Promise<void> {
    try {
      await this.logger.log(level, event, data);
    } catch (error) {
      console.error(`failed to log ${event}:`, error);
    }
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  isInitialized(): boolean {
    return this.store.snapshot().config !== null;
  }

  getConfig(): ConfigResponse {
    return toConfigResponse(requireConfig(this.store.snapshot()));
  }

  getState(): StateResponse {
    return toStateResponse(this.store.snapshot().pool);
  }

  getPoll(pollId: number): PollResponse {
    return toPollResponse(requirePoll(this.store.snapshot(), pollId));
  }

  listPolls(query: PollsQuery = {}): PollResponse[] {
    return listPolls(this.store.snapshot(), query).map(toPollResponse);
  }

  listVoters(query: VotersQuery): VotersResponseItem[] {
    const { pollId, ...page } = query;
    return listVoters(this.store.snapshot(), pollId, page).map(([voter, info]) => ({
      voter,
      ...toVoterInfoResponse(info),
    }));
  }

  async getStaker(address: string): Promise<StakerResponse> {
    const state = this.store.snapshot();
    const manager = state.bank[address];
    const balance = await this.staking.quotedBalance(state, address);

    return {
      balance: balance.toString(),
      share: (manager?.share ?? 0n).toString(),
      lockedBalance: activeLocks(state, address).map(([pollId, info]) => [
        pollId,
        toVoterInfoResponse(info),
      ]),
    };
  }
}
