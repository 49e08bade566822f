import { EventEmitter } from 'eventemitter3';
import { Clock, systemClock } from '../../common/Clock';
import { FixtureLogger, createLogger } from '../../common/logger';
import { AttemptFailureEvent, RetryManager } from '../../common/RetryManager';
import { AuthOptions, ClusterClient, CommandDocument, NodeProcess } from '../client/types';
import {
  ADMIN_DB,
  cmdLineOptsCommand,
  commandName,
  initiateCommand,
  isDurableStorage,
  reconfigCommand,
  serverStatusCommand
} from '../client/commands';
import { errorMessage, isQuorumTransient } from '../errors';
import { ReadinessMonitor } from '../monitor/ReadinessMonitor';
import { MemberDescriptor, ReplicaSetConfig, ReplSetConfigOptions } from '../types';

/** 24 hours, long enough that no election happens while the set comes up */
export const DEFAULT_ELECTION_TIMEOUT_MILLIS = 24 * 60 * 60 * 1000;

export interface ClusterInitiatorConfig {
  votingSecondaries: boolean;
  writeConcernMajorityJournalDefault?: boolean;
  replSetConfigOptions?: ReplSetConfigOptions;
  authOptions?: AuthOptions;
  /** Total attempts per command when the quorum check times out */
  attempts?: number;
  retryDelayMs?: number;
  clock?: Clock;
  logger?: FixtureLogger;
}

/**
 * What the initiator needs to bring a set from nothing to fully configured
 */
export interface InitiatePlan {
  /** Owned by the caller; filled in and bumped to version 2 in place */
  config: ReplicaSetConfig;
  /** Full member list, hidden sync member included */
  members: MemberDescriptor[];
  /** Node 0, which receives every command */
  leader: NodeProcess;
  /** Nodes that must be reachable before the reconfig */
  secondaries: NodeProcess[];
  /** Nodes awaited as secondaries after the reconfig, hidden sync member included */
  followers: NodeProcess[];
}

export type InitiateResult = 'initiated' | 'already-configured';

export interface InitiatorEvents {
  'single-member-initiated': [{ replSetName: string }];
  'fully-configured': [{ replSetName: string; version: number; memberCount: number }];
}

/**
 * Two-phase bootstrap: initiate node 0 as a one-member set so a primary is
 * elected quickly, then reconfigure to the full member list.
 */
export class ClusterInitiator extends EventEmitter<InitiatorEvents> {
  private readonly config: ClusterInitiatorConfig;
  private readonly logger: FixtureLogger;
  private readonly retryManager: RetryManager;

  constructor(private readonly monitor: ReadinessMonitor, config: ClusterInitiatorConfig) {
    super();
    this.config = config;
    this.logger = config.logger ?? createLogger('initiator');

    // replSetInitiate and replSetReconfig can fail with NodeNotFound when a
    // heartbeat times out during the quorum check.
    this.retryManager = new RetryManager({
      maxAttempts: config.attempts ?? 3,
      delay: config.retryDelayMs ?? 5000,
      retryCondition: error => isQuorumTransient(error),
      clock: config.clock ?? systemClock
    });
    this.retryManager.on('attempt-failure', (event: AttemptFailureEvent) => {
      this.logger.error(
        `${event.operation} failed attempt ${event.attempt} of ${event.maxAttempts} with error: ${errorMessage(event.error)}`
      );
    });
  }

  async initiate(plan: InitiatePlan): Promise<InitiateResult> {
    const client = plan.leader.client();
    try {
      if (this.config.authOptions) {
        await client.authenticate(this.config.authOptions);
      }

      if ((await client.countConfigDocuments()) > 0) {
        this.logger.info(`Replica set '${plan.config._id}' already has a configuration; skipping initiation.`);
        return 'already-configured';
      }

      await this.initiateSingleMember(client, plan);

      if (plan.members.length > 1) {
        await this.reconfigureFullSet(client, plan);
      }
      return 'initiated';
    } finally {
      await client.close();
    }
  }

  private async initiateSingleMember(client: ClusterClient, plan: InitiatePlan): Promise<void> {
    const { config } = plan;

    const journalDefault = await this.resolveJournalDefault(client);
    if (journalDefault !== undefined) {
      config.writeConcernMajorityJournalDefault = journalDefault;
    }

    const { configsvr, settings } = this.config.replSetConfigOptions ?? {};
    if (configsvr) {
      config.configsvr = true;
    }
    if (settings && Object.keys(settings).length > 0) {
      config.settings = { ...settings };
    }

    if (this.config.votingSecondaries) {
      config.settings = config.settings ?? {};
      if (!('electionTimeoutMillis' in config.settings)) {
        config.settings.electionTimeoutMillis = DEFAULT_ELECTION_TIMEOUT_MILLIS;
      }
    }

    config.version = 1;
    config.members = [plan.members[0]];
    await this.configure(client, initiateCommand(config));
    this.emit('single-member-initiated', { replSetName: config._id });

    await this.monitor.awaitLeader(plan.leader);
  }

  private async reconfigureFullSet(client: ClusterClient, plan: InitiatePlan): Promise<void> {
    const { config } = plan;

    for (const node of plan.secondaries) {
      await node.awaitReady();
    }

    config.version += 1;
    config.members = [...plan.members];
    await this.configure(client, reconfigCommand(config));
    this.emit('fully-configured', {
      replSetName: config._id,
      version: config.version,
      memberCount: config.members.length
    });

    await this.monitor.awaitFollowers(plan.followers);
  }

  /**
   * An explicit setting wins. Otherwise majority writes are only made to wait
   * for the journal when node 0 can actually journal.
   */
  private async resolveJournalDefault(client: ClusterClient): Promise<boolean | undefined> {
    if (this.config.writeConcernMajorityJournalDefault !== undefined) {
      return this.config.writeConcernMajorityJournalDefault;
    }

    const serverStatus = await client.runCommand(ADMIN_DB, serverStatusCommand());
    const cmdLineOpts = await client.runCommand(ADMIN_DB, cmdLineOptsCommand());
    return isDurableStorage(serverStatus, cmdLineOpts) ? undefined : false;
  }

  private async configure(client: ClusterClient, command: CommandDocument): Promise<void> {
    const name = commandName(command);
    this.logger.info(`Issuing ${name} command: ${JSON.stringify(command[name])}`);
    await this.retryManager.execute(() => client.runCommand(ADMIN_DB, command), name);
  }
}
