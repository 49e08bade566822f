import * as path from 'path';
import { EventEmitter } from 'eventemitter3';
import { Clock, systemClock } from '../common/Clock';
import { FixtureLogger, createLogger } from '../common/logger';
import { NodeOptions, NodeProcess, NodeProcessLauncher } from './client/types';
import { ADMIN_DB, refreshSessionCacheCommand } from './client/commands';
import { ResolvedFixtureConfig, resolveFixtureConfig } from './config/FixtureConfig';
import { ConnectionResolver, DEFAULT_LEADER_TIMEOUT_SECONDS, MembershipSource } from './connection/ConnectionResolver';
import { PreconditionError, errorMessage } from './errors';
import { ClusterInitiator, InitiateResult } from './initiator/ClusterInitiator';
import { ReadinessMonitor } from './monitor/ReadinessMonitor';
import { buildMembers } from './topology/TopologyBuilder';
import { ClusterState, FixtureEvents, ReplicaSetConfig, ReplicaSetFixtureOptions } from './types';

export const FORCE_SYNC_SOURCE_FAILPOINT = 'failpoint.forceSyncSourceCandidate';

export interface FixtureDependencies {
  clock?: Clock;
  logger?: FixtureLogger;
}

/**
 * ReplicaSetFixture brings up a replica set for test workloads to run against
 *
 * Responsibilities:
 * - Launching one member per node (plus an optional hidden initial sync member)
 * - Initiating the set and waiting until node 0 is primary and the rest are secondaries
 * - Handing out connection strings and locating the current primary
 * - Stopping every member, secondaries before the primary
 *
 * The fixture exclusively owns its nodes and the replica set config; the
 * initiator, monitor and resolver only borrow them for one call.
 */
export class ReplicaSetFixture extends EventEmitter<FixtureEvents> implements MembershipSource {
  private readonly config: ResolvedFixtureConfig;
  private readonly logger: FixtureLogger;
  private readonly clock: Clock;
  /** Members by id; ids are never reused for the lifetime of the fixture */
  private readonly nodes = new Map<number, NodeProcess>();
  private hiddenSyncMember?: NodeProcess;
  private replSetName: string | null = null;
  private replSetConfig: ReplicaSetConfig | null = null;
  private state: ClusterState = ClusterState.UNCONFIGURED;

  readonly monitor: ReadinessMonitor;
  readonly initiator: ClusterInitiator;
  readonly resolver: ConnectionResolver;

  constructor(
    private readonly launcher: NodeProcessLauncher,
    options: ReplicaSetFixtureOptions = {},
    dependencies: FixtureDependencies = {}
  ) {
    super();

    this.config = resolveFixtureConfig(options);
    this.clock = dependencies.clock ?? systemClock;
    this.logger = dependencies.logger ?? createLogger(this.config.replSetName, { enableLogs: this.config.enableLogging });

    this.monitor = new ReadinessMonitor({
      pollIntervalMs: this.config.pollIntervalMs,
      clock: this.clock,
      logger: this.logger
    });

    this.initiator = new ClusterInitiator(this.monitor, {
      votingSecondaries: this.config.votingSecondaries,
      writeConcernMajorityJournalDefault: this.config.writeConcernMajorityJournalDefault,
      replSetConfigOptions: this.config.replSetConfigOptions,
      authOptions: this.config.authOptions,
      attempts: this.config.configureAttempts,
      retryDelayMs: this.config.configureRetryDelayMs,
      clock: this.clock,
      logger: this.logger
    });
    this.initiator.on('single-member-initiated', () => this.transition(ClusterState.SINGLE_MEMBER_INITIATED));
    this.initiator.on('fully-configured', () => this.transition(ClusterState.FULLY_CONFIGURED));

    this.resolver = new ConnectionResolver(this, {
      allNodesElectable: this.config.allNodesElectable,
      useReplicaSetConnectionString: this.config.useReplicaSetConnectionString,
      pollIntervalMs: this.config.pollIntervalMs,
      clock: this.clock,
      logger: this.logger
    });
  }

  /**
   * Launch, start and initiate the set. Calling it again reuses the existing
   * nodes, and a set that already has a config is not initiated twice.
   */
  async setup(): Promise<InitiateResult> {
    const { numNodes, linearChain, startInitialSyncNode } = this.config;
    this.replSetName = this.config.replSetName;

    if (this.state === ClusterState.TORN_DOWN) {
      this.transition(ClusterState.UNCONFIGURED);
    }

    if (this.nodes.size === 0) {
      for (let id = 0; id < numNodes; id++) {
        this.nodes.set(id, this.launchNode(id));
      }
    }

    const nodes = this.getNodes();
    for (let i = 0; i < nodes.length; i++) {
      if (linearChain && i > 0) {
        nodes[i].options.setParameters[FORCE_SYNC_SOURCE_FAILPOINT] = {
          mode: 'alwaysOn',
          data: { hostAndPort: nodes[i - 1].internalAddress() }
        };
      }
      await nodes[i].start();
    }

    // The hidden member appears in the reconfig, so it has to be up before
    // the set is initiated.
    if (startInitialSyncNode) {
      if (!this.hiddenSyncMember) {
        this.hiddenSyncMember = this.launchNode(numNodes);
      }
      await this.hiddenSyncMember.start();
      await this.hiddenSyncMember.awaitReady();
    }

    // Only node 0 has to accept connections: it is initiated as a one-member set first
    await nodes[0].awaitReady();

    const members = buildMembers(
      nodes.map(node => node.internalAddress()),
      { allNodesElectable: this.config.allNodesElectable, votingSecondaries: this.config.votingSecondaries },
      this.hiddenSyncMember?.internalAddress()
    );

    const config: ReplicaSetConfig = { _id: this.replSetName, version: 1, members: [] };
    this.replSetConfig = config;

    const result = await this.initiator.initiate({
      config,
      members,
      leader: nodes[0],
      secondaries: nodes.slice(1),
      followers: this.followerNodes()
    });

    this.transition(ClusterState.FULLY_CONFIGURED);
    this.emit('setup-complete', { replSetName: this.replSetName, nodeCount: nodes.length });
    return result;
  }

  /**
   * Re-check the expected roles, then refresh the logical session cache so
   * that tests do not trigger the sessions collection setup themselves.
   */
  async awaitReady(): Promise<void> {
    const replSetName = this.requireReplSetName('awaitReady');
    const [primary] = this.getNodes();

    await this.monitor.awaitLeader(primary);
    await this.monitor.awaitFollowers(this.followerNodes());

    const client = primary.client();
    try {
      if (this.config.authOptions) {
        await client.authenticate(this.config.authOptions);
      }
      await client.runCommand(ADMIN_DB, refreshSessionCacheCommand());
    } finally {
      await client.close();
    }

    this.transition(ClusterState.READY);
    this.emit('ready', { replSetName });
  }

  /**
   * Stop every member. A member that fails to stop does not keep the others
   * running; the result is false when any of them failed.
   */
  async teardown(): Promise<boolean> {
    const runningAtStart = this.isRunning();
    let success = true; // Still a success even if nothing is running.

    if (!runningAtStart) {
      this.logger.info("Replica set was expected to be running in teardown(), but wasn't.");
    } else {
      this.logger.info('Stopping all members of the replica set...');
    }

    await this.resolver.closeClients();

    if (this.hiddenSyncMember) {
      success = (await this.stopNode(this.hiddenSyncMember)) && success;
    }

    // Terminate the secondaries first to reduce noise in the logs.
    for (const node of this.getNodes().reverse()) {
      success = (await this.stopNode(node)) && success;
    }

    if (runningAtStart) {
      if (success) {
        this.logger.info('Successfully stopped all members of the replica set.');
      } else {
        this.logger.error('Failed to stop some members of the replica set.');
      }
    }

    this.transition(ClusterState.TORN_DOWN);
    this.emit('teardown-complete', { replSetName: this.replSetName, success });
    return success;
  }

  /**
   * True when every node is running, or when the hidden sync member alone still is
   */
  isRunning(): boolean {
    const nodes = this.getNodes();
    const running = nodes.length > 0 && nodes.every(node => node.isRunning());
    return (this.hiddenSyncMember?.isRunning() ?? false) || running;
  }

  getLeader(timeoutSeconds: number = DEFAULT_LEADER_TIMEOUT_SECONDS): Promise<NodeProcess> {
    return this.resolver.getLeader(timeoutSeconds);
  }

  getFollowers(): Promise<NodeProcess[]> {
    return this.resolver.getFollowers();
  }

  internalAddress(): string {
    return this.resolver.internalAddress();
  }

  driverURL(): string {
    return this.resolver.driverURL();
  }

  getHiddenSyncMember(): NodeProcess | undefined {
    return this.hiddenSyncMember;
  }

  /** Nodes in member id order, hidden sync member excluded */
  getNodes(): NodeProcess[] {
    return Array.from(this.nodes.values());
  }

  getNode(id: number): NodeProcess | undefined {
    return this.nodes.get(id) ?? (this.hiddenSyncMember?.id === id ? this.hiddenSyncMember : undefined);
  }

  getReplSetName(): string | null {
    return this.replSetName;
  }

  /**
   * Copy of the config most recently sent to node 0
   */
  getReplicaSetConfig(): ReplicaSetConfig | null {
    return this.replSetConfig ? structuredClone(this.replSetConfig) : null;
  }

  getState(): ClusterState {
    return this.state;
  }

  getConfig(): ResolvedFixtureConfig {
    return { ...this.config };
  }

  private followerNodes(): NodeProcess[] {
    const followers = this.getNodes().slice(1);
    if (this.hiddenSyncMember) {
      followers.push(this.hiddenSyncMember);
    }
    return followers;
  }

  private async stopNode(node: NodeProcess): Promise<boolean> {
    try {
      return await node.stop();
    } catch (error) {
      this.logger.error(`Failed to stop node on port ${node.port}: ${errorMessage(error)}`);
      return false;
    }
  }

  private launchNode(id: number): NodeProcess {
    const options: NodeOptions = {
      ...structuredClone(this.config.nodeOptions),
      replSet: this.config.replSetName,
      dbpath: path.join(this.config.dbpathPrefix, `node${id}`),
      setParameters: structuredClone(this.config.setParameters)
    };

    return this.launcher.launch({
      id,
      options,
      preserveDbpath: this.config.preserveDbpath,
      logger: this.logger.child(this.nodeLoggerName(id))
    });
  }

  private nodeLoggerName(id: number): string {
    if (id === this.config.numNodes) {
      return 'initsync';
    }
    if (this.config.allNodesElectable) {
      return `node${id}`;
    }
    if (id === 0) {
      return 'primary';
    }
    const suffix = this.config.numNodes > 2 ? String(id - 1) : '';
    return `secondary${suffix}`;
  }

  private requireReplSetName(caller: string): string {
    if (this.replSetName === null || this.nodes.size === 0) {
      throw new PreconditionError(`Must call setup() before calling ${caller}()`);
    }
    return this.replSetName;
  }

  private transition(to: ClusterState): void {
    if (this.state === to) return;
    const from = this.state;
    this.state = to;
    this.logger.debug(`Replica set state ${from} -> ${to}`);
    this.emit('state-changed', { from, to });
  }
}
