import { Clock, systemClock } from '../../common/Clock';
import { FixtureLogger, createLogger } from '../../common/logger';
import { ClusterClient, NodeProcess } from '../client/types';
import { ADMIN_DB, parseRole, roleQuery } from '../client/commands';
import { LeaderDiscoveryTimeoutError, PreconditionError, isConnectivityTransient } from '../errors';

/**
 * Read-only view of the fixture state the resolver works from
 */
export interface MembershipSource {
  getReplSetName(): string | null;
  getNodes(): NodeProcess[];
  getHiddenSyncMember(): NodeProcess | undefined;
}

export interface ConnectionResolverConfig {
  allNodesElectable: boolean;
  useReplicaSetConnectionString: boolean;
  pollIntervalMs?: number;
  clock?: Clock;
  logger?: FixtureLogger;
}

export const DEFAULT_LEADER_TIMEOUT_SECONDS = 30;

/**
 * Connection strings for the set and discovery of its current primary
 */
export class ConnectionResolver {
  private readonly clients = new Map<number, ClusterClient>();
  private readonly pollIntervalMs: number;
  private readonly clock: Clock;
  private readonly logger: FixtureLogger;

  constructor(private readonly source: MembershipSource, private readonly config: ConnectionResolverConfig) {
    this.pollIntervalMs = config.pollIntervalMs ?? 100;
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? createLogger('resolver');
  }

  /**
   * `<name>/<host:port>,<host:port>,...` as used between members
   */
  internalAddress(): string {
    const name = this.requireReplSetName('internalAddress');
    return `${name}/${this.memberAddresses().join(',')}`;
  }

  /**
   * A replica set URL when clients should follow failovers; otherwise a direct
   * URL to node 0, so a stepdown surfaces as a client error.
   */
  driverURL(): string {
    const name = this.requireReplSetName('driverURL');

    if (this.config.useReplicaSetConnectionString) {
      return `mongodb://${this.memberAddresses().join(',')}/?replicaSet=${name}`;
    }
    return this.firstNode('driverURL').driverURL();
  }

  async getLeader(timeoutSeconds: number = DEFAULT_LEADER_TIMEOUT_SECONDS): Promise<NodeProcess> {
    // Every member but node 0 has priority 0, so node 0 is the primary by construction
    if (!this.config.allNodesElectable) {
      return this.firstNode('getLeader');
    }

    const timeoutMs = timeoutSeconds * 1000;
    const start = this.clock.now();

    for (;;) {
      for (const node of this.source.getNodes()) {
        this.checkLeaderTimeout(start, timeoutMs);
        if (!node.isRunning()) continue;

        let isLeader: boolean;
        try {
          const response = await this.clientFor(node).runCommand(ADMIN_DB, roleQuery());
          isLeader = parseRole(response).isLeader;
        } catch (error) {
          // The primary may have stepped down since we last contacted it;
          // it is asked again in the next round.
          if (isConnectivityTransient(error)) continue;
          throw error;
        }

        if (isLeader) {
          this.logger.info(`The node on port ${node.port} is primary of replica set '${this.source.getReplSetName()}'`);
          return node;
        }
      }

      await this.clock.sleep(this.pollIntervalMs);
    }
  }

  /**
   * Every node except the current primary; the hidden sync member is not included
   */
  async getFollowers(): Promise<NodeProcess[]> {
    const leader = await this.getLeader();
    return this.source.getNodes().filter(node => node.port !== leader.port);
  }

  /**
   * Close the clients cached by leader discovery
   */
  async closeClients(): Promise<void> {
    const clients = Array.from(this.clients.values());
    this.clients.clear();
    for (const client of clients) {
      await client.close();
    }
  }

  get cachedClientCount(): number {
    return this.clients.size;
  }

  private clientFor(node: NodeProcess): ClusterClient {
    let client = this.clients.get(node.port);
    if (!client) {
      client = node.client();
      this.clients.set(node.port, client);
    }
    return client;
  }

  private checkLeaderTimeout(start: number, timeoutMs: number): void {
    const elapsed = this.clock.now() - start;
    if (elapsed >= timeoutMs) {
      const error = new LeaderDiscoveryTimeoutError(this.source.getReplSetName() ?? '<unnamed>', elapsed);
      this.logger.error(error.message);
      throw error;
    }
  }

  private memberAddresses(): string[] {
    const addresses = this.source.getNodes().map(node => node.internalAddress());
    const hidden = this.source.getHiddenSyncMember();
    if (hidden) {
      addresses.push(hidden.internalAddress());
    }
    return addresses;
  }

  private requireReplSetName(caller: string): string {
    const name = this.source.getReplSetName();
    if (name === null) {
      throw new PreconditionError(`Must call setup() before calling ${caller}()`);
    }
    return name;
  }

  private firstNode(caller: string): NodeProcess {
    const [first] = this.source.getNodes();
    if (!first) {
      throw new PreconditionError(`Must call setup() before calling ${caller}()`);
    }
    return first;
  }
}
