import {
  AuthOptions,
  ClusterClient,
  CommandDocument,
  CommandResponse,
  NodeLaunchRequest,
  NodeOptions,
  NodeProcess,
  NodeProcessLauncher,
  ReadPreference
} from '../client/types';
import { commandName } from '../client/commands';
import { CommandFailedError, ConnectivityLostError, ProcessError } from '../errors';
import { MemberDescriptor, ReplicaSetConfig } from '../types';
import { FixtureLogger } from '../../common/logger';
import { hostAndPort, isPlainObject } from '../../common/utils';
import { FaultInjector } from './FaultInjector';

export interface InMemoryNetworkOptions {
  host?: string;
  basePort?: number;
  /** Reported by serverStatus as `storageEngine.persistent` */
  persistentStorage?: boolean;
  /** Reported by getCmdLineOpts as `storage.journal.enabled` */
  journalEnabled?: boolean;
  /** When set, session cache refreshes require a client authenticated with these */
  credentials?: { username: string; password: string };
}

export interface RecordedCommand {
  port: number;
  db: string;
  name: string;
  command: CommandDocument;
  readPreference: ReadPreference;
}

/**
 * In-process stand-in for the member processes and their clients.
 *
 * All members share one simulated replica set config. A member reports
 * primary when it is the config's leader, secondary when it is any other
 * member of the config, and neither before it has been added.
 */
export class InMemoryReplicaNetwork implements NodeProcessLauncher {
  readonly faults = new FaultInjector();
  private readonly options: Required<Omit<InMemoryNetworkOptions, 'credentials'>> & Pick<InMemoryNetworkOptions, 'credentials'>;
  private readonly processes = new Map<number, InMemoryNodeProcess>();
  private readonly commands: RecordedCommand[] = [];
  private replSetConfig: ReplicaSetConfig | null = null;
  private leaderId: number | null = null;
  private sessionRefreshes = 0;
  private openClients = 0;

  constructor(options: InMemoryNetworkOptions = {}) {
    this.options = {
      host: options.host ?? 'localhost',
      basePort: options.basePort ?? 20000,
      persistentStorage: options.persistentStorage ?? true,
      journalEnabled: options.journalEnabled ?? true,
      credentials: options.credentials
    };
  }

  launch(request: NodeLaunchRequest): InMemoryNodeProcess {
    const port = this.options.basePort + request.id;
    if (this.processes.has(port)) {
      throw new ProcessError(`A node is already launched on port ${port}`, port);
    }
    const node = new InMemoryNodeProcess(this, request, this.options.host, port);
    this.processes.set(port, node);
    return node;
  }

  getProcess(port: number): InMemoryNodeProcess | undefined {
    return this.processes.get(port);
  }

  getProcesses(): InMemoryNodeProcess[] {
    return Array.from(this.processes.values());
  }

  /**
   * Commands received so far, optionally filtered by target port and command name
   */
  getCommands(filter: { port?: number; name?: string } = {}): RecordedCommand[] {
    return this.commands.filter(recorded =>
      (filter.port === undefined || recorded.port === filter.port) &&
      (filter.name === undefined || recorded.name === filter.name)
    );
  }

  getReplicaSetConfig(): ReplicaSetConfig | null {
    return this.replSetConfig ? structuredClone(this.replSetConfig) : null;
  }

  /**
   * Pretend the set already has a config, as a reused data directory would
   */
  seedConfig(config: ReplicaSetConfig): void {
    this.replSetConfig = structuredClone(config);
    this.leaderId = config.members[0]?._id ?? null;
  }

  /**
   * Move the primary role to member `id`, or leave the set without a primary
   */
  electLeader(id: number | null): void {
    this.leaderId = id;
  }

  getSessionRefreshCount(): number {
    return this.sessionRefreshes;
  }

  getOpenClientCount(): number {
    return this.openClients;
  }

  /** @internal */
  clientOpened(): void {
    this.openClients++;
  }

  /** @internal */
  clientClosed(): void {
    this.openClients--;
  }

  /** @internal */
  handleCommand(
    node: InMemoryNodeProcess,
    db: string,
    command: CommandDocument,
    readPreference: ReadPreference,
    authenticated: boolean
  ): CommandResponse {
    this.ensureConnected(node);

    const name = commandName(command);
    this.commands.push({ port: node.port, db, name, command: structuredClone(command), readPreference });

    const fault = this.faults.takeCommandFault(name);
    if (fault) throw fault;

    switch (name) {
      case 'isMaster':
        return this.describeRole(node);
      case 'serverStatus':
        return { ok: 1, storageEngine: { name: 'wiredTiger', persistent: this.options.persistentStorage } };
      case 'getCmdLineOpts':
        return { ok: 1, parsed: { storage: { journal: { enabled: this.options.journalEnabled } } } };
      case 'replSetInitiate':
        return this.initiate(command[name]);
      case 'replSetReconfig':
        return this.reconfigure(command[name]);
      case 'refreshLogicalSessionCacheNow':
        if (this.options.credentials && !authenticated) {
          throw new CommandFailedError('command refreshLogicalSessionCacheNow requires authentication', 13, name);
        }
        this.sessionRefreshes++;
        return { ok: 1 };
      default:
        throw new CommandFailedError(`no such command: '${name}'`, 59, name);
    }
  }

  /** @internal */
  countConfigDocuments(node: InMemoryNodeProcess): number {
    this.ensureConnected(node);
    return this.replSetConfig ? 1 : 0;
  }

  /** @internal */
  authenticate(node: InMemoryNodeProcess, auth: AuthOptions): void {
    this.ensureConnected(node);
    const expected = this.options.credentials;
    if (expected && (expected.username !== auth.username || expected.password !== auth.password)) {
      throw new CommandFailedError('Authentication failed.', 18, 'authenticate');
    }
  }

  private ensureConnected(node: InMemoryNodeProcess): void {
    if (!node.isRunning() || this.faults.takeConnectivityLoss(node.port)) {
      throw new ConnectivityLostError(`connection to ${node.internalAddress()} lost`);
    }
  }

  private describeRole(node: InMemoryNodeProcess): CommandResponse {
    const member = this.replSetConfig?.members.find(candidate => candidate.host === node.internalAddress());
    if (!member || this.faults.takeRoleDelay(node.port)) {
      return { ok: 1, ismaster: false, secondary: false };
    }

    const isLeader = member._id === this.leaderId;
    return {
      ok: 1,
      ismaster: isLeader,
      secondary: !isLeader,
      hidden: member.hidden === true,
      setName: this.replSetConfig?._id
    };
  }

  private initiate(payload: unknown): CommandResponse {
    if (this.replSetConfig) {
      throw new CommandFailedError('already initialized', 23, 'replSetInitiate');
    }
    const config = this.parseConfig(payload, 'replSetInitiate');
    this.replSetConfig = config;
    this.leaderId = config.members[0]._id;
    return { ok: 1 };
  }

  private reconfigure(payload: unknown): CommandResponse {
    if (!this.replSetConfig) {
      throw new CommandFailedError('no replset config has been received', 94, 'replSetReconfig');
    }
    const config = this.parseConfig(payload, 'replSetReconfig');
    if (config.version <= this.replSetConfig.version) {
      throw new CommandFailedError(
        `version field value of ${config.version} is not greater than the current version ${this.replSetConfig.version}`,
        103,
        'replSetReconfig'
      );
    }
    this.replSetConfig = config;
    return { ok: 1 };
  }

  private parseConfig(payload: unknown, command: string): ReplicaSetConfig {
    if (!isPlainObject(payload) || typeof payload._id !== 'string' || typeof payload.version !== 'number' ||
        !Array.isArray(payload.members) || payload.members.length === 0) {
      throw new CommandFailedError(`${command} received an invalid config`, 93, command);
    }

    const members: MemberDescriptor[] = payload.members.map((member: unknown) => {
      if (!isPlainObject(member) || typeof member._id !== 'number' || typeof member.host !== 'string') {
        throw new CommandFailedError(`${command} received an invalid member`, 93, command);
      }
      const host = member.host;
      if (!this.getProcesses().some(candidate => candidate.internalAddress() === host)) {
        throw new CommandFailedError(`${command}: no member listens on ${host}`, 93, command);
      }

      const descriptor: MemberDescriptor = { _id: member._id, host, votes: member.votes === 0 ? 0 : 1 };
      if (member.priority === 0 || member.priority === 1) {
        descriptor.priority = member.priority;
      }
      if (member.hidden === true) {
        descriptor.hidden = true;
      }
      return descriptor;
    });

    const config: ReplicaSetConfig = { _id: payload._id, version: payload.version, members };
    if (typeof payload.writeConcernMajorityJournalDefault === 'boolean') {
      config.writeConcernMajorityJournalDefault = payload.writeConcernMajorityJournalDefault;
    }
    if (payload.configsvr === true) {
      config.configsvr = true;
    }
    if (isPlainObject(payload.settings)) {
      config.settings = structuredClone(payload.settings);
    }
    return config;
  }
}

/**
 * One simulated member
 */
export class InMemoryNodeProcess implements NodeProcess {
  readonly id: number;
  readonly options: NodeOptions;
  readonly logger: FixtureLogger;
  private running = false;
  private startCount = 0;

  constructor(
    private readonly network: InMemoryReplicaNetwork,
    request: NodeLaunchRequest,
    private readonly host: string,
    readonly port: number
  ) {
    this.id = request.id;
    this.options = request.options;
    this.logger = request.logger;
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.startCount++;
    this.logger.info(`Started node on port ${this.port} with dbpath ${this.options.dbpath}`);
  }

  async awaitReady(): Promise<void> {
    if (!this.running || this.network.faults.isUnreachable(this.port)) {
      throw new ProcessError(`Node on port ${this.port} is not accepting connections`, this.port);
    }
  }

  async stop(): Promise<boolean> {
    if (!this.running) return true;

    const failure = this.network.faults.stopFailure(this.port);
    if (failure === 'throw') {
      throw new ProcessError(`Could not signal node on port ${this.port}`, this.port);
    }
    this.running = false;
    this.logger.info(`Stopped node on port ${this.port}`);
    return failure === undefined;
  }

  isRunning(): boolean {
    return this.running;
  }

  getStartCount(): number {
    return this.startCount;
  }

  internalAddress(): string {
    return hostAndPort(this.host, this.port);
  }

  driverURL(): string {
    return `mongodb://${this.internalAddress()}`;
  }

  client(readPreference: ReadPreference = 'primary'): ClusterClient {
    return new InMemoryClusterClient(this.network, this, readPreference);
  }
}

export class InMemoryClusterClient implements ClusterClient {
  private authenticated = false;
  private closed = false;

  constructor(
    private readonly network: InMemoryReplicaNetwork,
    private readonly node: InMemoryNodeProcess,
    readonly readPreference: ReadPreference
  ) {
    network.clientOpened();
  }

  async runCommand(db: string, command: CommandDocument): Promise<CommandResponse> {
    this.ensureOpen();
    return this.network.handleCommand(this.node, db, command, this.readPreference, this.authenticated);
  }

  async countConfigDocuments(): Promise<number> {
    this.ensureOpen();
    return this.network.countConfigDocuments(this.node);
  }

  async authenticate(auth: AuthOptions): Promise<void> {
    this.ensureOpen();
    this.network.authenticate(this.node, auth);
    this.authenticated = true;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.network.clientClosed();
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new ConnectivityLostError(`client for ${this.node.internalAddress()} is closed`);
    }
  }
}
