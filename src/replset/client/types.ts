import { FixtureLogger } from '../../common/logger';

/**
 * Contracts of the two collaborators the fixture drives but does not
 * implement: the process that runs one member, and the client used to send
 * it administrative commands.
 */

export type ReadPreference = 'primary' | 'secondary';

export type CommandDocument = Record<string, unknown>;
export type CommandResponse = Record<string, unknown>;

export interface AuthOptions {
  username: string;
  password: string;
  authenticationDatabase: string;
  authenticationMechanism: string;
}

/**
 * A client connected directly to one member
 */
export interface ClusterClient {
  /**
   * Run a command against `db`; failures surface as `ReplSetError`s
   * (`NodeNotFoundError`, `ConnectivityLostError`, `CommandFailedError`)
   */
  runCommand(db: string, command: CommandDocument): Promise<CommandResponse>;

  /** Number of documents in `local.system.replset` */
  countConfigDocuments(): Promise<number>;

  authenticate(auth: AuthOptions): Promise<void>;

  close(): Promise<void>;
}

/**
 * Options handed to the launcher for one member
 */
export interface NodeOptions {
  replSet: string;
  dbpath: string;
  setParameters: Record<string, unknown>;
  [option: string]: unknown;
}

export interface NodeLaunchRequest {
  /** Member id, also the index in the node arena */
  id: number;
  options: NodeOptions;
  preserveDbpath: boolean;
  logger: FixtureLogger;
}

/**
 * Handle to a single member process
 */
export interface NodeProcess {
  readonly id: number;
  readonly port: number;
  readonly options: NodeOptions;

  /** Spawn the process; idempotent while it is already running */
  start(): Promise<void>;

  /** Block until the process accepts connections */
  awaitReady(): Promise<void>;

  /** Resolves false when the process did not stop cleanly */
  stop(): Promise<boolean>;

  isRunning(): boolean;

  /** `host:port` used by other members to reach this one */
  internalAddress(): string;

  /** URL a driver uses to connect to this member directly */
  driverURL(): string;

  client(readPreference?: ReadPreference): ClusterClient;
}

/**
 * Creates member processes; launching does not start them
 */
export interface NodeProcessLauncher {
  launch(request: NodeLaunchRequest): NodeProcess;
}
