import { AuthOptions } from './client/types';

/**
 * One entry of the `members` array of a replica set config
 */
export interface MemberDescriptor {
  _id: number;
  host: string;
  /** Omitted on member 0 so the server default applies */
  priority?: 0 | 1;
  votes: 0 | 1;
  hidden?: boolean;
}

export type ReplicaSetSettings = Record<string, unknown>;

/**
 * The document sent with `replSetInitiate` (version 1) and then with
 * `replSetReconfig` (version 2)
 */
export interface ReplicaSetConfig {
  _id: string;
  version: number;
  members: MemberDescriptor[];
  writeConcernMajorityJournalDefault?: boolean;
  configsvr?: boolean;
  settings?: ReplicaSetSettings;
}

export enum ClusterState {
  UNCONFIGURED = 'Unconfigured',
  SINGLE_MEMBER_INITIATED = 'SingleMemberInitiated',
  FULLY_CONFIGURED = 'FullyConfigured',
  READY = 'Ready',
  TORN_DOWN = 'TornDown'
}

export interface ReplSetConfigOptions {
  configsvr?: boolean;
  settings?: ReplicaSetSettings;
}

export interface TopologyPolicy {
  allNodesElectable: boolean;
  votingSecondaries: boolean;
}

/**
 * Options accepted by `ReplicaSetFixture`
 */
export interface ReplicaSetFixtureOptions {
  /** Name of the set; `nodeOptions.replSet` takes precedence */
  replSetName?: string;
  numNodes?: number;
  /** When false only node 0 can become primary */
  allNodesElectable?: boolean;
  /** Defaults to `allNodesElectable` */
  votingSecondaries?: boolean;
  /** Defaults to `allNodesElectable` */
  useReplicaSetConnectionString?: boolean;
  /** Add a hidden, non-voting member that only performs initial sync */
  startInitialSyncNode?: boolean;
  /** Force each secondary to sync from its predecessor */
  linearChain?: boolean;
  /** Explicit value; when unset it is derived from the storage engine of node 0 */
  writeConcernMajorityJournalDefault?: boolean;
  replSetConfigOptions?: ReplSetConfigOptions;
  authOptions?: AuthOptions;
  /** Options copied into every member; a `dbpath` here becomes the data directory prefix */
  nodeOptions?: Record<string, unknown>;
  dbpathPrefix?: string;
  preserveDbpath?: boolean;
  pollIntervalMs?: number;
  configureAttempts?: number;
  configureRetryDelayMs?: number;
  enableLogging?: boolean;
}

export interface FixtureEvents {
  'state-changed': [{ from: ClusterState; to: ClusterState }];
  'setup-complete': [{ replSetName: string; nodeCount: number }];
  'ready': [{ replSetName: string }];
  'teardown-complete': [{ replSetName: string | null; success: boolean }];
}
