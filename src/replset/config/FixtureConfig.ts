import * as os from 'os';
import * as path from 'path';
import { AuthOptions } from '../client/types';
import { ReplicaSetFixtureOptions, ReplSetConfigOptions } from '../types';
import { isPlainObject } from '../../common/utils';

export const DEFAULT_REPLSET_NAME = 'rs';
export const FIXTURE_SUBDIR = 'replset';

/**
 * Fixture options with every default applied
 */
export interface ResolvedFixtureConfig {
  replSetName: string;
  numNodes: number;
  allNodesElectable: boolean;
  votingSecondaries: boolean;
  useReplicaSetConnectionString: boolean;
  startInitialSyncNode: boolean;
  linearChain: boolean;
  writeConcernMajorityJournalDefault?: boolean;
  replSetConfigOptions: ReplSetConfigOptions;
  authOptions?: AuthOptions;
  /** Per-node options without `dbpath`, `replSet` and `setParameters` */
  nodeOptions: Record<string, unknown>;
  setParameters: Record<string, unknown>;
  dbpathPrefix: string;
  preserveDbpath: boolean;
  pollIntervalMs: number;
  configureAttempts: number;
  configureRetryDelayMs: number;
  enableLogging: boolean;
}

export function resolveFixtureConfig(options: ReplicaSetFixtureOptions = {}): ResolvedFixtureConfig {
  const { dbpath, replSet, setParameters, ...nodeOptions } = options.nodeOptions ?? {};
  const allNodesElectable = options.allNodesElectable ?? false;
  const numNodes = options.numNodes ?? 2;

  if (!Number.isInteger(numNodes) || numNodes < 1) {
    throw new Error(`numNodes must be a positive integer, got ${numNodes}`);
  }

  // A dbpath given in the node options is the prefix for every member and
  // wins over the fixture-level prefix.
  const dbpathPrefix = typeof dbpath === 'string'
    ? dbpath
    : path.join(options.dbpathPrefix ?? path.join(os.tmpdir(), 'replset-fixture'), FIXTURE_SUBDIR);

  return {
    replSetName: typeof replSet === 'string' ? replSet : options.replSetName ?? DEFAULT_REPLSET_NAME,
    numNodes,
    allNodesElectable,
    // By default secondaries only vote when they can also be elected
    votingSecondaries: options.votingSecondaries ?? allNodesElectable,
    useReplicaSetConnectionString: options.useReplicaSetConnectionString ?? allNodesElectable,
    startInitialSyncNode: options.startInitialSyncNode ?? false,
    linearChain: options.linearChain ?? false,
    writeConcernMajorityJournalDefault: options.writeConcernMajorityJournalDefault,
    replSetConfigOptions: options.replSetConfigOptions ?? {},
    authOptions: options.authOptions,
    nodeOptions,
    setParameters: isPlainObject(setParameters) ? setParameters : {},
    dbpathPrefix,
    preserveDbpath: options.preserveDbpath ?? false,
    pollIntervalMs: options.pollIntervalMs ?? 100,
    configureAttempts: options.configureAttempts ?? 3,
    configureRetryDelayMs: options.configureRetryDelayMs ?? 5000,
    enableLogging: options.enableLogging ?? true
  };
}
