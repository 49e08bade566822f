import * as yaml from 'js-yaml';
import { promises as fs } from 'fs';
import { EventEmitter } from 'events';
import { AuthOptions } from '../replset/client/types';
import { ReplicaSetFixtureOptions, ReplSetConfigOptions } from '../replset/types';
import { isPlainObject } from '../common/utils';

export const REPLICA_SET_FIXTURE_CLASS = 'ReplicaSetFixture';

/**
 * `executor.fixture` block of a suite file (snake_case, as suite files write it)
 */
export interface YamlFixtureBlock {
  class: string;
  num_nodes?: number;
  all_nodes_electable?: boolean;
  voting_secondaries?: boolean;
  use_replica_set_connection_string?: boolean;
  start_initial_sync_node?: boolean;
  linear_chain?: boolean;
  write_concern_majority_journal_default?: boolean;
  replset_config_options?: ReplSetConfigOptions;
  auth_options?: AuthOptions;
  /** Options for every member; `set_parameters` holds server parameters */
  mongod_options?: Record<string, unknown>;
  dbpath_prefix?: string;
  preserve_dbpath?: boolean;
}

export interface YamlSuiteConfig {
  executor: {
    fixture: YamlFixtureBlock;
  };

  /** Environment-specific overrides of the fixture block */
  environments?: Record<string, { fixture?: Partial<YamlFixtureBlock> }>;
}

/**
 * Loads the replica set fixture section of a suite file
 *
 * Events: `config-loaded` ({ filePath, config }), `config-error` ({ filePath, error })
 */
export class YamlFixtureConfiguration extends EventEmitter {
  private config: YamlSuiteConfig | null = null;
  private currentEnvironment: string;

  constructor(environment: string = 'development') {
    super();
    this.currentEnvironment = environment;
  }

  async loadFromFile(filePath: string): Promise<void> {
    try {
      const yamlContent = await fs.readFile(filePath, 'utf8');
      this.config = this.parseFromYaml(yamlContent);
      this.emit('config-loaded', { filePath, config: this.config });
    } catch (error) {
      this.emit('config-error', { filePath, error });
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load YAML configuration from ${filePath}: ${errorMessage}`);
    }
  }

  /**
   * Parse and validate suite YAML, keeping it as the current configuration
   */
  parseFromYaml(yamlContent: string): YamlSuiteConfig {
    let parsed: unknown;
    try {
      parsed = yaml.load(yamlContent);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to parse YAML configuration: ${errorMessage}`);
    }
    this.config = validateSuiteConfig(parsed);
    return this.config;
  }

  /**
   * Fixture block with the current environment's overrides merged on top
   */
  getFixtureBlock(): YamlFixtureBlock {
    if (!this.config) {
      throw new Error('No configuration loaded');
    }
    const base = this.config.executor.fixture;
    const overrides = this.config.environments?.[this.currentEnvironment]?.fixture ?? {};
    return { ...base, ...overrides, class: base.class };
  }

  toFixtureOptions(): ReplicaSetFixtureOptions {
    return fixtureBlockToOptions(this.getFixtureBlock());
  }

  getConfig(): YamlSuiteConfig | null {
    return this.config;
  }

  setEnvironment(environment: string): void {
    this.currentEnvironment = environment;
  }
}

export function fixtureBlockToOptions(block: YamlFixtureBlock): ReplicaSetFixtureOptions {
  const options: ReplicaSetFixtureOptions = {
    numNodes: block.num_nodes,
    allNodesElectable: block.all_nodes_electable,
    votingSecondaries: block.voting_secondaries,
    useReplicaSetConnectionString: block.use_replica_set_connection_string,
    startInitialSyncNode: block.start_initial_sync_node,
    linearChain: block.linear_chain,
    writeConcernMajorityJournalDefault: block.write_concern_majority_journal_default,
    replSetConfigOptions: block.replset_config_options,
    authOptions: block.auth_options,
    dbpathPrefix: block.dbpath_prefix,
    preserveDbpath: block.preserve_dbpath
  };

  if (block.mongod_options) {
    const { set_parameters: setParameters, ...rest } = block.mongod_options;
    options.nodeOptions = setParameters === undefined ? rest : { ...rest, setParameters };
  }

  return options;
}

const BOOLEAN_KEYS = [
  'all_nodes_electable',
  'voting_secondaries',
  'use_replica_set_connection_string',
  'start_initial_sync_node',
  'linear_chain',
  'write_concern_majority_journal_default',
  'preserve_dbpath'
] as const;

function validateSuiteConfig(parsed: unknown): YamlSuiteConfig {
  if (!isPlainObject(parsed) || !isPlainObject(parsed.executor) || !isPlainObject(parsed.executor.fixture)) {
    throw new Error('executor.fixture is required');
  }

  const fixture = validateFixtureBlock(parsed.executor.fixture, 'executor.fixture');
  if (fixture.class !== REPLICA_SET_FIXTURE_CLASS) {
    throw new Error(`executor.fixture.class must be ${REPLICA_SET_FIXTURE_CLASS}, got ${fixture.class}`);
  }

  const config: YamlSuiteConfig = { executor: { fixture } };

  if (parsed.environments !== undefined) {
    if (!isPlainObject(parsed.environments)) {
      throw new Error('environments must be a mapping');
    }
    config.environments = {};
    for (const [name, environment] of Object.entries(parsed.environments)) {
      const overrides = isPlainObject(environment) && isPlainObject(environment.fixture)
        ? environment.fixture
        : {};
      const block = validateFixtureBlock({ class: fixture.class, ...overrides }, `environments.${name}.fixture`);
      const { class: _class, ...partial } = block;
      config.environments[name] = { fixture: partial };
    }
  }

  return config;
}

function validateFixtureBlock(raw: Record<string, unknown>, where: string): YamlFixtureBlock {
  if (typeof raw.class !== 'string' || raw.class.length === 0) {
    throw new Error(`${where}.class is required`);
  }

  const block: YamlFixtureBlock = { class: raw.class };

  if (raw.num_nodes !== undefined) {
    if (typeof raw.num_nodes !== 'number' || !Number.isInteger(raw.num_nodes) || raw.num_nodes < 1) {
      throw new Error(`${where}.num_nodes must be a positive integer`);
    }
    block.num_nodes = raw.num_nodes;
  }

  for (const key of BOOLEAN_KEYS) {
    const value = optionalBoolean(raw, key, where);
    if (value !== undefined) {
      block[key] = value;
    }
  }

  if (raw.dbpath_prefix !== undefined) {
    if (typeof raw.dbpath_prefix !== 'string') {
      throw new Error(`${where}.dbpath_prefix must be a string`);
    }
    block.dbpath_prefix = raw.dbpath_prefix;
  }

  if (raw.mongod_options !== undefined) {
    if (!isPlainObject(raw.mongod_options)) {
      throw new Error(`${where}.mongod_options must be a mapping`);
    }
    block.mongod_options = raw.mongod_options;
  }

  if (raw.replset_config_options !== undefined) {
    const options = raw.replset_config_options;
    if (!isPlainObject(options)) {
      throw new Error(`${where}.replset_config_options must be a mapping`);
    }
    if (options.settings !== undefined && !isPlainObject(options.settings)) {
      throw new Error(`${where}.replset_config_options.settings must be a mapping`);
    }
    const configsvr = optionalBoolean(options, 'configsvr', `${where}.replset_config_options`);
    block.replset_config_options = {
      ...(configsvr !== undefined ? { configsvr } : {}),
      ...(isPlainObject(options.settings) ? { settings: options.settings } : {})
    };
  }

  if (raw.auth_options !== undefined) {
    block.auth_options = validateAuthOptions(raw.auth_options, `${where}.auth_options`);
  }

  return block;
}

function validateAuthOptions(raw: unknown, where: string): AuthOptions {
  if (!isPlainObject(raw)) {
    throw new Error(`${where} must be a mapping`);
  }
  const { username, password, authenticationDatabase, authenticationMechanism } = raw;
  if (typeof username !== 'string' || typeof password !== 'string') {
    throw new Error(`${where} requires username and password`);
  }
  return {
    username,
    password,
    authenticationDatabase: typeof authenticationDatabase === 'string' ? authenticationDatabase : 'admin',
    authenticationMechanism: typeof authenticationMechanism === 'string' ? authenticationMechanism : 'SCRAM-SHA-1'
  };
}

function optionalBoolean(raw: Record<string, unknown>, key: string, where: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new Error(`${where}.${key} must be a boolean`);
  }
  return value;
}
