// Main entry point for replset-fixture

// Fixture
export * from './replset/ReplicaSetFixture';
export * from './replset/types';
export * from './replset/errors';
export * from './replset/config/FixtureConfig';

// Bootstrap and readiness
export * from './replset/topology/TopologyBuilder';
export * from './replset/initiator/ClusterInitiator';
export * from './replset/monitor/ReadinessMonitor';
export * from './replset/connection/ConnectionResolver';

// Collaborator contracts
export * from './replset/client/types';
export * from './replset/client/commands';

// In-memory members for tests and simulations
export * from './replset/adapters/InMemoryReplicaNetwork';
export * from './replset/adapters/FaultInjector';

// Configuration
export * from './config/YamlFixtureConfiguration';

// Common
export * from './common/Clock';
export * from './common/RetryManager';
export * from './common/logger';
export { delay, hostAndPort } from './common/utils';
