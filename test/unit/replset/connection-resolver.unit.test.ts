import { VirtualClock } from '../../../src/common/Clock';
import { LogRecord } from '../../../src/common/logger';
import { InMemoryNodeProcess, InMemoryReplicaNetwork } from '../../../src/replset/adapters/InMemoryReplicaNetwork';
import { NodeProcess } from '../../../src/replset/client/types';
import { ConnectionResolver, ConnectionResolverConfig, MembershipSource } from '../../../src/replset/connection/ConnectionResolver';
import { CommandFailedError, LeaderDiscoveryTimeoutError, PreconditionError } from '../../../src/replset/errors';
import { createSpyLogger, startNodes } from '../../helpers/replsetHarness';

describe('ConnectionResolver', () => {
  let network: InMemoryReplicaNetwork;
  let clock: VirtualClock;
  let logs: LogRecord[];
  let nodes: InMemoryNodeProcess[];
  let membership: { name: string | null; nodes: NodeProcess[]; hidden?: NodeProcess };

  const source: MembershipSource = {
    getReplSetName: () => membership.name,
    getNodes: () => membership.nodes,
    getHiddenSyncMember: () => membership.hidden
  };

  const createResolver = (config: Partial<ConnectionResolverConfig> = {}): ConnectionResolver => {
    const spy = createSpyLogger();
    logs = spy.logs;
    return new ConnectionResolver(source, {
      allNodesElectable: true,
      useReplicaSetConnectionString: true,
      clock,
      logger: spy.logger,
      ...config
    });
  };

  beforeEach(async () => {
    network = new InMemoryReplicaNetwork();
    clock = new VirtualClock();
    nodes = await startNodes(network, 3);
    membership = { name: 'rs', nodes };
    network.seedConfig({
      _id: 'rs',
      version: 2,
      members: [
        { _id: 0, host: 'localhost:20000', votes: 1 },
        { _id: 1, host: 'localhost:20001', votes: 1 },
        { _id: 2, host: 'localhost:20002', votes: 1 }
      ]
    });
  });

  describe('connection strings', () => {
    it('should list every member in the internal address', () => {
      expect(createResolver().internalAddress()).toBe('rs/localhost:20000,localhost:20001,localhost:20002');
    });

    it('should append the hidden sync member to both strings', async () => {
      const [, , hidden] = nodes;
      membership = { name: 'rs', nodes: nodes.slice(0, 2), hidden };
      const resolver = createResolver();

      expect(resolver.internalAddress()).toBe('rs/localhost:20000,localhost:20001,localhost:20002');
      expect(resolver.driverURL()).toBe('mongodb://localhost:20000,localhost:20001,localhost:20002/?replicaSet=rs');
    });

    it('should hand out a replica set URL when asked to', () => {
      expect(createResolver().driverURL()).toBe('mongodb://localhost:20000,localhost:20001,localhost:20002/?replicaSet=rs');
    });

    it('should hand out a direct URL to node 0 otherwise', () => {
      expect(createResolver({ useReplicaSetConnectionString: false }).driverURL()).toBe('mongodb://localhost:20000');
    });

    it('should refuse to build strings before setup', () => {
      membership = { name: null, nodes: [] };
      const resolver = createResolver();

      expect(() => resolver.internalAddress()).toThrow(PreconditionError);
      expect(() => resolver.internalAddress()).toThrow('Must call setup() before calling internalAddress()');
      expect(() => resolver.driverURL()).toThrow('Must call setup() before calling driverURL()');
    });
  });

  describe('getLeader', () => {
    it('should return node 0 without a round trip when only it is electable', async () => {
      network.electLeader(2);

      await expect(createResolver({ allNodesElectable: false }).getLeader()).resolves.toBe(nodes[0]);
      expect(network.getCommands()).toEqual([]);
    });

    it('should reject before setup when only node 0 is electable', async () => {
      membership = { name: null, nodes: [] };

      await expect(createResolver({ allNodesElectable: false }).getLeader()).rejects.toBeInstanceOf(PreconditionError);
    });

    it('should find a primary that moved to another member', async () => {
      network.electLeader(2);
      const resolver = createResolver();

      await expect(resolver.getLeader()).resolves.toBe(nodes[2]);
      expect(network.getCommands({ name: 'isMaster' }).map(recorded => recorded.port)).toEqual([20000, 20001, 20002]);
      expect(clock.getSleeps()).toEqual([]);
      expect(logs.map(record => record.message)).toEqual(["The node on port 20002 is primary of replica set 'rs'"]);
    });

    it('should time out when no member becomes primary', async () => {
      network.electLeader(null);

      const error = await createResolver().getLeader(1).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(LeaderDiscoveryTimeoutError);
      expect(error).toMatchObject({ replSetName: 'rs', elapsedMs: 1000 });
      expect(clock.getSleeps()).toHaveLength(10);
      expect(logs.filter(record => record.level === 'error').map(record => record.message)).toEqual([
        "Timed out while waiting for a primary for replica set 'rs'."
      ]);
    });

    it('should move on when a member drops the connection', async () => {
      network.electLeader(1);
      network.faults.dropConnectivity(20000, 1);

      await expect(createResolver().getLeader()).resolves.toBe(nodes[1]);
      expect(network.getCommands({ port: 20000 })).toEqual([]);
    });

    it('should ask a member again in the next round after a dropped connection', async () => {
      network.faults.dropConnectivity(20000, 1);

      await expect(createResolver().getLeader()).resolves.toBe(nodes[0]);
      expect(network.getCommands({ name: 'isMaster' }).map(recorded => recorded.port)).toEqual([20001, 20002, 20000]);
      expect(clock.getSleeps()).toEqual([100]);
    });

    it('should skip members that are not running', async () => {
      network.electLeader(1);
      await nodes[0].stop();

      await expect(createResolver().getLeader()).resolves.toBe(nodes[1]);
      expect(network.getCommands({ port: 20000 })).toEqual([]);
    });

    it('should propagate any other probe failure', async () => {
      network.faults.failCommand('isMaster', () => new CommandFailedError('not authorized on admin', 13));

      await expect(createResolver().getLeader()).rejects.toThrow('not authorized on admin');
    });

    it('should reuse one client per member across calls', async () => {
      network.electLeader(2);
      const resolver = createResolver();

      await resolver.getLeader();
      await resolver.getLeader();

      expect(resolver.cachedClientCount).toBe(3);
      expect(network.getOpenClientCount()).toBe(3);

      await resolver.closeClients();

      expect(resolver.cachedClientCount).toBe(0);
      expect(network.getOpenClientCount()).toBe(0);
    });
  });

  describe('getFollowers', () => {
    it('should return every member except the primary', async () => {
      network.electLeader(1);

      await expect(createResolver().getFollowers()).resolves.toEqual([nodes[0], nodes[2]]);
    });

    it('should leave out the hidden sync member', async () => {
      const [, , hidden] = nodes;
      membership = { name: 'rs', nodes: nodes.slice(0, 2), hidden };

      await expect(createResolver({ allNodesElectable: false }).getFollowers()).resolves.toEqual([nodes[1]]);
    });
  });
});
