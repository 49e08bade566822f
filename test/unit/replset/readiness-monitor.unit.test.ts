import { VirtualClock } from '../../../src/common/Clock';
import { LogRecord } from '../../../src/common/logger';
import { InMemoryNodeProcess, InMemoryReplicaNetwork } from '../../../src/replset/adapters/InMemoryReplicaNetwork';
import { ConnectivityLostError, WaitTimeoutError } from '../../../src/replset/errors';
import { ReadinessMonitor } from '../../../src/replset/monitor/ReadinessMonitor';
import { createSpyLogger, startNodes } from '../../helpers/replsetHarness';

describe('ReadinessMonitor', () => {
  let network: InMemoryReplicaNetwork;
  let clock: VirtualClock;
  let logs: LogRecord[];
  let monitor: ReadinessMonitor;
  let nodes: InMemoryNodeProcess[];

  beforeEach(async () => {
    network = new InMemoryReplicaNetwork();
    clock = new VirtualClock();
    const spy = createSpyLogger();
    logs = spy.logs;
    monitor = new ReadinessMonitor({ clock, logger: spy.logger });

    nodes = await startNodes(network, 3);
    network.seedConfig({
      _id: 'rs',
      version: 2,
      members: [
        { _id: 0, host: 'localhost:20000', votes: 1 },
        { _id: 1, host: 'localhost:20001', priority: 0, votes: 0 },
        { _id: 2, host: 'localhost:20002', priority: 0, votes: 0 }
      ]
    });
  });

  const infoMessages = (): string[] => logs.filter(record => record.level === 'info').map(record => record.message);

  describe('awaitLeader', () => {
    it('should return after one poll when node 0 is already primary', async () => {
      const confirmed: number[] = [];
      monitor.on('leader-confirmed', event => confirmed.push(event.polls));

      await monitor.awaitLeader(nodes[0]);

      expect(confirmed).toEqual([1]);
      expect(clock.getSleeps()).toEqual([]);
      expect(infoMessages()).toEqual([
        'Waiting for primary on port 20000 to be elected.',
        'Primary on port 20000 successfully elected.'
      ]);
    });

    it('should poll every 100ms until the election completes', async () => {
      network.faults.delayRole(20000, 2);

      await monitor.awaitLeader(nodes[0]);

      expect(clock.getSleeps()).toEqual([100, 100]);
      expect(network.getCommands({ port: 20000, name: 'isMaster' })).toHaveLength(3);
    });

    it('should give up at the deadline with a timeout error', async () => {
      network.electLeader(1);

      const error = await monitor.awaitLeader(nodes[0], { deadlineMs: 250 }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(WaitTimeoutError);
      expect(error).toMatchObject({ waitingFor: 'primary', port: 20000, elapsedMs: 300 });
    });

    it('should propagate a connection failure instead of polling forever', async () => {
      await nodes[0].stop();

      await expect(monitor.awaitLeader(nodes[0])).rejects.toBeInstanceOf(ConnectivityLostError);
      expect(network.getOpenClientCount()).toBe(0);
    });
  });

  describe('awaitFollowers', () => {
    it('should confirm each node in list order with a secondary read preference', async () => {
      const confirmed: number[] = [];
      monitor.on('follower-confirmed', event => confirmed.push(event.port));

      await monitor.awaitFollowers([nodes[2], nodes[1]]);

      expect(confirmed).toEqual([20002, 20001]);
      expect(network.getCommands({ name: 'isMaster' }).map(recorded => [recorded.port, recorded.readPreference])).toEqual([
        [20002, 'secondary'],
        [20001, 'secondary']
      ]);
    });

    it('should keep polling a node that has not caught up yet', async () => {
      network.faults.delayRole(20001, 3);
      const polls: number[] = [];
      monitor.on('follower-confirmed', event => polls.push(event.polls));

      await monitor.awaitFollowers([nodes[1], nodes[2]]);

      expect(polls).toEqual([4, 1]);
      expect(clock.getSleeps()).toEqual([100, 100, 100]);
      expect(logs.filter(record => record.level === 'debug').map(record => record.message)).toEqual([
        'Still waiting for secondary on port 20001 to become available (poll 2).',
        'Still waiting for secondary on port 20001 to become available (poll 3).',
        'Still waiting for secondary on port 20001 to become available (poll 4).'
      ]);
    });

    it('should apply the deadline to each node separately', async () => {
      network.faults.delayRole(20001, 10);

      await expect(monitor.awaitFollowers([nodes[1]], { deadlineMs: 250 }))
        .rejects.toThrow('Timed out after 300ms waiting for secondary on port 20001');
    });

    it('should not report a node outside the config as a secondary', async () => {
      const [stranger] = await startNodes(new InMemoryReplicaNetwork({ basePort: 30000 }), 1);

      await expect(monitor.queryRole(stranger.client())).resolves.toEqual({ isLeader: false, isFollower: false });
    });

    it('should close every probe client', async () => {
      await monitor.awaitFollowers([nodes[1], nodes[2]]);

      expect(network.getOpenClientCount()).toBe(0);
    });
  });

  it('should honour a custom poll interval', async () => {
    const { logger } = createSpyLogger();
    const slowMonitor = new ReadinessMonitor({ pollIntervalMs: 1000, clock, logger });
    network.faults.delayRole(20000, 1);

    await slowMonitor.awaitLeader(nodes[0]);

    expect(clock.getSleeps()).toEqual([1000]);
  });
});
