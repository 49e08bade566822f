import { InMemoryReplicaNetwork } from '../../../src/replset/adapters/InMemoryReplicaNetwork';
import { CommandFailedError, ConnectivityLostError, ProcessError } from '../../../src/replset/errors';
import { createSpyLogger, startNodes } from '../../helpers/replsetHarness';

describe('InMemoryReplicaNetwork', () => {
  let network: InMemoryReplicaNetwork;

  beforeEach(() => {
    network = new InMemoryReplicaNetwork();
  });

  it('should refuse a second member on the same port', () => {
    const { logger } = createSpyLogger();
    const request = { id: 0, options: { replSet: 'rs', dbpath: '/tmp/replset-test/node0', setParameters: {} }, preserveDbpath: false, logger };
    network.launch(request);

    expect(() => network.launch(request)).toThrow(ProcessError);
    expect(() => network.launch(request)).toThrow('A node is already launched on port 20000');
  });

  it('should log start and stop of a member once', async () => {
    const { logger, logs } = createSpyLogger('rs');
    const node = network.launch({
      id: 1,
      options: { replSet: 'rs', dbpath: '/tmp/replset-test/node1', setParameters: {} },
      preserveDbpath: false,
      logger
    });

    await node.start();
    await node.start();
    await expect(node.stop()).resolves.toBe(true);
    await expect(node.stop()).resolves.toBe(true);

    expect(logs.map(record => record.message)).toEqual([
      'Started node on port 20001 with dbpath /tmp/replset-test/node1',
      'Stopped node on port 20001'
    ]);
    expect(node.getStartCount()).toBe(1);
  });

  describe('replica set commands', () => {
    it('should make the first member primary on initiate', async () => {
      const [primary] = await startNodes(network, 2);
      const client = primary.client();

      await client.runCommand('admin', {
        replSetInitiate: { _id: 'rs', version: 1, members: [{ _id: 0, host: 'localhost:20000', votes: 1 }] }
      });

      await expect(client.runCommand('admin', { isMaster: 1 })).resolves.toEqual({
        ok: 1,
        ismaster: true,
        secondary: false,
        hidden: false,
        setName: 'rs'
      });
      await expect(client.countConfigDocuments()).resolves.toBe(1);
    });

    it('should report neither role for a member the config does not list yet', async () => {
      const [primary, secondary] = await startNodes(network, 2);
      await primary.client().runCommand('admin', {
        replSetInitiate: { _id: 'rs', version: 1, members: [{ _id: 0, host: 'localhost:20000', votes: 1 }] }
      });

      await expect(secondary.client('secondary').runCommand('admin', { isMaster: 1 }))
        .resolves.toEqual({ ok: 1, ismaster: false, secondary: false });
    });

    it('should reject a second initiate', async () => {
      const [primary] = await startNodes(network, 1);
      const client = primary.client();
      const initiate = {
        replSetInitiate: { _id: 'rs', version: 1, members: [{ _id: 0, host: 'localhost:20000', votes: 1 }] }
      };
      await client.runCommand('admin', initiate);

      await expect(client.runCommand('admin', initiate)).rejects.toMatchObject({ code: 23, message: 'already initialized' });
    });

    it('should require a higher version on reconfig', async () => {
      const [primary] = await startNodes(network, 1);
      const client = primary.client();
      const config = { _id: 'rs', version: 1, members: [{ _id: 0, host: 'localhost:20000', votes: 1 }] };

      await expect(client.runCommand('admin', { replSetReconfig: config })).rejects.toMatchObject({ code: 94 });

      await client.runCommand('admin', { replSetInitiate: config });
      await expect(client.runCommand('admin', { replSetReconfig: config })).rejects.toMatchObject({
        code: 103,
        message: 'version field value of 1 is not greater than the current version 1'
      });
    });

    it('should reject members that no process listens on', async () => {
      const [primary] = await startNodes(network, 1);

      await expect(primary.client().runCommand('admin', {
        replSetInitiate: { _id: 'rs', version: 1, members: [{ _id: 0, host: 'localhost:29999', votes: 1 }] }
      })).rejects.toThrow('replSetInitiate: no member listens on localhost:29999');
    });

    it('should reject unknown commands', async () => {
      const [primary] = await startNodes(network, 1);

      await expect(primary.client().runCommand('admin', { shutdown: 1 })).rejects.toBeInstanceOf(CommandFailedError);
    });
  });

  describe('clients', () => {
    it('should fail commands against a stopped member as lost connectivity', async () => {
      const [node] = await startNodes(network, 1);
      await node.stop();

      await expect(node.client().runCommand('admin', { isMaster: 1 })).rejects.toBeInstanceOf(ConnectivityLostError);
    });

    it('should fail commands on a closed client', async () => {
      const [node] = await startNodes(network, 1);
      const client = node.client();
      await client.close();
      await client.close();

      await expect(client.runCommand('admin', { isMaster: 1 })).rejects.toThrow('client for localhost:20000 is closed');
      expect(network.getOpenClientCount()).toBe(0);
    });
  });

  describe('fault injection', () => {
    it('should consume a connectivity fault once', async () => {
      const [node] = await startNodes(network, 1);
      const client = node.client();
      const triggered: number[] = [];
      network.faults.on('fault-triggered', event => triggered.push(event.remaining));
      network.faults.dropConnectivity(20000, 2);

      await expect(client.runCommand('admin', { isMaster: 1 })).rejects.toBeInstanceOf(ConnectivityLostError);
      await expect(client.runCommand('admin', { isMaster: 1 })).rejects.toBeInstanceOf(ConnectivityLostError);
      await expect(client.runCommand('admin', { isMaster: 1 })).resolves.toMatchObject({ ok: 1 });
      expect(triggered).toEqual([1, 0]);
    });

    it('should clear unreachability on restore', async () => {
      const [node] = await startNodes(network, 1);
      network.faults.makeUnreachable(20000);

      await expect(node.awaitReady()).rejects.toThrow('Node on port 20000 is not accepting connections');

      network.faults.restore(20000);
      await expect(node.awaitReady()).resolves.toBeUndefined();
    });
  });
});
