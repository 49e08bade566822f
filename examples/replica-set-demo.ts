import { InMemoryReplicaNetwork } from '../src/replset/adapters/InMemoryReplicaNetwork';
import { ReplicaSetFixture } from '../src/replset/ReplicaSetFixture';
import { ClusterState } from '../src/replset/types';

/**
 * Demonstration of the replica set fixture lifecycle against in-memory members.
 * Swap the network for a launcher that spawns real server processes to run the
 * same steps against a real set.
 */
async function demonstrateReplicaSetLifecycle() {
  console.log('=== Replica Set Fixture Demonstration ===\n');

  const network = new InMemoryReplicaNetwork();
  const fixture = new ReplicaSetFixture(network, {
    replSetName: 'demo',
    numNodes: 3,
    allNodesElectable: true,
    startInitialSyncNode: true,
    configureRetryDelayMs: 500
  });

  fixture.on('state-changed', ({ from, to }) => {
    console.log(`   → state ${from} -> ${to}`);
  });

  console.log('1. Setting up the replica set...');
  await fixture.setup();
  await fixture.awaitReady();
  console.log(`   ✓ Replica set is ${fixture.getState() === ClusterState.READY ? 'ready' : fixture.getState()}`);
  console.log(`   ✓ Internal address: ${fixture.internalAddress()}`);
  console.log(`   ✓ Driver URL: ${fixture.driverURL()}\n`);

  console.log('2. Moving the primary to node 1...');
  network.electLeader(1);
  const leader = await fixture.getLeader();
  const followers = await fixture.getFollowers();
  console.log(`   ✓ Primary is on port ${leader.port}`);
  console.log(`   ✓ Secondaries are on ports ${followers.map(node => node.port).join(', ')}\n`);

  console.log('3. Tearing down...');
  const success = await fixture.teardown();
  console.log(`   ✓ Teardown ${success ? 'succeeded' : 'failed'}\n`);

  console.log('=== Demonstration Complete ===');
}

export { demonstrateReplicaSetLifecycle };

if (require.main === module) {
  demonstrateReplicaSetLifecycle().catch(error => {
    console.error('Demonstration failed:', error);
    process.exitCode = 1;
  });
}
