import { describe, expect, it } from '@jest/globals';
import { WifiDirectManager } from './wifi-direct.service';
import { waitForConnection, waitForPeer } from './wifi-direct-session.service';
import { FakeP2pService, peer } from '../testing/fake-p2p.service';

async function setup() {
  const fake = new FakeP2pService();
  const manager = new WifiDirectManager(async () => fake);
  await manager.initialize();
  manager.registerReceiver();
  return { fake, manager };
}

describe('waitForPeer', () => {
  it('returns a device that is already known', async () => {
    const { fake, manager } = await setup();
    fake.peers = [peer('PC-A', '02:00:00:00:00:0a')];
    await manager.requestPeers();

    await expect(waitForPeer(manager, '02:00:00:00:00:0A', 1000)).resolves.toEqual(fake.peers[0]);
  });

  it('waits for the device to be discovered', async () => {
    const { fake, manager } = await setup();
    const found = waitForPeer(manager, '02:00:00:00:00:0b', 1000);
    fake.peers = [peer('PC-A', '02:00:00:00:00:0a'), peer('PC-B', '02:00:00:00:00:0b')];

    await fake.broadcast({ action: 'peers-changed' });

    await expect(found).resolves.toEqual(peer('PC-B', '02:00:00:00:00:0b'));
  });

  it('gives up after the timeout', async () => {
    const { manager } = await setup();

    await expect(waitForPeer(manager, '02:00:00:00:00:0b', 10)).resolves.toBeNull();
  });
});

describe('waitForConnection', () => {
  it('resolves with the connection info once a group forms', async () => {
    const { fake, manager } = await setup();
    const connected = waitForConnection(manager, 1000);
    await manager.requestConnectionInfo();
    fake.connectionInfo = { groupFormed: true, isGroupOwner: true, groupOwnerAddress: '192.168.49.1' };

    await fake.broadcast({ action: 'connection-changed', networkInfo: { isConnected: true } });

    await expect(connected).resolves.toEqual({ groupFormed: true, isGroupOwner: true, groupOwnerAddress: '192.168.49.1' });
  });

  it('resolves with null when no group forms in time', async () => {
    const { manager } = await setup();

    await expect(waitForConnection(manager, 10)).resolves.toBeNull();
  });
});
