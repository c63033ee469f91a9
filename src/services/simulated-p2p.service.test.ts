import { afterEach, describe, expect, it } from '@jest/globals';
import { WifiDirectManager } from './wifi-direct.service';
import { DEFAULT_SIMULATED_PEERS, createSimulatedProvider } from './simulated-p2p.service';
import { waitForConnection, waitForPeer } from './wifi-direct-session.service';
import { PeerDevice } from '../interfaces/wifi-p2p.interface';

const timings = { latencyMs: 1, discoveryDelayMs: 5, groupFormationDelayMs: 10 };

describe('WifiDirectManager on the simulated stack', () => {
  let manager: WifiDirectManager;

  afterEach(async () => {
    await manager.shutdown();
  });

  async function start(peers: readonly PeerDevice[] = DEFAULT_SIMULATED_PEERS) {
    manager = new WifiDirectManager(createSimulatedProvider({ ...timings, peers: [...peers] }));
    await manager.initialize();
    manager.registerReceiver();
  }

  it('auto-connects to the first available device and disconnects', async () => {
    await start();
    const connected = waitForConnection(manager, 2000);

    await manager.autoDiscoverAndConnect();

    await expect(connected).resolves.toEqual({ groupFormed: true, isGroupOwner: false, groupOwnerAddress: '192.168.49.1' });
    const state = manager.getState();
    expect(state.connectedDevice?.deviceName).toBe('Office-PC');
    expect(state.p2pEnabled).toBe(true);
    expect(state.thisDevice?.deviceName).toBe('wifi-direct-sim');

    const group = await manager.requestGroupInfo();
    expect(group?.networkName).toBe('DIRECT-sim-Office-PC');
    expect(group?.isGroupOwner).toBe(false);

    await manager.disconnect();
    expect(manager.getState().isConnected).toBe(false);
    await expect(manager.requestGroupInfo()).resolves.toBeNull();
  });

  it('marks an unreachable device as failed', async () => {
    await start([DEFAULT_SIMULATED_PEERS[1]]);
    const failed = new Promise<PeerDevice>(resolve => {
      manager.addListener({
        onDevicesChanged: devices => {
          if (devices[0]?.status === 'failed') resolve(devices[0]);
        },
      });
    });

    await manager.discoverPeers();
    const device = await waitForPeer(manager, '02:11:22:33:44:02', 2000);
    expect(device?.status).toBe('unavailable');
    if (!device) return;
    await manager.connectToDevice(device);

    await expect(failed).resolves.toEqual({ ...DEFAULT_SIMULATED_PEERS[1], status: 'failed' });
    expect(manager.getState().connectedDevice).toBeNull();
  });
});
