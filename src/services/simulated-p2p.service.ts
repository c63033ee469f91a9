import {
  ConnectionInfo,
  GroupInfo,
  P2P_ERROR,
  P2pBroadcast,
  P2pBroadcastHandler,
  P2pConnectConfig,
  P2pRequestError,
  PeerDevice,
  WifiP2pService,
  WifiP2pServiceProvider,
} from '../interfaces/wifi-p2p.interface';

export interface SimulationOptions {
  peers?: PeerDevice[];
  thisDevice?: PeerDevice;
  latencyMs?: number;
  discoveryDelayMs?: number;
  groupFormationDelayMs?: number;
}

export const DEFAULT_SIMULATED_PEERS: readonly PeerDevice[] = [
  { deviceName: 'Office-PC', deviceAddress: '02:11:22:33:44:01', primaryDeviceType: '1-0050F204-1', status: 'available' },
  { deviceName: 'Living-Room-TV', deviceAddress: '02:11:22:33:44:02', primaryDeviceType: '7-0050F204-1', status: 'unavailable' },
  { deviceName: 'Pixel-Tablet', deviceAddress: '02:11:22:33:44:03', primaryDeviceType: '10-0050F204-5', status: 'available' },
];

const SIMULATED_THIS_DEVICE: PeerDevice = {
  deviceName: 'wifi-direct-sim',
  deviceAddress: '02:aa:bb:cc:dd:ee',
  primaryDeviceType: '1-0050F204-1',
  status: 'available',
};

interface SimulatedGroup {
  peer: PeerDevice;
  isGroupOwner: boolean;
}

/**
 * A WiFi Direct stack that runs in-process on timers, for trying the CLI and
 * TUI on machines without a P2P capable radio
 */
export class SimulatedP2pService implements WifiP2pService {
  private readonly peers: readonly PeerDevice[];
  private readonly thisDevice: PeerDevice;
  private readonly latencyMs: number;
  private readonly discoveryDelayMs: number;
  private readonly groupFormationDelayMs: number;

  private handlers = new Set<P2pBroadcastHandler>();
  private timers = new Set<NodeJS.Timeout>();
  private discoveryTimer: NodeJS.Timeout | null = null;
  private visible: PeerDevice[] = [];
  private invitedAddress: string | null = null;
  private failedAddress: string | null = null;
  private group: SimulatedGroup | null = null;

  constructor(options: SimulationOptions = {}) {
    this.peers = options.peers ?? DEFAULT_SIMULATED_PEERS;
    this.thisDevice = options.thisDevice ?? SIMULATED_THIS_DEVICE;
    this.latencyMs = options.latencyMs ?? 50;
    this.discoveryDelayMs = options.discoveryDelayMs ?? 1500;
    this.groupFormationDelayMs = options.groupFormationDelayMs ?? 2000;
  }

  async discoverPeers(): Promise<void> {
    await this.delay(this.latencyMs);
    if (this.discoveryTimer) return;

    this.discoveryTimer = this.schedule(this.discoveryDelayMs, () => {
      this.discoveryTimer = null;
      this.visible = [...this.peers];
      this.broadcast({ action: 'peers-changed' });
    });
  }

  async stopPeerDiscovery(): Promise<void> {
    await this.delay(this.latencyMs);
    if (this.discoveryTimer) {
      this.cancel(this.discoveryTimer);
      this.discoveryTimer = null;
    }
  }

  async requestPeers(): Promise<PeerDevice[]> {
    await this.delay(this.latencyMs);
    return this.visible.map(peer => this.withStatus(peer));
  }

  async connect(config: P2pConnectConfig): Promise<void> {
    await this.delay(this.latencyMs);
    const peer = this.visible.find(p => p.deviceAddress === config.deviceAddress);
    if (!peer) {
      throw new P2pRequestError(P2P_ERROR, `No such peer: ${config.deviceAddress}`);
    }

    this.invitedAddress = peer.deviceAddress;
    this.failedAddress = null;
    this.broadcast({ action: 'peers-changed' });

    this.schedule(this.groupFormationDelayMs, () => {
      if (this.invitedAddress !== peer.deviceAddress) return;
      this.invitedAddress = null;

      if (peer.status === 'unavailable') {
        this.failedAddress = peer.deviceAddress;
        this.broadcast({ action: 'connection-changed', networkInfo: { isConnected: false } });
      } else {
        this.group = { peer, isGroupOwner: config.groupOwnerIntent > 7 };
        this.broadcast({ action: 'connection-changed', networkInfo: { isConnected: true } });
      }
      this.broadcast({ action: 'peers-changed' });
    });
  }

  async removeGroup(): Promise<void> {
    await this.delay(this.latencyMs);
    if (!this.group) {
      throw new P2pRequestError(P2P_ERROR, 'No group to remove');
    }
    this.group = null;
    this.broadcast({ action: 'connection-changed', networkInfo: { isConnected: false } });
    this.broadcast({ action: 'peers-changed' });
  }

  async cancelConnect(): Promise<void> {
    await this.delay(this.latencyMs);
    this.invitedAddress = null;
  }

  async requestConnectionInfo(): Promise<ConnectionInfo | null> {
    await this.delay(this.latencyMs);
    if (!this.group) {
      return { groupFormed: false, isGroupOwner: false, groupOwnerAddress: null };
    }
    return { groupFormed: true, isGroupOwner: this.group.isGroupOwner, groupOwnerAddress: '192.168.49.1' };
  }

  async requestGroupInfo(): Promise<GroupInfo | null> {
    await this.delay(this.latencyMs);
    if (!this.group) return null;

    const owner = this.group.isGroupOwner ? this.thisDevice : this.group.peer;
    return {
      networkName: `DIRECT-sim-${owner.deviceName}`,
      passphrase: 'test-passphrase',
      interfaceName: 'p2p-sim-0',
      frequency: 2437,
      isGroupOwner: this.group.isGroupOwner,
      clients: this.group.isGroupOwner ? [this.withStatus(this.group.peer)] : [],
    };
  }

  registerReceiver(handler: P2pBroadcastHandler): () => void {
    this.handlers.add(handler);
    this.schedule(0, () => {
      this.dispatch(handler, { action: 'state-changed', state: 'enabled' });
      this.dispatch(handler, { action: 'this-device-changed', device: this.thisDevice });
    });
    return () => {
      this.handlers.delete(handler);
    };
  }

  async close(): Promise<void> {
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.discoveryTimer = null;
    this.handlers.clear();
  }

  private withStatus(peer: PeerDevice): PeerDevice {
    if (this.group?.peer.deviceAddress === peer.deviceAddress) return { ...peer, status: 'connected' };
    if (this.invitedAddress === peer.deviceAddress) return { ...peer, status: 'invited' };
    if (this.failedAddress === peer.deviceAddress) return { ...peer, status: 'failed' };
    return peer;
  }

  private broadcast(broadcast: P2pBroadcast): void {
    for (const handler of [...this.handlers]) {
      this.dispatch(handler, broadcast);
    }
  }

  private dispatch(handler: P2pBroadcastHandler, broadcast: P2pBroadcast): void {
    Promise.resolve(handler(broadcast)).catch(error => {
      console.error(`Error handling ${broadcast.action} broadcast:`, error);
    });
  }

  private schedule(ms: number, action: () => void): NodeJS.Timeout {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      action();
    }, ms);
    this.timers.add(timer);
    return timer;
  }

  private cancel(timer: NodeJS.Timeout): void {
    clearTimeout(timer);
    this.timers.delete(timer);
  }

  private delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}

export function createSimulatedProvider(options: SimulationOptions = {}): WifiP2pServiceProvider {
  return async () => new SimulatedP2pService(options);
}
