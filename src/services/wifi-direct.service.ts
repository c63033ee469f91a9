import {
  ConnectionInfo,
  GroupInfo,
  P2pConnectConfig,
  PeerDevice,
  PlatformUnsupportedError,
  WifiP2pService,
  WifiP2pServiceProvider,
} from '../interfaces/wifi-p2p.interface';
import { WifiDirectReceiver, WifiDirectReceiverTarget } from './wifi-direct-receiver.service';
import { deviceStatusToString, failureReasonToString } from '../utils/p2p-labels.util';
import { errorMessage, reasonOf } from '../utils/error.util';
import { colorize } from '../utils/display.util';

export interface WifiDirectListener {
  onLog?(message: string): void;
  onDevicesChanged?(devices: readonly PeerDevice[]): void;
  onConnectionChanged?(connected: boolean, info: ConnectionInfo | null): void;
  onStatusChanged?(status: string): void;
  onThisDeviceChanged?(device: PeerDevice | null): void;
  onP2pStateChanged?(enabled: boolean): void;
}

export interface WifiDirectState {
  isConnected: boolean;
  isDiscovering: boolean;
  connectedDevice: PeerDevice | null;
  connectionInfo: ConnectionInfo | null;
  autoConnectPending: boolean;
  p2pEnabled: boolean | null;
  thisDevice: PeerDevice | null;
}

export interface ShutdownOptions {
  /** Remove the current group on the way out (default true) */
  disconnect?: boolean;
}

export interface WifiDirectManagerOptions {
  groupOwnerIntent?: number;
  verbose?: boolean;
}

// An accepted request supersedes the older requests of its channel
type RequestChannel = 'discovery' | 'connection' | 'peers' | 'info';

const DIVIDER = '━'.repeat(30);
const BANNER = '═'.repeat(31);

function initialState(): WifiDirectState {
  return {
    isConnected: false,
    isDiscovering: false,
    connectedDevice: null,
    connectionInfo: null,
    autoConnectPending: false,
    p2pEnabled: null,
    thisDevice: null,
  };
}

/**
 * Drives the host's WiFi Direct stack: discovery, push-button connection and
 * group removal. Results of the stack's requests and broadcasts are turned
 * into state changes and listener notifications. No public operation rejects;
 * failures end up on the log and status channels.
 */
export class WifiDirectManager implements WifiDirectReceiverTarget {
  private service: WifiP2pService | null = null;
  private unregisterBroadcasts: (() => void) | null = null;
  private listeners: WifiDirectListener[] = [];
  private devices: PeerDevice[] = [];
  private state: WifiDirectState = initialState();
  private requestSeq = 0;
  private readonly latestAccepted: Record<RequestChannel, number> = {
    discovery: 0,
    connection: 0,
    peers: 0,
    info: 0,
  };
  private readonly groupOwnerIntent: number;
  private readonly verbose: boolean;

  constructor(private readonly provider: WifiP2pServiceProvider, options: WifiDirectManagerOptions = {}) {
    this.groupOwnerIntent = options.groupOwnerIntent ?? 0;
    this.verbose = options.verbose ?? false;
  }

  addListener(listener: WifiDirectListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  getState(): Readonly<WifiDirectState> {
    return { ...this.state };
  }

  getDevices(): readonly PeerDevice[] {
    return [...this.devices];
  }

  isInitialized(): boolean {
    return this.service !== null;
  }

  async initialize(): Promise<boolean> {
    if (this.service) return true;

    this.log('Initializing WiFi Direct...');
    try {
      this.service = await this.provider();
    } catch (error) {
      this.service = null;
      if (error instanceof PlatformUnsupportedError) {
        this.log(`[Error] ${error.message}`);
      } else {
        this.log(`[Error] WiFi Direct initialization failed: ${errorMessage(error)}`);
      }
      return false;
    }

    if (!this.service) {
      this.log('[Error] This device does not support WiFi Direct');
      return false;
    }
    this.log('WiFi Direct initialized');
    return true;
  }

  registerReceiver(): void {
    const service = this.service;
    if (!service) {
      this.log('[Error] Manager not initialized');
      return;
    }
    if (this.unregisterBroadcasts) return;

    const receiver = new WifiDirectReceiver(this);
    this.unregisterBroadcasts = service.registerReceiver(broadcast => receiver.onReceive(broadcast));
    this.log('Broadcast receiver registered');
  }

  unregisterReceiver(): void {
    const unregister = this.unregisterBroadcasts;
    if (!unregister) return;
    this.unregisterBroadcasts = null;

    try {
      unregister();
      this.log('Broadcast receiver unregistered');
    } catch (error) {
      console.warn(`[WifiDirect] Unregister receiver error: ${errorMessage(error)}`);
    }
  }

  async discoverPeers(): Promise<void> {
    const service = this.requireService();
    if (!service) return;

    this.log('Searching for nearby WiFi Direct devices...');
    this.notifyStatus('Status: searching for devices…');

    await this.track(
      'discovery',
      () => service.discoverPeers(),
      () => {
        this.state.isDiscovering = true;
        this.log('Peer discovery started, waiting for results…');
      },
      reason => {
        // isDiscovering keeps the intent of the last accepted start or stop
        const text = failureReasonToString(reason);
        this.log(`[Error] Peer discovery failed: ${text}`);
        this.notifyStatus(`Status: discovery failed (${text})`);
      },
    );
  }

  async stopDiscovery(): Promise<void> {
    const service = this.service;
    if (!service) return;

    await this.track(
      'discovery',
      () => service.stopPeerDiscovery(),
      () => {
        this.state.isDiscovering = false;
        this.log('Peer discovery stopped');
        this.notifyStatus('Status: idle');
      },
      reason => {
        this.log(`[Warning] Failed to stop discovery: ${failureReasonToString(reason)}`);
      },
    );
  }

  async requestPeers(): Promise<void> {
    const service = this.service;
    if (!service) return;

    await this.track(
      'peers',
      () => service.requestPeers(),
      async devices => {
        this.devices = [...devices];

        if (devices.length === 0) {
          this.log('Device list updated: no devices found');
        } else {
          this.log(`Found ${devices.length} device(s):`);
          devices.forEach((device, index) => {
            this.log(`  [${index + 1}] ${device.deviceName} (${device.deviceAddress}) - ${deviceStatusToString(device.status)}`);
          });
        }

        const snapshot = this.getDevices();
        this.emit(listener => listener.onDevicesChanged?.(snapshot));

        // One-shot: the flag is consumed by the first non-empty snapshot
        if (this.state.autoConnectPending && devices.length > 0) {
          this.log('Auto-connect: connecting to the first available device...');
          const target = devices.find(device => device.status === 'available') ?? devices[0];
          this.state.autoConnectPending = false;
          await this.connectToDevice(target);
        }
      },
      reason => {
        this.log(`[Warning] Failed to fetch the peer list: ${failureReasonToString(reason)}`);
      },
    );
  }

  async connectToDevice(device: PeerDevice): Promise<void> {
    const service = this.requireService();
    if (!service) return;

    this.log(DIVIDER);
    this.log(`Connecting to: ${device.deviceName}`);
    this.log(`  Address: ${device.deviceAddress}`);
    this.log(`  Type: ${device.primaryDeviceType}`);
    this.log(`  Status: ${deviceStatusToString(device.status)}`);
    this.log(DIVIDER);
    this.notifyStatus(`Status: connecting to ${device.deviceName}…`);

    const config: P2pConnectConfig = {
      deviceAddress: device.deviceAddress,
      wps: 'pbc',
      groupOwnerIntent: this.groupOwnerIntent,
    };

    await this.track(
      'connection',
      () => service.connect(config),
      () => {
        this.log('Connection request sent, waiting for the peer to accept…');
        // Not confirmed until a connection-changed broadcast arrives
        this.state.connectedDevice = device;
      },
      reason => {
        const text = failureReasonToString(reason);
        this.log(`[Error] Connection request failed: ${text}`);
        this.notifyStatus(`Status: connection failed (${text})`);
      },
    );
  }

  async autoDiscoverAndConnect(): Promise<void> {
    this.log(BANNER);
    this.log('Starting auto-connect');
    this.log(BANNER);

    if (this.state.isConnected) {
      this.log('Already connected, disconnecting first…');
      await this.disconnect();
    }

    this.state.autoConnectPending = true;
    await this.discoverPeers();
  }

  async requestConnectionInfo(): Promise<void> {
    const service = this.service;
    if (!service) return;

    await this.track(
      'info',
      () => service.requestConnectionInfo(),
      info => {
        this.state.connectionInfo = info;
        if (info && info.groupFormed) {
          const established = info;
          this.state.isConnected = true;
          this.log(BANNER);
          this.log('WiFi Direct connection established!');
          this.log(`  Group owner: ${established.isGroupOwner ? 'this device' : 'peer'}`);
          this.log(`  Group owner IP: ${established.groupOwnerAddress ?? 'unknown'}`);
          this.log(BANNER);
          this.notifyStatus('Status: connected');
          this.emit(listener => listener.onConnectionChanged?.(true, established));
        } else {
          this.state.isConnected = false;
          this.log('Connection info updated: no group formed');
          this.emit(listener => listener.onConnectionChanged?.(false, null));
        }
      },
      reason => {
        this.log(`[Warning] Failed to fetch connection info: ${failureReasonToString(reason)}`);
      },
    );
  }

  async requestGroupInfo(): Promise<GroupInfo | null> {
    const service = this.service;
    if (!service) return null;

    try {
      const group = await service.requestGroupInfo();
      if (!group) {
        this.log('No P2P group is active');
        return null;
      }
      this.log(`Group ${group.networkName} on ${group.interfaceName} (${group.isGroupOwner ? 'owner' : 'client'}, ${group.clients.length} client(s))`);
      return group;
    } catch (error) {
      this.log(`[Warning] Failed to fetch group info: ${failureReasonToString(reasonOf(error))}`);
      return null;
    }
  }

  async disconnect(): Promise<void> {
    const service = this.service;
    if (!service) return;

    this.log('Disconnecting WiFi Direct…');
    this.notifyStatus('Status: disconnecting…');

    await this.track(
      'connection',
      () => service.removeGroup(),
      () => {
        this.clearConnection();
        this.log('Disconnected');
        this.notifyStatus('Status: disconnected');
        this.emit(listener => listener.onConnectionChanged?.(false, null));
      },
      async reason => {
        this.log(`[Warning] Disconnect failed: ${failureReasonToString(reason)}`);
        await this.cancelConnect();
      },
    );
  }

  private async cancelConnect(): Promise<void> {
    const service = this.service;
    if (!service) return;

    await this.track(
      'connection',
      () => service.cancelConnect(),
      () => {
        this.clearConnection();
        this.log('Connection cancelled');
        this.notifyStatus('Status: disconnected');
      },
      reason => {
        this.log(`[Warning] Failed to cancel the connection: ${failureReasonToString(reason)}`);
        this.notifyStatus('Status: disconnect error');
      },
    );
  }

  onWifiP2pEnabled(enabled: boolean): void {
    this.state.p2pEnabled = enabled;
    if (enabled) {
      this.log('WiFi Direct is enabled');
    } else {
      this.log('[Warning] WiFi Direct is disabled, please turn on WiFi');
      this.notifyStatus('Status: WiFi Direct disabled');
    }
    this.emit(listener => listener.onP2pStateChanged?.(enabled));
  }

  onDisconnected(): void {
    this.clearConnection();
    this.notifyStatus('Status: disconnected');
    this.emit(listener => listener.onConnectionChanged?.(false, null));
  }

  onThisDeviceChanged(device: PeerDevice): void {
    this.state.thisDevice = device;
    this.emit(listener => listener.onThisDeviceChanged?.(device));
  }

  async shutdown(options: ShutdownOptions = {}): Promise<void> {
    const service = this.service;
    if (!service) return;

    this.log('Shutting down WiFi Direct manager...');
    const pending: Promise<void>[] = [];
    if (this.state.isDiscovering) {
      pending.push(this.stopDiscovery());
    }
    if (this.state.isConnected && options.disconnect !== false) {
      pending.push(this.disconnect());
    }
    this.unregisterReceiver();
    this.service = null;

    await Promise.all(pending);
    try {
      await service.close();
    } catch (error) {
      console.warn(`[WifiDirect] Failed to release the P2P service: ${errorMessage(error)}`);
    }

    this.state = initialState();
    this.devices = [];
    this.log('WiFi Direct manager closed');
  }

  log(message: string): void {
    if (this.verbose) {
      console.log(`${colorize('[WifiDirect]', 'dim')} ${message}`);
    }
    this.emit(listener => listener.onLog?.(message));
  }

  private notifyStatus(status: string): void {
    this.emit(listener => listener.onStatusChanged?.(status));
  }

  private clearConnection(): void {
    this.state.isConnected = false;
    this.state.connectedDevice = null;
    this.state.connectionInfo = null;
  }

  private requireService(): WifiP2pService | null {
    if (!this.service) {
      this.log('[Error] Manager not initialized');
    }
    return this.service;
  }

  /**
   * Issue a request on a channel and hand its outcome to one of the handlers,
   * unless a newer request on the same channel has been accepted meanwhile.
   * Rejections never supersede anything.
   */
  private async track<T>(
    channel: RequestChannel,
    request: () => Promise<T>,
    onSuccess: (value: T) => void | Promise<void>,
    onFailure: (reason: number) => void | Promise<void>,
  ): Promise<void> {
    const id = ++this.requestSeq;

    let value: T;
    try {
      value = await request();
    } catch (error) {
      if (this.isStale(channel, id)) return;
      await onFailure(reasonOf(error));
      return;
    }

    if (this.isStale(channel, id)) return;
    this.latestAccepted[channel] = id;
    await onSuccess(value);
  }

  private isStale(channel: RequestChannel, id: number): boolean {
    if (this.latestAccepted[channel] < id) return false;
    this.log(`Ignoring stale ${channel} result (request #${id})`);
    return true;
  }

  private emit(notify: (listener: WifiDirectListener) => void): void {
    for (const listener of [...this.listeners]) {
      try {
        notify(listener);
      } catch (error) {
        console.error('Error in WiFi Direct listener:', error);
      }
    }
  }
}
