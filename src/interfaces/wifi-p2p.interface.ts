export type PeerDeviceStatus = 'available' | 'invited' | 'connected' | 'failed' | 'unavailable';

export interface PeerDevice {
  readonly deviceName: string;
  readonly deviceAddress: string;
  readonly primaryDeviceType: string;
  readonly status: PeerDeviceStatus;
}

export interface ConnectionInfo {
  readonly groupFormed: boolean;
  readonly isGroupOwner: boolean;
  readonly groupOwnerAddress: string | null;
}

export interface GroupInfo {
  networkName: string;
  passphrase?: string;
  interfaceName: string;
  frequency?: number;
  isGroupOwner: boolean;
  clients: PeerDevice[];
}

export interface P2pConnectConfig {
  deviceAddress: string;
  wps: 'pbc';
  groupOwnerIntent: number;
}

// Reason codes carried by a rejected platform request
export const P2P_ERROR = 0;
export const P2P_UNSUPPORTED = 1;
export const P2P_BUSY = 2;

export type P2pBroadcast =
  | { action: 'state-changed'; state: 'enabled' | 'disabled' }
  | { action: 'peers-changed' }
  | { action: 'connection-changed'; networkInfo: { isConnected: boolean } | null }
  | { action: 'this-device-changed'; device: PeerDevice | null };

export type P2pBroadcastHandler = (broadcast: P2pBroadcast) => void | Promise<void>;

/**
 * The host's WiFi Direct stack. Every request settles once: it resolves when
 * the stack accepted it and rejects with a P2pRequestError otherwise.
 */
export interface WifiP2pService {
  discoverPeers(): Promise<void>;
  stopPeerDiscovery(): Promise<void>;
  requestPeers(): Promise<PeerDevice[]>;
  connect(config: P2pConnectConfig): Promise<void>;
  removeGroup(): Promise<void>;
  cancelConnect(): Promise<void>;
  requestConnectionInfo(): Promise<ConnectionInfo | null>;
  requestGroupInfo(): Promise<GroupInfo | null>;

  /**
   * Subscribe to the stack's state broadcasts
   * @returns A function that removes the subscription
   */
  registerReceiver(handler: P2pBroadcastHandler): () => void;

  close(): Promise<void>;
}

export type WifiP2pServiceProvider = () => Promise<WifiP2pService | null>;

export class PlatformUnsupportedError extends Error {
  constructor(message = 'WiFi Direct is not supported on this device') {
    super(message);
    this.name = 'PlatformUnsupportedError';
  }
}

export class P2pRequestError extends Error {
  readonly reason: number;

  constructor(reason: number, message?: string) {
    super(message ?? `P2P request rejected (reason ${reason})`);
    this.name = 'P2pRequestError';
    this.reason = reason;
  }
}
