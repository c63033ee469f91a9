import { P2pBroadcast, PeerDevice } from '../interfaces/wifi-p2p.interface';

/**
 * The manager methods a broadcast can be routed to
 */
export interface WifiDirectReceiverTarget {
  log(message: string): void;
  onWifiP2pEnabled(enabled: boolean): void;
  requestPeers(): Promise<void>;
  requestConnectionInfo(): Promise<void>;
  onDisconnected(): void;
  onThisDeviceChanged(device: PeerDevice): void;
}

/**
 * Routes the four WiFi Direct broadcasts to the manager. Holds no state of
 * its own, so duplicated or reordered broadcasts are harmless.
 */
export class WifiDirectReceiver {
  constructor(private readonly manager: WifiDirectReceiverTarget) {}

  async onReceive(broadcast: P2pBroadcast): Promise<void> {
    switch (broadcast.action) {
      case 'state-changed':
        this.manager.onWifiP2pEnabled(broadcast.state === 'enabled');
        break;

      case 'peers-changed':
        this.manager.log('[Broadcast] Peer list changed, fetching the latest list…');
        await this.manager.requestPeers();
        break;

      case 'connection-changed':
        if (broadcast.networkInfo?.isConnected) {
          this.manager.log('[Broadcast] WiFi Direct connected, fetching connection info…');
          await this.manager.requestConnectionInfo();
        } else {
          this.manager.log('[Broadcast] WiFi Direct connection lost');
          this.manager.onDisconnected();
        }
        break;

      case 'this-device-changed':
        if (broadcast.device) {
          this.manager.log(`[Broadcast] This device: ${broadcast.device.deviceName} (${broadcast.device.deviceAddress})`);
          this.manager.onThisDeviceChanged(broadcast.device);
        }
        break;
    }
  }
}
