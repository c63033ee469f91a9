import { ConnectionInfo, PeerDevice } from '../interfaces/wifi-p2p.interface';
import { WifiDirectListener, WifiDirectManager } from './wifi-direct.service';

/**
 * Resolve with the first value a listener reports, or null once the timeout
 * passes. The listener is removed either way.
 */
function waitForEvent<T>(
  manager: WifiDirectManager,
  timeoutMs: number,
  listen: (resolve: (value: T) => void) => WifiDirectListener,
): Promise<T | null> {
  return new Promise(resolve => {
    let settled = false;
    const finish = (value: T | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      unsubscribe();
      resolve(value);
    };
    const timer = setTimeout(() => finish(null), timeoutMs);
    const unsubscribe = manager.addListener(listen(value => finish(value)));
  });
}

export function waitForConnection(manager: WifiDirectManager, timeoutMs: number): Promise<ConnectionInfo | null> {
  return waitForEvent<ConnectionInfo>(manager, timeoutMs, resolve => ({
    onConnectionChanged: (connected, info) => {
      if (connected && info) resolve(info);
    },
  }));
}

/**
 * Wait until a peer with the given address shows up, checking the devices
 * already known first
 */
export function waitForPeer(manager: WifiDirectManager, address: string, timeoutMs: number): Promise<PeerDevice | null> {
  const wanted = address.toLowerCase();
  const known = manager.getDevices().find(device => device.deviceAddress.toLowerCase() === wanted);
  if (known) return Promise.resolve(known);

  return waitForEvent<PeerDevice>(manager, timeoutMs, resolve => ({
    onDevicesChanged: devices => {
      const found = devices.find(device => device.deviceAddress.toLowerCase() === wanted);
      if (found) resolve(found);
    },
  }));
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
