import { describe, expect, it } from '@jest/globals';
import {
  colorize,
  formatConnectionInfo,
  formatGroupInfo,
  formatPeerLine,
  formatStatusLine,
  groupQrPayload,
} from './display.util';
import { GroupInfo, PeerDevice } from '../interfaces/wifi-p2p.interface';

const device: PeerDevice = {
  deviceName: 'PC-A',
  deviceAddress: '02:00:00:00:00:0a',
  primaryDeviceType: '1-0050F204-1',
  status: 'available',
};

describe('colorize', () => {
  it('wraps text in the color and a reset', () => {
    expect(colorize('ok', 'green')).toBe('\x1b[32mok\x1b[0m');
  });
});

describe('formatStatusLine', () => {
  it('renders icon, bold label and colored value', () => {
    expect(formatStatusLine('Status', 'Connected', 'connected', 'green')).toBe(
      '✅ \x1b[1mStatus:\x1b[0m \x1b[32mConnected\x1b[0m'
    );
  });

  it('renders a plain value without icon', () => {
    expect(formatStatusLine('Clients', '2')).toBe('\x1b[1mClients:\x1b[0m 2');
  });
});

describe('formatPeerLine', () => {
  it('numbers the device and colors its status', () => {
    expect(formatPeerLine(device, 0)).toBe('1. PC-A (02:00:00:00:00:0a) \x1b[32m[Available]\x1b[0m');
  });

  it('names devices without a name', () => {
    expect(formatPeerLine({ ...device, deviceName: '', status: 'failed' }, 2)).toBe(
      '3. Unknown device (02:00:00:00:00:0a) \x1b[31m[Failed]\x1b[0m'
    );
  });
});

describe('formatConnectionInfo', () => {
  it('reports a disconnected state', () => {
    expect(formatConnectionInfo(false, null, null)).toEqual(['❌ \x1b[1mStatus:\x1b[0m \x1b[31mDisconnected\x1b[0m']);
  });

  it('lists peer and group owner details', () => {
    const lines = formatConnectionInfo(true, { groupFormed: true, isGroupOwner: false, groupOwnerAddress: null }, device);

    expect(lines).toEqual([
      '✅ \x1b[1mStatus:\x1b[0m \x1b[32mConnected\x1b[0m',
      '📱 \x1b[1mPeer:\x1b[0m \x1b[36mPC-A (02:00:00:00:00:0a)\x1b[0m',
      '👑 \x1b[1mGroup Owner:\x1b[0m \x1b[33mPeer\x1b[0m',
      '🔗 \x1b[1mGroup Owner IP:\x1b[0m \x1b[32mUnknown\x1b[0m',
    ]);
  });
});

describe('group helpers', () => {
  const group: GroupInfo = {
    networkName: 'DIRECT-xy-laptop',
    passphrase: 'test-passphrase',
    interfaceName: 'p2p-wlan0-0',
    isGroupOwner: true,
    clients: [],
  };

  it('formats the group without optional fields it lacks', () => {
    expect(formatGroupInfo({ ...group, passphrase: undefined })).toEqual([
      '📡 \x1b[1mNetwork Name:\x1b[0m \x1b[36mDIRECT-xy-laptop\x1b[0m',
      '🔌 \x1b[1mInterface:\x1b[0m p2p-wlan0-0',
      '👑 \x1b[1mRole:\x1b[0m \x1b[33mGroup Owner\x1b[0m',
      '\x1b[1mClients:\x1b[0m 0',
    ]);
  });

  it('builds the WiFi QR payload', () => {
    expect(groupQrPayload(group)).toBe('WIFI:S:DIRECT-xy-laptop;T:WPA;P:test-passphrase;;');
    expect(groupQrPayload({ ...group, passphrase: undefined })).toBe('WIFI:S:DIRECT-xy-laptop;T:nopass;;');
  });
});
