import { describe, expect, it } from '@jest/globals';
import * as dbus from 'dbus-next';
import {
  addressToPeerPath,
  bytesOf,
  dictOf,
  formatMacAddress,
  formatPrimaryDeviceType,
  parseGatewayFromRoutes,
  peerPathToAddress,
  reasonFromDBusError,
  stringArrayOf,
  stringOf,
} from './wpa-dbus.util';
import { P2P_BUSY, P2P_ERROR, P2P_UNSUPPORTED } from '../interfaces/wifi-p2p.interface';

const IFACE = '/fi/w1/wpa_supplicant1/Interfaces/3';

describe('variant helpers', () => {
  it('unwraps variants', () => {
    expect(stringOf(new dbus.Variant('s', 'Office-PC'))).toBe('Office-PC');
    expect(stringOf(new dbus.Variant('u', 4), 'none')).toBe('none');
    expect(stringArrayOf(new dbus.Variant('ao', [`${IFACE}/Peers/020000000001`]))).toEqual([`${IFACE}/Peers/020000000001`]);
  });

  it('reads bytes from buffers and arrays', () => {
    expect(bytesOf(new dbus.Variant('ay', Buffer.from([2, 0, 0xab])))).toEqual([2, 0, 0xab]);
    expect(bytesOf([1, 2])).toEqual([1, 2]);
    expect(bytesOf('x')).toEqual([]);
  });

  it('unwraps dictionary entries', () => {
    const dict = dictOf({ role: new dbus.Variant('s', 'GO'), frequency: new dbus.Variant('q', 2437) });
    expect(dict.get('role')).toBe('GO');
    expect(dict.get('frequency')).toBe(2437);
    expect(dictOf(null).size).toBe(0);
  });
});

describe('formatting', () => {
  it('formats device addresses', () => {
    expect(formatMacAddress([0x02, 0x11, 0x22, 0x33, 0x44, 0x0a])).toBe('02:11:22:33:44:0a');
  });

  it('formats the primary device type', () => {
    expect(formatPrimaryDeviceType([0, 10, 0x00, 0x50, 0xf2, 0x04, 0, 5])).toBe('10-0050F204-5');
    expect(formatPrimaryDeviceType([0, 1])).toBe('');
  });
});

describe('peer paths', () => {
  it('maps peer object paths to addresses', () => {
    expect(peerPathToAddress(`${IFACE}/Peers/02AABBCCDDEE`)).toBe('02:aa:bb:cc:dd:ee');
    expect(peerPathToAddress(`${IFACE}/Groups/0`)).toBe('');
  });

  it('maps addresses to peer object paths', () => {
    expect(addressToPeerPath(IFACE, '02:AA:bb:cc:dd:ee')).toBe(`${IFACE}/Peers/02aabbccddee`);
  });
});

describe('parseGatewayFromRoutes', () => {
  it('finds the default route', () => {
    const routes = '192.168.49.0/24 proto kernel scope link src 192.168.49.23\ndefault via 192.168.49.1 metric 600\n';
    expect(parseGatewayFromRoutes(routes)).toBe('192.168.49.1');
  });

  it('returns null without a default route', () => {
    expect(parseGatewayFromRoutes('192.168.49.0/24 proto kernel scope link\n')).toBeNull();
  });
});

describe('reasonFromDBusError', () => {
  it('maps wpa_supplicant error names to reason codes', () => {
    expect(reasonFromDBusError(new dbus.DBusError('fi.w1.wpa_supplicant1.Busy', 'busy'))).toBe(P2P_BUSY);
    expect(reasonFromDBusError(new dbus.DBusError('fi.w1.wpa_supplicant1.NotSupported', 'no'))).toBe(P2P_UNSUPPORTED);
    expect(reasonFromDBusError(new dbus.DBusError('fi.w1.wpa_supplicant1.UnknownError', 'failed'))).toBe(P2P_ERROR);
    expect(reasonFromDBusError(new Error('socket closed'))).toBe(P2P_ERROR);
  });
});
