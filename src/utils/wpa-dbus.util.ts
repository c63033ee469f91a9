import * as dbus from 'dbus-next';
import { P2P_BUSY, P2P_ERROR, P2P_UNSUPPORTED } from '../interfaces/wifi-p2p.interface';

/**
 * Value carried by a D-Bus variant, or the value itself when it is not one
 */
export function unwrapVariant(value: unknown): unknown {
  if (value instanceof dbus.Variant) {
    const inner: unknown = value.value;
    return inner;
  }
  return value;
}

/**
 * Bytes of an `ay` value, which dbus-next hands out as a Buffer
 */
export function bytesOf(value: unknown): number[] {
  const raw = unwrapVariant(value);
  if (Buffer.isBuffer(raw)) return [...raw];
  if (Array.isArray(raw) && raw.every((b): b is number => typeof b === 'number')) return raw;
  return [];
}

export function stringOf(value: unknown, fallback = ''): string {
  const raw = unwrapVariant(value);
  return typeof raw === 'string' ? raw : fallback;
}

export function numberOf(value: unknown): number | undefined {
  const raw = unwrapVariant(value);
  return typeof raw === 'number' ? raw : undefined;
}

export function stringArrayOf(value: unknown): string[] {
  const raw = unwrapVariant(value);
  if (!Array.isArray(raw)) return [];
  return raw.filter((item): item is string => typeof item === 'string');
}

/**
 * Entries of an `a{sv}` dictionary with their variants unwrapped
 */
export function dictOf(value: unknown): Map<string, unknown> {
  const raw = unwrapVariant(value);
  const dict = new Map<string, unknown>();
  if (typeof raw !== 'object' || raw === null) return dict;
  for (const [key, entry] of Object.entries(raw)) {
    dict.set(key, unwrapVariant(entry));
  }
  return dict;
}

export function formatMacAddress(bytes: readonly number[]): string {
  return bytes.map(b => b.toString(16).padStart(2, '0')).join(':');
}

/**
 * WSC primary device type as `category-OUI-subcategory`, e.g. `1-0050F204-1`
 */
export function formatPrimaryDeviceType(bytes: readonly number[]): string {
  if (bytes.length !== 8) return '';
  const category = (bytes[0] << 8) | bytes[1];
  const oui = bytes.slice(2, 6).map(b => b.toString(16).padStart(2, '0')).join('').toUpperCase();
  const subcategory = (bytes[6] << 8) | bytes[7];
  return `${category}-${oui}-${subcategory}`;
}

/**
 * Peer objects are named after the device address: `.../Peers/aabbccddeeff`
 */
export function peerPathToAddress(path: string): string {
  const hex = path.slice(path.lastIndexOf('/') + 1);
  if (!/^[0-9a-fA-F]{12}$/.test(hex)) return '';
  return hex.toLowerCase().match(/../g)?.join(':') ?? '';
}

export function addressToPeerPath(interfacePath: string, address: string): string {
  return `${interfacePath}/Peers/${address.replace(/:/g, '').toLowerCase()}`;
}

/**
 * Gateway of `ip -4 route show dev <ifname>` output
 */
export function parseGatewayFromRoutes(stdout: string): string | null {
  for (const line of stdout.split('\n')) {
    const match = line.trim().match(/^default via (\d{1,3}(?:\.\d{1,3}){3})/);
    if (match) return match[1];
  }
  return null;
}

/**
 * Reason code for an error returned by wpa_supplicant
 */
export function reasonFromDBusError(error: unknown): number {
  const type = error instanceof dbus.DBusError ? error.type : '';
  if (/Busy|InProgress/.test(type)) return P2P_BUSY;
  if (/Unsupported|NotSupported/.test(type)) return P2P_UNSUPPORTED;
  return P2P_ERROR;
}
