import * as qrcode from 'qrcode-terminal';
import { ConnectionInfo, GroupInfo, PeerDevice, PeerDeviceStatus } from '../interfaces/wifi-p2p.interface';
import { deviceStatusToString } from './p2p-labels.util';

// ANSI color codes for terminal output
export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  underline: '\x1b[4m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
};

// Icons for different status elements
export const icons = {
  peer: '📱',
  group: '📡',
  owner: '👑',
  ip: '🔗',
  interface: '🔌',
  connected: '✅',
  disconnected: '❌',
  searching: '🔍',
  security: '🔐',
};

/**
 * Colorize text for terminal output
 */
export function colorize(text: string, color: keyof typeof colors): string {
  return colors[color] + text + colors.reset;
}

const statusColors: Record<PeerDeviceStatus, keyof typeof colors> = {
  available: 'green',
  invited: 'yellow',
  connected: 'cyan',
  failed: 'red',
  unavailable: 'dim',
};

/**
 * Format a label-value pair with optional icon and color
 */
export function formatStatusLine(
  label: string,
  value: string,
  icon?: keyof typeof icons,
  valueColor?: keyof typeof colors
): string {
  const iconStr = icon ? `${icons[icon]} ` : '';
  const valueStr = valueColor ? colorize(value, valueColor) : value;
  return `${iconStr}${colorize(label + ':', 'bold')} ${valueStr}`;
}

/**
 * Creates a styled section header for status outputs
 */
export function formatSectionHeader(title: string): string {
  const line = '─'.repeat(title.length + 4);
  return '\n' + colorize(`┌${line}┐`, 'cyan') +
         '\n' + colorize(`│  ${title}  │`, 'cyan') +
         '\n' + colorize(`└${line}┘`, 'cyan');
}

/**
 * One numbered line of a peer list, e.g. `1. PC-A (aa:bb:cc:dd:ee:01) [Available]`
 */
export function formatPeerLine(device: PeerDevice, index: number): string {
  const status = colorize(`[${deviceStatusToString(device.status)}]`, statusColors[device.status]);
  return `${index + 1}. ${device.deviceName || 'Unknown device'} (${device.deviceAddress}) ${status}`;
}

export function formatConnectionInfo(connected: boolean, info: ConnectionInfo | null, device: PeerDevice | null): string[] {
  if (!connected || !info) {
    return [formatStatusLine('Status', 'Disconnected', 'disconnected', 'red')];
  }

  const lines = [formatStatusLine('Status', 'Connected', 'connected', 'green')];
  if (device) {
    lines.push(formatStatusLine('Peer', `${device.deviceName} (${device.deviceAddress})`, 'peer', 'cyan'));
  }
  lines.push(formatStatusLine('Group Owner', info.isGroupOwner ? 'This device' : 'Peer', 'owner', 'yellow'));
  lines.push(formatStatusLine('Group Owner IP', info.groupOwnerAddress ?? 'Unknown', 'ip', 'green'));
  return lines;
}

export function formatGroupInfo(group: GroupInfo): string[] {
  const lines = [
    formatStatusLine('Network Name', group.networkName, 'group', 'cyan'),
    formatStatusLine('Interface', group.interfaceName, 'interface'),
    formatStatusLine('Role', group.isGroupOwner ? 'Group Owner' : 'Client', 'owner', 'yellow'),
  ];
  if (group.frequency) {
    lines.push(formatStatusLine('Frequency', `${group.frequency} MHz`));
  }
  if (group.passphrase) {
    lines.push(formatStatusLine('Passphrase', group.passphrase, 'security'));
  }
  lines.push(formatStatusLine('Clients', String(group.clients.length)));
  group.clients.forEach((client, i) => lines.push('  ' + formatPeerLine(client, i)));
  return lines;
}

/**
 * WiFi QR payload that lets a legacy (non-P2P) station join a group as a client
 */
export function groupQrPayload(group: GroupInfo): string {
  return group.passphrase
    ? `WIFI:S:${group.networkName};T:WPA;P:${group.passphrase};;`
    : `WIFI:S:${group.networkName};T:nopass;;`;
}

export function generateGroupQR(group: GroupInfo): Promise<void> {
  return new Promise((resolve) => {
    console.log('');
    qrcode.generate(groupQrPayload(group), { small: true }, (code) => {
      console.log(code);
      resolve();
    });
  });
}
