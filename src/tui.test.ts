import { describe, expect, it } from '@jest/globals';
import { formatConnectionPane, formatDeviceItem, smartTruncateTagAware } from './tui';
import { PeerDevice } from './interfaces/wifi-p2p.interface';

const device: PeerDevice = {
  deviceName: 'PC-A',
  deviceAddress: '02:00:00:00:00:0a',
  primaryDeviceType: '1-0050F204-1',
  status: 'invited',
};

describe('smartTruncateTagAware', () => {
  it('leaves short text alone', () => {
    expect(smartTruncateTagAware('{red-fg}Hi{/red-fg}', 5)).toBe('{red-fg}Hi{/red-fg}');
  });

  it('counts only visible characters', () => {
    expect(smartTruncateTagAware('{green-fg}Hello world{/green-fg}', 5)).toBe('{green-fg}Hello');
  });

  it('returns nothing for a zero width', () => {
    expect(smartTruncateTagAware('Hello', 0)).toBe('');
  });
});

describe('formatDeviceItem', () => {
  it('tags the status with its color', () => {
    expect(formatDeviceItem(device)).toBe('PC-A (02:00:00:00:00:0a) {yellow-fg}Invited{/yellow-fg}');
  });

  it('strips braces from device names', () => {
    expect(formatDeviceItem({ ...device, deviceName: '{bold}x{/bold}', status: 'unavailable' })).toBe(
      'boldx/bold (02:00:00:00:00:0a) {grey-fg}Unavailable{/grey-fg}'
    );
  });
});

describe('formatConnectionPane', () => {
  it('shows a disconnected link', () => {
    expect(formatConnectionPane(true, null, device)).toBe('{bold}Connection{/bold}\n\nStatus: {red-fg}Disconnected{/red-fg}');
  });

  it('shows the group owner details', () => {
    const pane = formatConnectionPane(true, { groupFormed: true, isGroupOwner: true, groupOwnerAddress: '192.168.49.1' }, device);

    expect(pane).toBe(
      '{bold}Connection{/bold}\n\n' +
        'Status: {green-fg}Connected{/green-fg}\n' +
        'Peer: {cyan-fg}PC-A{/cyan-fg} (02:00:00:00:00:0a)\n' +
        'Group Owner: {yellow-fg}This device{/yellow-fg}\n' +
        'Group Owner IP: 192.168.49.1\n'
    );
  });
});
