import { P2P_BUSY, P2P_ERROR, P2P_UNSUPPORTED, PeerDeviceStatus } from '../interfaces/wifi-p2p.interface';

export function failureReasonToString(reason: number): string {
  switch (reason) {
    case P2P_UNSUPPORTED:
      return 'P2P unsupported';
    case P2P_ERROR:
      return 'internal error';
    case P2P_BUSY:
      return 'system busy';
    default:
      return `unknown error (${reason})`;
  }
}

const statusLabels: Record<PeerDeviceStatus, string> = {
  available: 'Available',
  invited: 'Invited',
  connected: 'Connected',
  failed: 'Failed',
  unavailable: 'Unavailable',
};

export function deviceStatusToString(status: PeerDeviceStatus): string {
  return statusLabels[status];
}
