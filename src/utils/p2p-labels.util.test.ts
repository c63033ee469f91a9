import { describe, expect, it } from '@jest/globals';
import { deviceStatusToString, failureReasonToString } from './p2p-labels.util';
import { errorMessage, reasonOf } from './error.util';
import { P2P_BUSY, P2P_ERROR, P2P_UNSUPPORTED, P2pRequestError } from '../interfaces/wifi-p2p.interface';

describe('failureReasonToString', () => {
  it('names the known reason codes', () => {
    expect(failureReasonToString(P2P_ERROR)).toBe('internal error');
    expect(failureReasonToString(P2P_UNSUPPORTED)).toBe('P2P unsupported');
    expect(failureReasonToString(P2P_BUSY)).toBe('system busy');
  });

  it('keeps the code of an unknown reason', () => {
    expect(failureReasonToString(7)).toBe('unknown error (7)');
  });
});

describe('deviceStatusToString', () => {
  it('labels every status', () => {
    expect(deviceStatusToString('available')).toBe('Available');
    expect(deviceStatusToString('invited')).toBe('Invited');
    expect(deviceStatusToString('connected')).toBe('Connected');
    expect(deviceStatusToString('failed')).toBe('Failed');
    expect(deviceStatusToString('unavailable')).toBe('Unavailable');
  });
});

describe('error helpers', () => {
  it('reads the reason of a rejected request', () => {
    expect(reasonOf(new P2pRequestError(P2P_BUSY))).toBe(P2P_BUSY);
    expect(reasonOf(new Error('boom'))).toBe(P2P_ERROR);
    expect(reasonOf('boom')).toBe(P2P_ERROR);
  });

  it('extracts a message from anything thrown', () => {
    expect(errorMessage(new P2pRequestError(3))).toBe('P2P request rejected (reason 3)');
    expect(errorMessage('plain')).toBe('plain');
  });
});
