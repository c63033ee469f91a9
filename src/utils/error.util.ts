import { P2P_ERROR, P2pRequestError } from '../interfaces/wifi-p2p.interface';

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reason code of a rejected platform request. Anything that is not a
 * P2pRequestError counts as an internal error.
 */
export function reasonOf(error: unknown): number {
  return error instanceof P2pRequestError ? error.reason : P2P_ERROR;
}
