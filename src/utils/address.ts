import * as bitcoin from 'bitcoinjs-lib';
import type { Network } from 'bitcoinjs-lib';

import { InvalidAddressError } from '../errors/index.ts';

/**
 * Validate address format and checksum for the given network
 */
export function isValidAddress(address: string, network: Network): boolean {
  try {
    bitcoin.address.toOutputScript(address, network);
    return true;
  } catch {
    return false;
  }
}

/**
 * @throws InvalidAddressError when the address does not decode for the network
 */
export function assertValidAddress(address: string, network: Network): void {
  if (!isValidAddress(address, network)) {
    throw new InvalidAddressError(address);
  }
}
