import { describe, expect, it } from 'vitest';

import { DOGECOIN_MAINNET, DOGECOIN_TESTNET } from '../../../src/config/networks';
import { InvalidAddressError } from '../../../src/errors';
import { assertValidAddress, isValidAddress } from '../../../src/utils/address';
import { SENDER, testAddress } from '../../fixtures/utxos';

describe('address validation', () => {
  it('should accept an address of the network', () => {
    expect(isValidAddress(SENDER, DOGECOIN_MAINNET)).toBe(true);
    expect(isValidAddress(testAddress(9, DOGECOIN_TESTNET), DOGECOIN_TESTNET)).toBe(true);
  });

  it('should reject an address of another network', () => {
    expect(isValidAddress(SENDER, DOGECOIN_TESTNET)).toBe(false);
  });

  it('should reject a corrupted checksum', () => {
    const last = SENDER.slice(-1);
    const corrupted = SENDER.slice(0, -1) + (last === 'a' ? 'b' : 'a');

    expect(isValidAddress(corrupted, DOGECOIN_MAINNET)).toBe(false);
  });

  it('should reject garbage', () => {
    expect(isValidAddress('', DOGECOIN_MAINNET)).toBe(false);
    expect(isValidAddress('not-an-address', DOGECOIN_MAINNET)).toBe(false);
  });

  it('should throw with the offending address', () => {
    let error: unknown;
    try {
      assertValidAddress('not-an-address', DOGECOIN_MAINNET);
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(InvalidAddressError);
    if (error instanceof InvalidAddressError) {
      expect(error.address).toBe('not-an-address');
      expect(error.message).toBe('Invalid address: not-an-address');
    }
  });
});
