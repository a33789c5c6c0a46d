import type { Outpoint } from '../interfaces/utxo.interface.ts';

/**
 * Stable key for an outpoint, "txId:outputIndex"
 */
export function toOutpointKey(outpoint: Outpoint): string {
  return `${outpoint.txId}:${outpoint.outputIndex}`;
}

export function parseOutpointKey(key: string): Outpoint {
  const separator = key.lastIndexOf(':');
  const indexText = key.slice(separator + 1);
  if (separator <= 0 || !/^\d+$/.test(indexText)) {
    throw new RangeError(`Invalid outpoint key: ${key}`);
  }
  return { txId: key.slice(0, separator), outputIndex: Number(indexText) };
}
