import { describe, expect, it } from 'vitest';

import { TransactionAssembler } from '../../../src/core/transaction-assembler';
import type { SelectionOptions } from '../../../src/interfaces/selector.interface';
import { SelectionFailureReason } from '../../../src/interfaces/selector-result.interface';
import { CoinSelector } from '../../../src/selectors/coin-selector';
import { toOutpointKey } from '../../../src/utils/outpoint';
import {
  CHANGE,
  createUtxos,
  DESTINATION,
  randomInt,
  seededRandom,
} from '../../fixtures/utxos';

describe('selection and assembly on generated inventories', () => {
  const selector = new CoinSelector();
  const assembler = new TransactionAssembler();
  const dustThreshold = assembler.dustThreshold;

  it.each([1, 2, 3])('should balance every plan exactly and emit no dust (seed %i)', (seed) => {
    const random = seededRandom(seed);
    let planned = 0;

    for (let round = 0; round < 150; round++) {
      // Mix of dust-sized, mid and large outputs
      const amounts = Array.from({ length: randomInt(random, 1, 25) }, () => {
        const scale = [1_000, 1_000_000, 100_000_000][randomInt(random, 0, 2)] ?? 1;
        return randomInt(random, 1, 5_000) * scale;
      });
      const utxos = createUtxos(amounts);
      const total = amounts.reduce((a, b) => a + b, 0);
      const targetAmount = dustThreshold + Math.floor(random() * total * 0.9);
      const options: SelectionOptions = {
        targetAmount,
        feeRate: randomInt(random, 0, 3) * 500_000,
        maxOverpay: 1_000_000,
        dustThreshold,
      };

      const result = selector.select(utxos, options);
      if (!result.success) {
        expect(result.reason).toBe(SelectionFailureReason.INSUFFICIENT_FUNDS);
        continue;
      }

      const plan = assembler.build(
        result,
        { destination: DESTINATION, amount: targetAmount, maxAcceptableFee: 1_000_000_000_000 },
        CHANGE,
      );
      planned++;

      const inputTotal = result.chosen.reduce((sum, utxo) => sum + utxo.amount, 0);
      const outputTotal = [...plan.outputs.values()].reduce((a, b) => a + b, 0);
      expect(outputTotal + plan.fee).toBe(inputTotal);
      expect(plan.totalInput).toBe(inputTotal);
      expect(plan.outputs.get(DESTINATION)).toBe(targetAmount);
      expect(new Set(plan.inputs.map(toOutpointKey)).size).toBe(plan.inputs.length);
      for (const amount of plan.outputs.values()) {
        expect(amount).toBeGreaterThanOrEqual(dustThreshold);
      }
    }

    expect(planned).toBeGreaterThan(0);
  });
});
