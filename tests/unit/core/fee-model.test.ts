import { describe, expect, it } from 'vitest';

import { FeeModel } from '../../../src/core/fee-model';
import { InvalidParameterError } from '../../../src/errors';

describe('FeeModel', () => {
  const model = new FeeModel();
  const rate = 1_000_000;

  describe('estimateSize', () => {
    it('should count 148 bytes per input, 34 per output and 10 of overhead', () => {
      expect(model.estimateSize(1, 1)).toBe(192);
      expect(model.estimateSize(2, 1)).toBe(340);
      expect(model.estimateSize(3, 2)).toBe(522);
      expect(model.estimateSize(20, 1)).toBe(3004);
    });

    it('should reject negative or fractional counts', () => {
      expect(() => model.estimateSize(-1, 1)).toThrow(InvalidParameterError);
      expect(() => model.estimateSize(1, 1.5)).toThrow(InvalidParameterError);
    });
  });

  describe('estimateFee', () => {
    it('should charge the rate per 1000 bytes', () => {
      expect(model.estimateFee(1, 1, rate)).toBe(192_000);
      expect(model.estimateFee(2, 1, rate)).toBe(340_000);
      expect(model.estimateFee(3, 1, rate)).toBe(488_000);
      expect(model.estimateFee(4, 1, rate)).toBe(636_000);
      expect(model.estimateFee(1, 2, rate)).toBe(226_000);
      expect(model.estimateFee(3, 2, rate)).toBe(522_000);
    });

    it('should round fractional koinu up', () => {
      const unfloored = new FeeModel({ minFee: 0 });

      // 1001 * 192 / 1000 = 192.192
      expect(unfloored.estimateFee(1, 1, 1001)).toBe(193);
      // 100 * 192 / 1000 = 19.2
      expect(unfloored.estimateFee(1, 1, 100)).toBe(20);
    });

    it('should never go below the minimum fee', () => {
      expect(model.estimateFee(1, 1, 100)).toBe(100_000);
      expect(model.estimateFee(1, 1, 0)).toBe(100_000);
      expect(new FeeModel({ minFee: 0 }).estimateFee(1, 1, 0)).toBe(0);
    });

    it('should grow with every added input', () => {
      let previous = 0;
      for (let inputs = 1; inputs <= 30; inputs++) {
        const fee = model.estimateFee(inputs, 1, rate);
        expect(fee).toBeGreaterThan(previous);
        previous = fee;
      }
    });

    it('should grow with every added output', () => {
      let previous = 0;
      for (let outputs = 1; outputs <= 30; outputs++) {
        const fee = model.estimateFee(1, outputs, rate);
        expect(fee).toBeGreaterThan(previous);
        previous = fee;
      }
    });

    it('should hold the floor and then grow as outputs are added', () => {
      const fees = [1, 2, 3, 4].map((outputs) => model.estimateFee(1, outputs, 400_000));

      expect(fees).toEqual([100_000, 100_000, 104_000, 117_600]);
    });

    it.each([0, 100, 400_000, 1_000_000, 2_500_000])(
      'should never fall when an input or output is added at rate %i',
      (feeRate) => {
        for (let inputs = 0; inputs <= 12; inputs++) {
          for (let outputs = 0; outputs <= 12; outputs++) {
            const fee = model.estimateFee(inputs, outputs, feeRate);
            expect(model.estimateFee(inputs + 1, outputs, feeRate)).toBeGreaterThanOrEqual(fee);
            expect(model.estimateFee(inputs, outputs + 1, feeRate)).toBeGreaterThanOrEqual(fee);
          }
        }
      },
    );

    it('should reject a non-integer or negative fee rate', () => {
      expect(() => model.estimateFee(1, 1, 1.5)).toThrow(InvalidParameterError);
      expect(() => model.estimateFee(1, 1, -1)).toThrow(InvalidParameterError);
    });

    it('should reject a rate whose product with the size is not a safe integer', () => {
      expect(() => model.estimateFee(1000, 1, Number.MAX_SAFE_INTEGER)).toThrow(
        /too large/,
      );
    });
  });

  it('should reject a negative minimum fee', () => {
    expect(() => new FeeModel({ minFee: -1 })).toThrow(InvalidParameterError);
  });

  it('should honour custom sizes', () => {
    const custom = new FeeModel({ inputSize: 100, outputSize: 40, overhead: 12, minFee: 0 });

    expect(custom.estimateSize(2, 2)).toBe(292);
    expect(custom.estimateFee(2, 2, 1000)).toBe(292);
  });
});
