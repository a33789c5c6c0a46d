/**
 * Fee Model
 * Size-based fee estimation for legacy P2PKH transactions
 */

import { InvalidParameterError } from '../errors/index.ts';
import type { FeeModelOptions, FeeRate, IFeeModel } from '../interfaces/fee.interface.ts';

export class FeeModel implements IFeeModel {
  // 32 + 4 outpoint, 1 script length, ~107 scriptSig, 4 sequence
  static readonly INPUT_SIZE = 148;
  // 8 value, 1 script length, 25 scriptPubKey
  static readonly OUTPUT_SIZE = 34;
  // version, locktime and the two count fields
  static readonly TRANSACTION_OVERHEAD = 10;
  static readonly DEFAULT_MIN_FEE = 100_000;

  readonly minFee: number;
  private readonly inputSize: number;
  private readonly outputSize: number;
  private readonly overhead: number;

  constructor(options: FeeModelOptions = {}) {
    this.inputSize = options.inputSize ?? FeeModel.INPUT_SIZE;
    this.outputSize = options.outputSize ?? FeeModel.OUTPUT_SIZE;
    this.overhead = options.overhead ?? FeeModel.TRANSACTION_OVERHEAD;
    this.minFee = options.minFee ?? FeeModel.DEFAULT_MIN_FEE;

    if (!Number.isSafeInteger(this.minFee) || this.minFee < 0) {
      throw new InvalidParameterError(`minFee must be a non-negative integer, got ${this.minFee}`);
    }
  }

  estimateSize(inputCount: number, outputCount: number): number {
    if (!Number.isInteger(inputCount) || inputCount < 0) {
      throw new InvalidParameterError(`inputCount must be a non-negative integer, got ${inputCount}`);
    }
    if (!Number.isInteger(outputCount) || outputCount < 0) {
      throw new InvalidParameterError(
        `outputCount must be a non-negative integer, got ${outputCount}`,
      );
    }
    return inputCount * this.inputSize + outputCount * this.outputSize + this.overhead;
  }

  /**
   * ceil(feeRate * size / 1000), floored at minFee. Integer arithmetic throughout.
   */
  estimateFee(inputCount: number, outputCount: number, feeRate: FeeRate): number {
    if (!Number.isSafeInteger(feeRate) || feeRate < 0) {
      throw new InvalidParameterError(`feeRate must be a non-negative integer, got ${feeRate}`);
    }

    const size = this.estimateSize(inputCount, outputCount);
    const scaled = feeRate * size;
    if (!Number.isSafeInteger(scaled)) {
      throw new InvalidParameterError(`feeRate ${feeRate} is too large for size ${size}`);
    }

    const remainder = scaled % 1000;
    const fee = (scaled - remainder) / 1000 + (remainder > 0 ? 1 : 0);
    return Math.max(fee, this.minFee);
  }
}
