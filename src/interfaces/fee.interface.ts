/**
 * Fee Model Interface
 */

/**
 * Fee rate in koinu per 1000 bytes of transaction size
 */
export type FeeRate = number;

export interface FeeModelOptions {
  /** Size of one P2PKH input in bytes */
  inputSize?: number;
  /** Size of one P2PKH output in bytes */
  outputSize?: number;
  /** Version, locktime and count fields */
  overhead?: number;
  /** Floor applied to every estimate, in koinu */
  minFee?: number;
}

export interface TransactionShape {
  inputCount: number;
  outputCount: number;
}

export interface IFeeModel {
  /** Minimum fee any estimate is floored at */
  readonly minFee: number;

  /**
   * Estimate transaction size in bytes
   */
  estimateSize(inputCount: number, outputCount: number): number;

  /**
   * Estimate the required fee for a transaction shape
   */
  estimateFee(inputCount: number, outputCount: number, feeRate: FeeRate): number;
}
