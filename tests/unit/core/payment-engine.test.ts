/**
 * PaymentEngine Tests
 * End-to-end planning and execution against an in-process ledger node
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';

import { DOGECOIN_TESTNET } from '../../../src/config/networks';
import { PaymentEngine } from '../../../src/core/payment-engine';
import {
  BroadcastFailedError,
  ConfigurationError,
  ConsolidationNotBeneficialError,
  FeeLimitExceededError,
  InsufficientFundsError,
  InvalidAddressError,
  InvalidParameterError,
  InventoryUnavailableError,
  NoChangeFreeSolutionError,
  SigningFailedError,
  UtxoLockConflictError,
} from '../../../src/errors';
import { SelectionFailureReason } from '../../../src/interfaces/selector-result.interface';
import type { BroadcastReceipt, PaymentRequest } from '../../../src/interfaces/transaction.interface';
import type { Logger } from '../../../src/utils/logger';
import {
  CHANGE,
  coins,
  createUtxo,
  createUtxos,
  DESTINATION,
  OTHER_SENDER,
  outpointKey,
  SENDER,
  testAddress,
  txIdFor,
} from '../../fixtures/utxos';
import { MockLedgerNode } from '../../mocks/mock-ledger-node';

function createLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

function payment(amount: number, overrides: Partial<PaymentRequest> = {}): PaymentRequest {
  return { addresses: [SENDER], destination: DESTINATION, amount, ...overrides };
}

async function settle(
  promises: Array<Promise<BroadcastReceipt>>,
): Promise<{ receipts: BroadcastReceipt[]; errors: unknown[] }> {
  const results = await Promise.allSettled(promises);
  const receipts: BroadcastReceipt[] = [];
  const errors: unknown[] = [];
  for (const result of results) {
    if (result.status === 'fulfilled') {
      receipts.push(result.value);
    } else {
      errors.push(result.reason);
    }
  }
  return { receipts, errors };
}

describe('PaymentEngine', () => {
  let node: MockLedgerNode;
  let logger: Logger;
  let engine: PaymentEngine;

  beforeEach(() => {
    node = new MockLedgerNode();
    logger = createLogger();
    engine = new PaymentEngine({ node, logger });
  });

  describe('sendPayment', () => {
    it('should pay with change when no changeless selection exists', async () => {
      const utxos = createUtxos([coins(50), coins(30), coins(20), coins(5)]);
      node.addUtxos(utxos);

      const receipt = await engine.sendPayment(payment(coins(80)));

      const changeAddress = testAddress(100);
      expect(receipt.txid).toBe(txIdFor(0x1000));
      expect(receipt.attempts).toBe(1);
      expect(receipt.plan.strategy).toBe('change-permitting');
      expect(receipt.plan.fee).toBe(522_000);
      expect(receipt.plan.changeAmount).toBe(1_999_478_000);
      expect(receipt.plan.changeAddress).toBe(changeAddress);
      expect(receipt.plan.outputs).toEqual(
        new Map([
          [DESTINATION, coins(80)],
          [changeAddress, 1_999_478_000],
        ]),
      );
      expect(node.created).toEqual([
        {
          inputs: [
            { txId: txIdFor(0), outputIndex: 0 },
            { txId: txIdFor(1), outputIndex: 0 },
            { txId: txIdFor(2), outputIndex: 0 },
          ],
          outputs: receipt.plan.outputs,
        },
      ]);
      expect(node.calls).toContain('getNewAddress:change');
      expect(node.hasUtxo(createUtxo(coins(5), 3))).toBe(true);
    });

    it('should release every lock after broadcasting', async () => {
      node.addUtxos(createUtxos([coins(50), coins(30), coins(20)]));

      await engine.sendPayment(payment(coins(80)));

      expect(engine.lockManager.getStatistics().totalLocks).toBe(0);
      expect(node.nodeLocks.size).toBe(0);
    });

    it('should pay without change when a single UTXO matches', async () => {
      node.addUtxos([createUtxo(500_692_000, 0), createUtxo(coins(50), 1)]);

      const receipt = await engine.sendPayment(payment(coins(5)));

      expect(receipt.plan.strategy).toBe('single-match');
      expect(receipt.plan.inputs).toEqual([
        { txId: txIdFor(0), outputIndex: 0, amount: 500_692_000 },
      ]);
      expect(receipt.plan.outputs).toEqual(new Map([[DESTINATION, coins(5)]]));
      expect(receipt.plan.fee).toBe(692_000);
      expect(receipt.plan.foldedLeftover).toBe(500_000);
      expect(node.calls).not.toContain('getNewAddress:change');
    });

    it('should use the change address it is given', async () => {
      node.addUtxos([createUtxo(coins(10), 0)]);

      const receipt = await engine.sendPayment(payment(coins(5), { changeAddress: CHANGE }));

      expect(receipt.plan.outputs.get(CHANGE)).toBe(coins(5) - 226_000);
      expect(node.calls).not.toContain('getNewAddress:change');
    });

    it('should report insufficient funds with the amount and the single-input fee', async () => {
      node.addUtxos([createUtxo(coins(100), 0)]);

      const error = await engine.sendPayment(payment(coins(100))).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InsufficientFundsError);
      if (error instanceof InsufficientFundsError) {
        expect(error.targetAmount).toBe(10_000_000_000);
        expect(error.availableTotal).toBe(10_000_000_000);
        expect(error.feeAttempted).toBe(192_000);
      }
      expect(node.calls).not.toContain('createTransaction');
    });

    it('should refuse change when the caller forbids it', async () => {
      node.addUtxos(createUtxos([coins(50), coins(30), coins(20), coins(5)]));

      const error = await engine
        .sendPayment(payment(coins(80), { allowChange: false }))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NoChangeFreeSolutionError);
      if (error instanceof NoChangeFreeSolutionError) {
        expect(error.availableTotal).toBe(coins(105));
      }
    });

    it('should refuse a fee above the request ceiling', async () => {
      node.addUtxos(createUtxos([coins(50), coins(30), coins(20)]));

      await expect(
        engine.sendPayment(payment(coins(80), { maxFee: 500_000 })),
      ).rejects.toBeInstanceOf(FeeLimitExceededError);
      expect(node.calls).not.toContain('createTransaction');
    });

    it('should surface an unreachable node', async () => {
      node.failures.listUnspent = true;

      await expect(engine.sendPayment(payment(coins(5)))).rejects.toBeInstanceOf(
        InventoryUnavailableError,
      );
    });

    it('should validate the request before touching the node', async () => {
      await expect(
        engine.sendPayment(payment(coins(5), { destination: 'not-an-address' })),
      ).rejects.toBeInstanceOf(InvalidAddressError);
      await expect(engine.sendPayment(payment(999_999))).rejects.toBeInstanceOf(
        InvalidParameterError,
      );
      await expect(
        engine.sendPayment({ addresses: [], destination: DESTINATION, amount: coins(5) }),
      ).rejects.toThrow('At least one sender address is required');
      await expect(engine.sendPayment(payment(coins(5), { feeRate: -1 }))).rejects.toBeInstanceOf(
        InvalidParameterError,
      );

      expect(node.calls).toEqual([]);
    });

    it('should refuse an address from another network', async () => {
      const testnetAddress = testAddress(2, DOGECOIN_TESTNET);

      await expect(
        engine.sendPayment(payment(coins(5), { destination: testnetAddress })),
      ).rejects.toBeInstanceOf(InvalidAddressError);
    });
  });

  describe('execution failures', () => {
    beforeEach(() => {
      node.addUtxos([createUtxo(coins(10), 0)]);
    });

    it('should release locks when signing fails', async () => {
      node.failures.sign = true;

      const error = await engine.sendPayment(payment(coins(5))).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SigningFailedError);
      if (error instanceof SigningFailedError) {
        expect(error.message).toBe('Node failed to sign: wallet is locked');
        expect(error.cause).toBeInstanceOf(Error);
      }
      expect(engine.lockManager.isLocked(`${txIdFor(0)}:0`)).toBe(false);
      expect(node.nodeLocks.size).toBe(0);
      expect(node.broadcasts).toEqual([]);
    });

    it('should refuse a partially signed transaction', async () => {
      node.failures.incompleteSignature = true;

      await expect(engine.sendPayment(payment(coins(5)))).rejects.toThrow(
        'Node could not sign every input',
      );
      expect(node.calls).not.toContain('broadcastTransaction');
    });

    it('should not retry a rejected broadcast', async () => {
      node.failures.broadcast = true;

      const error = await engine.sendPayment(payment(coins(5))).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BroadcastFailedError);
      if (error instanceof BroadcastFailedError) {
        expect(error.message).toBe('Broadcast rejected: min relay fee not met');
      }
      expect(node.calls.filter((call) => call === 'broadcastTransaction')).toHaveLength(1);
      expect(engine.lockManager.getStatistics().totalLocks).toBe(0);
    });

    it('should pay even when the node refuses lock hints', async () => {
      node.failures.lockHints = true;

      const receipt = await engine.sendPayment(payment(coins(5)));

      const outpoint = `${txIdFor(0)}:0`;
      expect(receipt.attempts).toBe(1);
      expect(logger.warn).toHaveBeenCalledWith('Node lock hint failed', {
        outpoint,
        error: 'lockunspent failed',
      });
      expect(logger.warn).toHaveBeenCalledWith('Node unlock hint failed', {
        outpoint,
        error: 'lockunspent failed',
      });
    });

    it('should re-select once when an input turns out to be spent', async () => {
      const outpoint = `${txIdFor(0)}:0`;
      node.spent.add(outpoint);

      const error = await engine.sendPayment(payment(coins(5))).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UtxoLockConflictError);
      if (error instanceof UtxoLockConflictError) {
        expect(error.reason).toBe('spent');
        expect(error.conflicts).toEqual([outpoint]);
      }
      expect(node.calls.filter((call) => call === 'listUnspent')).toHaveLength(2);
      expect(node.calls).not.toContain('createTransaction');
      expect(engine.lockManager.isLocked(outpoint)).toBe(false);
    });
  });

  describe('concurrency', () => {
    it('should let only one of two payments spend a shared UTXO', async () => {
      node.addUtxos([createUtxo(coins(1000), 0)]);

      const { receipts, errors } = await settle([
        engine.sendPayment(payment(coins(900))),
        engine.sendPayment(payment(coins(900))),
      ]);

      expect(receipts).toHaveLength(1);
      expect(receipts[0]?.attempts).toBe(1);
      expect(receipts[0]?.plan.changeAmount).toBe(coins(100) - 226_000);

      expect(errors).toHaveLength(1);
      const [error] = errors;
      expect(error).toBeInstanceOf(InsufficientFundsError);
      if (error instanceof InsufficientFundsError) {
        expect(error.availableTotal).toBe(0);
        expect(error.feeAttempted).toBe(192_000);
      }

      expect(node.broadcasts).toHaveLength(1);
      expect(logger.warn).toHaveBeenCalledWith(
        'UTXO conflict, re-selecting from a fresh inventory',
        {
          purpose: 'payment',
          reason: 'locked',
          conflicts: [`${txIdFor(0)}:0`],
        },
      );
    });

    it('should complete the losing payment from another UTXO', async () => {
      const utxos = createUtxos([coins(5), coins(4)]);
      node.addUtxos(utxos);

      const { receipts, errors } = await settle([
        engine.sendPayment(payment(coins(1))),
        engine.sendPayment(payment(coins(1))),
      ]);

      expect(errors).toEqual([]);
      expect(receipts.map((receipt) => receipt.attempts)).toEqual([1, 2]);
      expect(receipts.map((receipt) => receipt.plan.inputs[0]?.txId)).toEqual([
        txIdFor(0),
        txIdFor(1),
      ]);
      expect(receipts.map((receipt) => receipt.plan.changeAmount)).toEqual([
        399_774_000,
        299_774_000,
      ]);
      expect(utxos.some((utxo) => node.hasUtxo(utxo))).toBe(false);
    });

    it('should never hand the same UTXO to two plans', async () => {
      node.addUtxos(createUtxos(Array.from({ length: 6 }, () => coins(10))));

      const { receipts } = await settle(
        Array.from({ length: 4 }, () => engine.sendPayment(payment(coins(5)))),
      );

      const spent = receipts.flatMap((receipt) => receipt.plan.inputs.map((input) => input.txId));
      expect(new Set(spent).size).toBe(spent.length);
    });
  });

  describe('selectAndPlan', () => {
    it('should return a plan without locking anything', async () => {
      node.addUtxos([createUtxo(500_192_000, 0)]);

      const outcome = await engine.selectAndPlan(payment(coins(5)));

      expect(outcome.success).toBe(true);
      if (outcome.success) {
        expect(outcome.plan.fee).toBe(192_000);
        expect(outcome.selection.strategy).toBe('single-match');
        expect(outcome.selection.leftover).toBe(0);
      }
      expect(engine.lockManager.getStatistics().totalLocks).toBe(0);
      expect(node.calls).toEqual(['listUnspent']);
    });

    it('should return selection failures as values', async () => {
      node.addUtxos(createUtxos([coins(50), coins(30), coins(20), coins(5)]));

      const outcome = await engine.selectAndPlan(payment(coins(80), { allowChange: false }));

      expect(outcome.success).toBe(false);
      if (!outcome.success) {
        expect(outcome.reason).toBe(SelectionFailureReason.NO_CHANGE_FREE_SOLUTION);
      }
    });

    it('should skip locked UTXOs', async () => {
      node.addUtxos(createUtxos([500_192_000, coins(10)]));
      engine.lockManager.acquire([`${txIdFor(0)}:0`], 'payment');

      const outcome = await engine.selectAndPlan(payment(coins(5), { changeAddress: CHANGE }));

      expect(outcome.success && outcome.plan.inputs.map((input) => input.txId)).toEqual([
        txIdFor(1),
      ]);
    });
  });

  describe('estimatePaymentFee', () => {
    it('should quote the fee of a payment with change', async () => {
      node.addUtxos(createUtxos([coins(50), coins(30), coins(20), coins(5)]));

      await expect(engine.estimatePaymentFee(payment(coins(80)))).resolves.toEqual({
        fee: 522_000,
        changeless: false,
        inputCount: 3,
      });
      expect(node.calls).not.toContain('getNewAddress:change');
    });

    it('should include the folded leftover of a changeless payment', async () => {
      node.addUtxos([createUtxo(500_692_000, 0)]);

      await expect(engine.estimatePaymentFee(payment(coins(5)))).resolves.toEqual({
        fee: 692_000,
        changeless: true,
        inputCount: 1,
      });
    });

    it('should throw when the payment cannot be funded', async () => {
      await expect(engine.estimatePaymentFee(payment(coins(5)))).rejects.toBeInstanceOf(
        InsufficientFundsError,
      );
    });
  });

  describe('consolidation', () => {
    it('should merge small outputs into one', async () => {
      node.addUtxos(createUtxos(Array.from({ length: 20 }, () => coins(1))));

      const receipt = await engine.consolidate({
        addresses: [SENDER],
        destination: OTHER_SENDER,
        smallThreshold: coins(5),
      });

      expect(receipt.attempts).toBe(1);
      expect(receipt.plan.kind).toBe('consolidation');
      expect(receipt.plan.fee).toBe(3_004_000);
      expect(receipt.plan.outputs).toEqual(new Map([[OTHER_SENDER, 1_996_996_000]]));
      expect(node.created[0]?.inputs).toHaveLength(20);
      expect(engine.lockManager.getStatistics().totalLocks).toBe(0);
    });

    it('should refuse when there is nothing to merge', async () => {
      node.addUtxos([createUtxo(coins(1), 0)]);

      await expect(
        engine.planConsolidation({ addresses: [SENDER], destination: OTHER_SENDER }),
      ).rejects.toBeInstanceOf(ConsolidationNotBeneficialError);
    });
  });

  describe('bookkeeping', () => {
    it('should report the balance', async () => {
      const locked = createUtxo(coins(3), 2);
      node.addUtxos([createUtxo(coins(10), 0), createUtxo(coins(2), 1, { confirmations: 0 }), locked]);
      engine.lockManager.acquire([outpointKey(locked)], 'payment');

      await expect(engine.getBalance([SENDER])).resolves.toEqual({
        confirmed: coins(13),
        unconfirmed: coins(2),
        locked: coins(3),
        spendable: coins(10),
        utxoCount: 3,
      });
    });

    it('should analyze fragmentation', async () => {
      const analyzer = new PaymentEngine({
        node,
        config: { consolidation: { recommendAboveCount: 3 } },
      });
      node.addUtxos([
        ...createUtxos([50_000_000, 50_000_000, 50_000_000]),
        createUtxo(50_000_000, 3, { confirmations: 0 }),
      ]);

      const analysis = await analyzer.analyzeUtxos([SENDER]);

      expect(analysis.summary.totalCount).toBe(4);
      expect(analysis.summary.unconfirmedCount).toBe(1);
      expect(analysis.summary.smallCount).toBe(4);
      expect(analysis.recommendation).toEqual({
        shouldConsolidate: true,
        reason: '3 small outputs totalling 150000000 can be merged for 488000',
        candidateCount: 3,
        estimatedFee: 488_000,
      });
    });
  });

  describe('configuration', () => {
    it('should refuse an invalid configuration', () => {
      expect(() => new PaymentEngine({ node, config: { feeRate: -1 } })).toThrow(
        ConfigurationError,
      );
    });

    it('should apply the configured fee rate', async () => {
      const engineAtDoubleRate = new PaymentEngine({ node, config: { feeRate: 2_000_000 } });
      node.addUtxos([createUtxo(500_384_000, 0)]);

      const outcome = await engineAtDoubleRate.selectAndPlan(payment(coins(5)));

      expect(outcome.success && outcome.plan.fee).toBe(384_000);
    });

    it('should let a request override the fee rate', async () => {
      node.addUtxos([createUtxo(500_384_000, 0)]);

      const outcome = await engine.selectAndPlan(payment(coins(5), { feeRate: 2_000_000 }));

      expect(outcome.success && outcome.selection.strategy).toBe('single-match');
    });

    it('should ask the node for a fee rate when requested', async () => {
      node.feeRate = 2_000_000;
      node.addUtxos([createUtxo(500_384_000, 0)]);

      const outcome = await engine.selectAndPlan(payment(coins(5), { feeRate: 'node' }));

      expect(outcome.success && outcome.plan.fee).toBe(384_000);
      expect(node.calls).toEqual(['listUnspent', 'estimateFeeRate']);
    });

    it('should fall back to the configured rate when the node has no estimate', async () => {
      node.feeRate = null;
      node.addUtxos([createUtxo(500_192_000, 0)]);

      const outcome = await engine.selectAndPlan(payment(coins(5), { feeRate: 'node' }));

      expect(outcome.success && outcome.plan.fee).toBe(192_000);
      expect(logger.warn).toHaveBeenCalledWith(
        'Node has no fee estimate, using the configured rate',
        { feeRate: 1_000_000 },
      );
    });

    it('should stop the sweeper and drop locks on shutdown', () => {
      engine.start(1_000);
      engine.lockManager.acquire(['a:0'], 'payment');

      expect(engine.shutdown()).toBe(1);
    });
  });
});
