/**
 * Amount conversion between decimal coin strings and integer koinu.
 *
 * Arithmetic inside the engine is integer-only; decimals exist at the node boundary.
 */

export const KOINU_PER_COIN = 100_000_000;

const COIN_DECIMALS = 8;
const DECIMAL_AMOUNT = /^(\d+)(?:\.(\d{1,8}))?$/;

/**
 * Parse a coin amount ("12.5", 12.5) into koinu.
 *
 * @throws RangeError on negative, malformed, over-precise or unsafe amounts
 */
export function parseAmount(value: string | number): number {
  let text: string;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new RangeError(`Amount is not finite: ${value}`);
    }
    text = value.toFixed(COIN_DECIMALS);
  } else {
    text = value.trim();
  }

  const match = DECIMAL_AMOUNT.exec(text);
  if (!match) {
    throw new RangeError(`Invalid amount: ${String(value)}`);
  }

  const whole = Number(match[1]);
  const fraction = Number((match[2] ?? '').padEnd(COIN_DECIMALS, '0'));
  const koinu = whole * KOINU_PER_COIN + fraction;
  if (!Number.isSafeInteger(koinu)) {
    throw new RangeError(`Amount out of range: ${String(value)}`);
  }
  return koinu;
}

/**
 * Format koinu as a decimal coin string with all eight places ("0.00100000")
 */
export function formatAmount(koinu: number): string {
  if (!Number.isSafeInteger(koinu) || koinu < 0) {
    throw new RangeError(`Invalid koinu amount: ${koinu}`);
  }
  const whole = Math.floor(koinu / KOINU_PER_COIN);
  const fraction = koinu % KOINU_PER_COIN;
  return `${whole}.${String(fraction).padStart(COIN_DECIMALS, '0')}`;
}

