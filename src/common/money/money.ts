/**
 * Fixed-point helpers for two-decimal currency amounts.
 *
 * Amounts travel through the code as decimal strings ("4000.00"), the same shape
 * Postgres returns for `numeric` columns. Arithmetic happens on bigint minor units
 * (paise / cents) so a stored amount never passes through a float.
 */
export type Amount = string;

const SCALE = 2;
const FACTOR = 100n;
const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

export class InvalidAmountError extends Error {
  constructor(value: unknown) {
    super(`Invalid decimal amount: ${String(value)}`);
    this.name = 'InvalidAmountError';
  }
}

export function toMinorUnits(value: Amount | number): bigint {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new InvalidAmountError(value);
  }
  const text = typeof value === 'number' ? value.toFixed(SCALE) : value.trim();
  if (!DECIMAL_PATTERN.test(text)) {
    throw new InvalidAmountError(value);
  }

  const negative = text.startsWith('-');
  const [whole, fraction = ''] = (negative ? text.slice(1) : text).split('.');
  // numeric columns may carry trailing zeros beyond the scale; anything else is precision loss
  if (fraction.length > SCALE && /[^0]/.test(fraction.slice(SCALE))) {
    throw new InvalidAmountError(value);
  }
  const minor = BigInt(whole) * FACTOR + BigInt(fraction.slice(0, SCALE).padEnd(SCALE, '0'));
  return negative ? -minor : minor;
}

export function fromMinorUnits(minor: bigint): Amount {
  const negative = minor < 0n;
  const abs = negative ? -minor : minor;
  const fraction = (abs % FACTOR).toString().padStart(SCALE, '0');
  return `${negative ? '-' : ''}${abs / FACTOR}.${fraction}`;
}

export function isDecimalAmount(value: unknown): boolean {
  if (typeof value !== 'string' && typeof value !== 'number') return false;
  try {
    toMinorUnits(value);
    return true;
  } catch {
    return false;
  }
}

export const normalizeAmount = (value: Amount | number): Amount => fromMinorUnits(toMinorUnits(value));

export const addAmounts = (...values: Amount[]): Amount =>
  fromMinorUnits(values.reduce((sum, v) => sum + toMinorUnits(v), 0n));

export const subtractAmounts = (a: Amount, b: Amount): Amount =>
  fromMinorUnits(toMinorUnits(a) - toMinorUnits(b));

export function compareAmounts(a: Amount, b: Amount): -1 | 0 | 1 {
  const left = toMinorUnits(a);
  const right = toMinorUnits(b);
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

export const isPositiveAmount = (value: Amount): boolean => toMinorUnits(value) > 0n;

export const clampToZero = (value: Amount): Amount =>
  toMinorUnits(value) < 0n ? fromMinorUnits(0n) : normalizeAmount(value);

/** Percentage of `part` in `whole`, rounded half-up to two decimals. */
export function percentageOf(part: Amount, whole: Amount): number {
  const numerator = toMinorUnits(part);
  const denominator = toMinorUnits(whole);
  if (denominator <= 0n) return 0;
  const basisPoints = (numerator * 10000n * 2n + denominator) / (denominator * 2n);
  return Number(basisPoints) / 100;
}

/** Gateways take integer subunits (paise for INR, cents for USD). */
export function toSubunits(value: Amount): number {
  return Number(toMinorUnits(value));
}

export function fromSubunits(value: number | string): Amount {
  const text = String(value).trim();
  if (!/^-?\d+$/.test(text)) {
    throw new InvalidAmountError(value);
  }
  return fromMinorUnits(BigInt(text));
}

/** Splits `total` into `parts` equal amounts; the last part absorbs the remainder. */
export function splitAmount(total: Amount, parts: number): Amount[] {
  const count = Math.max(1, Math.floor(parts));
  const minor = toMinorUnits(total);
  const base = minor / BigInt(count);
  const result: Amount[] = [];
  for (let i = 0; i < count - 1; i++) {
    result.push(fromMinorUnits(base));
  }
  result.push(fromMinorUnits(minor - base * BigInt(count - 1)));
  return result;
}

/** `total / count` rounded half-up to the minor unit; zero for an empty set. */
export function averageAmount(total: Amount, count: number): Amount {
  if (count <= 0) return fromMinorUnits(0n);
  const n = BigInt(count);
  return fromMinorUnits((toMinorUnits(total) * 2n + n) / (n * 2n));
}
