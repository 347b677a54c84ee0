import { ErrorCode, NumericError, ValidationError } from '../errors';

/** Largest value a custody transfer or stored reserve can hold. */
export const U64_MAX = (1n << 64n) - 1n;

/** Largest intermediate value allowed in liquidity and swap math. */
export const U128_MAX = (1n << 128n) - 1n;

/**
 * a + b, failing when the sum exceeds `max`.
 */
export function checkedAdd(a: bigint, b: bigint, max: bigint = U128_MAX): bigint {
  const sum = a + b;
  if (sum > max) {
    throw new NumericError(ErrorCode.ARITHMETIC_OVERFLOW, { op: 'add', a: a.toString(), b: b.toString() });
  }
  return sum;
}

/**
 * a - b, failing when b > a.
 */
export function checkedSub(a: bigint, b: bigint): bigint {
  if (b > a) {
    throw new NumericError(ErrorCode.ARITHMETIC_UNDERFLOW, { op: 'sub', a: a.toString(), b: b.toString() });
  }
  return a - b;
}

/**
 * a * b, failing when the product exceeds `max`.
 */
export function checkedMul(a: bigint, b: bigint, max: bigint = U128_MAX): bigint {
  const product = a * b;
  if (product > max) {
    throw new NumericError(ErrorCode.ARITHMETIC_OVERFLOW, { op: 'mul', a: a.toString(), b: b.toString() });
  }
  return product;
}

// floor division; operands are never negative here
export function checkedDiv(a: bigint, b: bigint): bigint {
  if (b === 0n) {
    throw new NumericError(ErrorCode.DIVISION_BY_ZERO, { op: 'div', a: a.toString() });
  }
  return a / b;
}

/**
 * Narrow a value to the u64 range used by custody transfers.
 *
 * @throws {NumericError} AMOUNT_OVERFLOW instead of truncating.
 */
export function toU64(value: bigint, field = 'amount'): bigint {
  if (value < 0n || value > U64_MAX) {
    throw new NumericError(ErrorCode.AMOUNT_OVERFLOW, { field, value: value.toString() });
  }
  return value;
}

/**
 * Validate a caller-supplied amount as an unsigned 128-bit integer.
 */
export function requireU128(value: bigint, field: string): bigint {
  if (value < 0n) {
    throw new ValidationError(ErrorCode.INVALID_AMOUNT, `${field} must not be negative`, {
      field,
      value: value.toString(),
    });
  }
  if (value > U128_MAX) {
    throw new NumericError(ErrorCode.AMOUNT_OVERFLOW, { field, value: value.toString() });
  }
  return value;
}

/**
 * Floor of the square root of a u128, by Newton's method.
 *
 * Starts from value / 2 and stops as soon as the next estimate
 * is not smaller than the current one.
 */
export function sqrt(value: bigint): bigint {
  if (value < 0n) {
    throw new NumericError(ErrorCode.ARITHMETIC_UNDERFLOW, { op: 'sqrt', value: value.toString() });
  }
  if (value > U128_MAX) {
    throw new NumericError(ErrorCode.ARITHMETIC_OVERFLOW, { op: 'sqrt', value: value.toString() });
  }
  if (value < 2n) {
    return value;
  }

  let x = value / 2n;
  let y = (x + value / x) / 2n;

  while (y < x) {
    x = y;
    y = (x + value / x) / 2n;
  }

  return x;
}

/**
 * Express `part / whole` in basis points, floored. Zero when `whole` is zero.
 */
export function toBps(part: bigint, whole: bigint): number {
  if (whole === 0n) return 0;
  return Number((part * 10000n) / whole);
}
