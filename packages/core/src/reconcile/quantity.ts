/**
 * Kubernetes resource quantities
 * @module @devstate/core/reconcile/quantity
 */

import { DeviceStateError, ErrorCode, setEntry } from '@devstate/shared';

const QUANTITY_PATTERN = /^([+-]?)(\d+(?:\.\d*)?|\.\d+)(Ki|Mi|Gi|Ti|Pi|Ei|[eE][+-]?\d+|[numkMGTPE])?$/;

const BINARY_SUFFIXES: Record<string, bigint> = {
  Ki: 1n << 10n,
  Mi: 1n << 20n,
  Gi: 1n << 30n,
  Ti: 1n << 40n,
  Pi: 1n << 50n,
  Ei: 1n << 60n,
};

const DECIMAL_SUFFIXES: Record<string, number> = {
  n: -9,
  u: -6,
  m: -3,
  k: 3,
  M: 6,
  G: 9,
  T: 12,
  P: 15,
  E: 18,
};

function decimalExponent(suffix: string): number {
  if (suffix === '') {
    return 0;
  }
  if (suffix in DECIMAL_SUFFIXES) {
    return DECIMAL_SUFFIXES[suffix];
  }
  return Number.parseInt(suffix.slice(1), 10);
}

/**
 * Integer value of a quantity such as `2`, `500m`, `1.5Gi` or `1e3`,
 * rounded up away from zero the way the orchestrator's `Value()` does.
 */
export function quantityValue(quantity: string): number {
  const match = QUANTITY_PATTERN.exec(quantity.trim());
  if (!match) {
    throw new DeviceStateError(`invalid resource quantity ${JSON.stringify(quantity)}`, ErrorCode.INVALID_QUANTITY, {
      quantity,
    });
  }

  const [, sign, number, suffix = ''] = match;
  const [whole, fraction = ''] = number.split('.');

  // value = mantissa * binary * 10^exponent / 10^fraction.length, kept exact
  let numerator = BigInt(`${whole || '0'}${fraction}`);
  let denominator = 10n ** BigInt(fraction.length);

  if (suffix in BINARY_SUFFIXES) {
    numerator *= BINARY_SUFFIXES[suffix];
  } else {
    const exponent = decimalExponent(suffix);
    if (exponent >= 0) {
      numerator *= 10n ** BigInt(exponent);
    } else {
      denominator *= 10n ** BigInt(-exponent);
    }
  }

  let value = numerator / denominator;
  if (numerator % denominator !== 0n) {
    value += 1n;
  }
  if (sign === '-') {
    value = -value;
  }
  if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw new DeviceStateError(
      `resource quantity ${JSON.stringify(quantity)} exceeds the safe integer range`,
      ErrorCode.INVALID_QUANTITY,
      { quantity },
    );
  }
  return Number(value);
}

/**
 * Convert an orchestrator resource map into integer amounts
 */
export function quantitiesToResourceList(
  quantities: Record<string, string> | undefined,
  target: Record<string, number> = {},
): Record<string, number> {
  for (const [name, quantity] of Object.entries(quantities ?? {})) {
    setEntry(target, name, quantityValue(quantity));
  }
  return target;
}
