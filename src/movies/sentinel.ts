/** Marker the source uses in place of a missing value. */
export const NOT_AVAILABLE = 'N/A';

export function isAvailable(value: string): boolean {
  return value !== NOT_AVAILABLE;
}

export function decodeOptional(value: string): string | null {
  return isAvailable(value) ? value : null;
}

const DECIMAL = /^\s*[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?\s*$/;

/**
 * Returns null for the sentinel and throws for anything that is not a
 * finite decimal number.
 */
export function decodeOptionalFloat(value: string | number): number | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new TypeError(`Expected a finite number, got ${value}`);
    }
    return value;
  }

  if (!isAvailable(value)) return null;

  const parsed = Number(value);
  if (!DECIMAL.test(value) || !Number.isFinite(parsed)) {
    throw new TypeError(`Expected a number or "${NOT_AVAILABLE}", got "${value}"`);
  }
  return parsed;
}
