const DECIMAL_RE = /^(-)?(\d+)(?:\.(\d{1,2}))?$/;

/**
 * Converts a decimal amount to integer minor units (cents).
 * Strings are parsed digit-by-digit so NUMERIC values from PostgreSQL never pass through a float.
 */
export function toMinorUnits(value: number | string): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new Error(`Invalid amount: ${value}`);
    return Math.round(value * 100);
  }

  const match = value.trim().match(DECIMAL_RE);
  if (!match) {
    throw new Error(`Invalid amount: ${value}`);
  }
  const [, sign, whole, fraction = ''] = match;
  const cents = Number(whole) * 100 + Number(fraction.padEnd(2, '0'));
  return sign ? -cents : cents;
}

export function formatMinorUnits(minor: number): string {
  const sign = minor < 0 ? '-' : '';
  const abs = Math.abs(minor);
  const whole = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}

export function minorUnitsToNumber(minor: number): number {
  return Number(formatMinorUnits(minor));
}
