export type ParsedMoney =
  | { value: number; normalized: string; wasNormalized: boolean; confidence: 'HIGH' | 'MEDIUM' }
  | { value: null; reason: 'AMBIGUOUS_DECIMAL_SEPARATOR' | 'INVALID_FORMAT' | 'OUT_OF_RANGE' };

const MAX_DECIMALS = 2;

/** Totals at or above this do not fit NUMERIC(14,2). */
export const MAX_MONEY_AMOUNT = 1e12;

const invalid: ParsedMoney = { value: null, reason: 'INVALID_FORMAT' };
const ambiguous: ParsedMoney = { value: null, reason: 'AMBIGUOUS_DECIMAL_SEPARATOR' };

function applyParenthesesNegative(raw: string): { s: string; wasNormalized: boolean } {
  const s0 = raw.trim();
  if (!/^\(.*\)$/.test(s0)) return { s: s0, wasNormalized: false };
  const inner = s0.slice(1, -1);
  if (!/[0-9]/.test(inner)) return { s: s0, wasNormalized: false };
  return { s: `-${inner}`, wasNormalized: true };
}

function isUsMixedValid(s: string): boolean {
  // 1,234.56 | 1,234,567.89
  return /^-?\d{1,3}(?:,\d{3})+(?:\.\d+)?$/.test(s);
}

function isEuMixedValid(s: string): boolean {
  // 1.234,56 | 1.234.567,89
  return /^-?\d{1,3}(?:\.\d{3})+(?:,\d+)?$/.test(s);
}

function finalize(normalized: string, wasNormalized: boolean, confidence: 'HIGH' | 'MEDIUM'): ParsedMoney {
  const fraction = normalized.match(/\.(\d+)$/);
  if ((fraction?.[1]?.length ?? 0) > MAX_DECIMALS) return invalid;

  const value = Number(normalized);
  if (!Number.isFinite(value)) return invalid;
  if (Math.abs(value) >= MAX_MONEY_AMOUNT) return { value: null, reason: 'OUT_OF_RANGE' };
  return { value, normalized, wasNormalized, confidence };
}

/**
 * Parses an invoice total as printed or as a model returned it.
 *
 * - Mixed separators: the rightmost one is the decimal mark, and the grouping must be valid.
 * - "1,234" is thousands; "1,23" is a decimal comma.
 * - "1.234" is ambiguous and not read as 1234.
 * - More than two decimals is invalid rather than rounded.
 */
export function parseMoneyLike(input: unknown): ParsedMoney {
  if (typeof input === 'number') {
    if (!Number.isFinite(input)) return invalid;
    return finalize(String(input), false, 'HIGH');
  }
  if (typeof input !== 'string') return invalid;

  const paren = applyParenthesesNegative(input.replace(/\u00A0/g, ' '));
  const raw = paren.s;

  // Drop currency codes and symbols and grouping spaces; keep a single leading minus.
  const cleaned = raw
    .trim()
    .replace(/[A-Za-z]/g, '')
    .replace(/[$€£¥]/g, '')
    .replace(/\s+/g, '')
    .replace(/(?!^)-/g, '');

  const wasNormalizedBase = paren.wasNormalized || cleaned !== raw;

  if (!/^-?[0-9.,]+$/.test(cleaned) || !/[0-9]/.test(cleaned)) return invalid;

  const hasDot = cleaned.includes('.');
  const hasComma = cleaned.includes(',');

  if (hasDot && hasComma) {
    const decimalIsDot = cleaned.lastIndexOf('.') > cleaned.lastIndexOf(',');
    const valid = decimalIsDot ? isUsMixedValid(cleaned) : isEuMixedValid(cleaned);
    if (!valid) return ambiguous;

    const normalized = decimalIsDot ? cleaned.replace(/,/g, '') : cleaned.replace(/\./g, '').replace(/,/g, '.');
    return finalize(normalized, true, 'HIGH');
  }

  if (hasComma) {
    const parts = cleaned.split(',');

    if (parts.length > 2) {
      if (/^-?\d{1,3}(?:,\d{3})+$/.test(cleaned)) return finalize(cleaned.replace(/,/g, ''), true, 'HIGH');
      return ambiguous;
    }

    const [lhs, rhs] = parts;
    if (rhs.length === 2) return finalize(`${lhs}.${rhs}`, true, 'MEDIUM');
    if (rhs.length === 3 && /^\d{1,3}$/.test(lhs.replace(/^-/, ''))) return finalize(`${lhs}${rhs}`, true, 'HIGH');
    return ambiguous;
  }

  if (hasDot) {
    const parts = cleaned.split('.');
    if (parts.length !== 2) return invalid;
    const rhs = parts[1];
    if (rhs.length === 3) return ambiguous;
    return finalize(cleaned, wasNormalizedBase, 'HIGH');
  }

  return finalize(cleaned, wasNormalizedBase, wasNormalizedBase ? 'MEDIUM' : 'HIGH');
}
