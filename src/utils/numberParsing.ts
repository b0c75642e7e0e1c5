export type NumericRange = {
  /** Exclusive lower bound */
  min: number;
  /** Exclusive upper bound */
  max: number;
};

export const KWH_RANGE_DEFAULT: NumericRange = { min: 1, max: 100000 };

const CANONICAL_NUMBER_RE = /^-?\d+(?:\.\d+)?$/;

function stripNbsp(s: string) {
  return s.replace(/\u00A0/g, ' ');
}

function isFiniteNumber(n: number): boolean {
  return typeof n === 'number' && Number.isFinite(n);
}

/**
 * Resolves a token that uses a single kind of separator.
 * 1-2 digits after the last separator -> decimal point. A token with more than one
 * such separator ("1.234.56") stays malformed and is rejected by the caller.
 * Anything else -> every separator groups thousands.
 */
function resolveSingleSeparator(s: string, sep: '.' | ','): string {
  const tail = s.slice(s.lastIndexOf(sep) + 1);
  if (/^\d{1,2}$/.test(tail)) return s.split(sep).join('.');
  return s.split(sep).join('');
}

/**
 * normalizeGermanDecimal
 *
 * Decision table for OCR number tokens from German-language invoices:
 * - "." and ",": the right-most separator is the decimal one ("2.573,1" and "2,573.1" -> 2573.1)
 * - only ",": decimal when 1-2 digits follow the last comma ("73,5"), thousands otherwise ("12,345")
 * - only ".": decimal when 1-2 digits follow the last dot ("2573.1"), thousands otherwise ("2.573")
 *
 * Returns null for anything that does not end up as a plain decimal number.
 */
export function normalizeGermanDecimal(raw: string): number | null {
  const cleaned = stripNbsp(raw).trim().replace(/\s+/g, '');
  if (!cleaned || !/[0-9]/.test(cleaned)) return null;

  const hasDot = cleaned.includes('.');
  const hasComma = cleaned.includes(',');

  let normalized: string;
  if (hasDot && hasComma) {
    const decimalIsDot = cleaned.lastIndexOf('.') > cleaned.lastIndexOf(',');
    normalized = decimalIsDot
      ? cleaned.replace(/,/g, '')
      : cleaned.replace(/\./g, '').replace(/,/g, '.');
  } else if (hasComma) {
    normalized = resolveSingleSeparator(cleaned, ',');
  } else if (hasDot) {
    normalized = resolveSingleSeparator(cleaned, '.');
  } else {
    normalized = cleaned;
  }

  if (!CANONICAL_NUMBER_RE.test(normalized)) return null;
  const n = Number(normalized);
  return isFiniteNumber(n) ? n : null;
}

export function isWithinRange(n: number, range: NumericRange): boolean {
  return n > range.min && n < range.max;
}

/**
 * Normalizes a consumption token and keeps it only inside the plausible range.
 * The range filters customer numbers and years that happen to sit next to a "kWh".
 */
export function parseKwhValue(raw: string | number, range: NumericRange = KWH_RANGE_DEFAULT): number | null {
  const n = typeof raw === 'number' ? (isFiniteNumber(raw) ? raw : null) : normalizeGermanDecimal(raw);
  if (n === null) return null;
  // The one-decimal rendering has to respect the bounds too ("1,04" prints as "1.0").
  return isWithinRange(n, range) && isWithinRange(Number(formatKwh(n)), range) ? n : null;
}

export function formatKwh(n: number): string {
  return n.toFixed(1);
}
