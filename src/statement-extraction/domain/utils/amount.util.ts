/**
 * Amount helpers for consumers of extraction records.
 *
 * Resolution itself never coerces values: records carry the raw cell text.
 * These helpers turn that text into numbers for totals and rendering.
 *
 * Rules:
 * - '' (or whitespace) is the "no data" sentinel → null
 * - (123.45) is negative → -123.45
 * - thousands separators are dropped before parsing
 * - anything still not a plain decimal number → 0
 */

const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

export const parseAmount = (raw: string | null | undefined): number | null => {
  if (raw === null || raw === undefined) {
    return null;
  }

  let value = raw.trim();
  if (value.length === 0) {
    return null;
  }

  if (value.startsWith('(') && value.endsWith(')')) {
    value = `-${value.slice(1, -1).trim()}`;
  }

  value = value.replace(/,/g, '');

  if (!DECIMAL_PATTERN.test(value)) {
    return 0;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : 0;
};

export const amountOrZero = (raw: string | null | undefined): number =>
  parseAmount(raw) ?? 0;

export const sumAmounts = (raws: ReadonlyArray<string | undefined>): number =>
  raws.reduce((total, raw) => total + amountOrZero(raw), 0);

/**
 * Statement style: grouped thousands, fixed decimals, negatives in
 * brackets, zero as a dash.
 */
export const formatAmount = (value: number, decimalPlaces = 2): string => {
  if (value === 0 || !Number.isFinite(value)) {
    return '-';
  }

  const formatted = Math.abs(value).toLocaleString('en-US', {
    minimumFractionDigits: decimalPlaces,
    maximumFractionDigits: decimalPlaces,
  });

  return value < 0 ? `(${formatted})` : formatted;
};
