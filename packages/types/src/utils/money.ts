import type { DecimalSeparator } from '../schemas/index.js';

/**
 * Parse a money string. `decimalSeparator` ',' reads Brazilian amounts such as
 * `R$ 1.234,56`; '.' reads `$1,234.56`. Parentheses or a trailing '-' mean negative.
 */
export function parseAmount(amountStr: string, decimalSeparator: DecimalSeparator = '.'): number {
  const trimmed = amountStr.trim();
  const isNegative = trimmed.startsWith('-') || trimmed.endsWith('-') || /^\(.*\)$/.test(trimmed);

  let cleaned = trimmed.replace(/R\$|\$|[()\s+-]/g, '');
  cleaned = decimalSeparator === ','
    ? cleaned.replace(/\./g, '').replace(',', '.')
    : cleaned.replace(/,/g, '');

  if (!/^\d+(\.\d+)?$/.test(cleaned)) {
    throw new Error(`Unable to parse amount: ${amountStr}`);
  }

  const num = parseFloat(cleaned);
  return isNegative ? -num : num;
}

export function roundToTwoDecimals(num: number): number {
  return Math.round(num * 100) / 100;
}

export function sumAmounts(amounts: number[]): number {
  return roundToTwoDecimals(amounts.reduce((sum, amt) => sum + amt, 0));
}

/**
 * Format as Brazilian currency without the symbol: 3048.82 → '3.048,82'.
 */
export function formatBRL(amount: number): string {
  const sign = amount < 0 ? '-' : '';
  const [whole = '0', cents = '00'] = Math.abs(amount).toFixed(2).split('.');
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, '.');
  return `${sign}${grouped},${cents}`;
}

export function formatDecimal(amount: number): string {
  return amount.toFixed(2);
}
