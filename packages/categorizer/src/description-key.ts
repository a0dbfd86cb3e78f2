/**
 * Description keys: the normalized form under which history and new
 * transactions are compared.
 *
 *   "AMZN MKTPLACE 12/03"   → "amzn mktplace"
 *   "Padaria São João 3/10" → "padaria sao joao"
 */

// Words banks add around the merchant name that say nothing about the category.
export const NOISE_TOKENS: ReadonlySet<string> = new Set([
  'pos',
  'compra',
  'compras',
  'purchase',
  'debit',
  'debito',
  'credit',
  'credito',
  'card',
  'cartao',
  'www',
  'http',
  'https',
  'com',
  'br',
  'parc',
  'parcela',
  'ltda',
  'eireli',
  'inc',
  'llc',
  'de',
  'da',
  'do',
]);

const DATE_OR_INSTALLMENT = /\b\d{1,2}\s*[/.-]\s*\d{1,2}(?:\s*[/.-]\s*\d{2,4})?\b/g;

export function descriptionKey(description: string): string {
  const folded = description
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(DATE_OR_INSTALLMENT, ' ')
    .replace(/[^a-z0-9\s]/g, ' ');

  return folded
    .split(/\s+/)
    .filter((token) => token !== '' && !/^\d+$/.test(token) && !NOISE_TOKENS.has(token))
    .join(' ');
}
