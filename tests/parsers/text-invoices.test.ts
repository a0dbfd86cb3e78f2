import { describe, it, expect } from 'vitest';
import { MalformedStatementError } from '@ledger/types';
import { bbCreditCardSource, cardInvoiceSource, isBbCreditCard } from '@ledger/parsers';
import { loadFixture } from '../fixtures/index.js';

describe('card-invoice', () => {
  const invoice = loadFixture('card-invoice.txt', 'fatura.txt');

  it('should extract line items with their section as category', () => {
    const { records } = cardInvoiceSource.extract(invoice);

    expect(records).toHaveLength(3);
    expect(records[0]).toEqual({
      sourceId: 'card-invoice',
      lineNumber: 8,
      date: '28/12',
      description: 'PADARIA SAO JOAO',
      amount: '12,50',
      category: 'Restaurantes',
      country: 'BR',
      yearHint: 2024,
      closingMonth: 1,
      originalText: '28/12 PADARIA SAO JOAO BR R$ 12,50',
    });
  });

  it('should default the country and mark the credits section as refunds', () => {
    const { records } = cardInvoiceSource.extract(invoice);

    expect(records[1]?.description).toBe('RESTAURANTE SABOR');
    expect(records[1]?.country).toBe('BR');
    expect(records[2]?.description).toBe('ESTORNO LOJA X');
    expect(records[2]?.amount).toBe('-40,00');
    expect(records[2]?.category).toBe('Refunds');
    expect(records[2]?.lineNumber).toBe(12);
  });

  it('should skip balance, payment, subtotal and page lines', () => {
    const { records } = cardInvoiceSource.extract(invoice);
    const descriptions = records.map((r) => r.description);
    expect(descriptions).not.toContain('SALDO FATURA ANTERIOR');
    expect(descriptions).not.toContain('PGTO DEBITO CONTA');
  });

  it('should read the printed total', () => {
    const { expectedTotal, warnings } = cardInvoiceSource.extract(invoice);
    expect(expectedTotal).toBe(52.5);
    expect(warnings).toEqual([]);
  });

  it('should warn when the total is missing', () => {
    const content = 'Vencimento: 10/04/2024\n05/03 PADARIA SAO JOAO BR R$ 12,50\n';
    const { records, expectedTotal, warnings } = cardInvoiceSource.extract({ fileName: 'fatura.txt', content });
    expect(records).toHaveLength(1);
    expect(expectedTotal).toBeNull();
    expect(warnings).toEqual(["Could not find 'Total da Fatura' in the statement"]);
  });

  it('should fail without a full date to take the year from', () => {
    const content = '05/03 PADARIA SAO JOAO BR R$ 12,50\nTotal da Fatura R$ 12,50\n';
    expect(() => cardInvoiceSource.extract({ fileName: 'fatura.txt', content })).toThrow(
      '[card-invoice] No DD/MM/YYYY date found to infer the statement year'
    );
  });

  it('should not claim SISBB invoices', () => {
    expect(cardInvoiceSource.detect(invoice)).toBe(true);
    expect(cardInvoiceSource.detect(loadFixture('bb-credit-card.txt'))).toBe(false);
  });
});

describe('bb-credit-card', () => {
  const invoice = loadFixture('bb-credit-card.txt', 'fatura-bb.txt');

  it('should recognize the SISBB layout', () => {
    expect(isBbCreditCard(invoice.content)).toBe(true);
    expect(isBbCreditCard(loadFixture('card-invoice.txt').content)).toBe(false);
  });

  it('should extract the DEMONSTRATIVO line items', () => {
    const { records } = bbCreditCardSource.extract(invoice);

    expect(records).toHaveLength(3);
    expect(records[0]).toEqual({
      sourceId: 'bb-credit-card',
      lineNumber: 8,
      date: '05.03.2024',
      description: 'PADARIA SAO JOAO',
      amount: '12,50',
      category: 'Servicos',
      country: 'BR',
      originalText: '05.03.2024PADARIA SAO JOAO        BR     12,50     0,00',
    });
    expect(records[1]?.country).toBe('US');
    expect(records[1]?.amount).toBe('55,90');
    expect(records[2]?.category).toBe('Refunds');
    expect(records[2]?.amount).toBe('-10,00');
  });

  it('should read the total from the totals line', () => {
    const { expectedTotal, warnings } = bbCreditCardSource.extract(invoice);
    expect(expectedTotal).toBe(58.4);
    expect(warnings).toEqual([]);
  });

  it('should fail without the DEMONSTRATIVO section', () => {
    const content = 'SISBB - Sistema de Informações Banco do Brasil\nFatura do Cartão de Crédito\n';
    expect(() => bbCreditCardSource.extract({ fileName: 'fatura-bb.txt', content })).toThrow(MalformedStatementError);
    expect(() => bbCreditCardSource.extract({ fileName: 'fatura-bb.txt', content })).toThrow(
      '[bb-credit-card] Missing DEMONSTRATIVO section'
    );
  });

  it('should stop at the RESUMO EM REAL section', () => {
    const content = [
      'DEMONSTRATIVO',
      '05.03.2024PADARIA SAO JOAO        BR     12,50     0,00',
      'RESUMO EM REAL',
      '06.03.2024NOT A PURCHASE          BR     99,00     0,00',
    ].join('\n');
    const { records, warnings } = bbCreditCardSource.extract({ fileName: 'fatura-bb.txt', content });
    expect(records.map((r) => r.description)).toEqual(['PADARIA SAO JOAO']);
    expect(warnings).toEqual(['Could not find the invoice total line']);
  });
});
