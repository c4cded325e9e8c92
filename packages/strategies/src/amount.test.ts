import { describe, it, expect } from 'vitest';
import { createDocumentText } from '@fieldwise/shared';
import { amountHints, extractAmount } from './amount.js';

describe('extractAmount', () => {
  it('should normalize a US-formatted total', () => {
    expect(extractAmount(createDocumentText(['Amount: 1,250.00']))).toBe('1250.00');
  });

  it('should read separators the German way on German documents', () => {
    expect(extractAmount(createDocumentText(['Rechnung', 'Betrag: 1.250,00 EUR']))).toBe('1250.00');
  });

  it('should keep a token that does not normalize as written', () => {
    expect(extractAmount(createDocumentText(['Total: 0.00']))).toBe('0.00');
  });

  it('should not truncate a total with extra decimal digits', () => {
    expect(extractAmount(createDocumentText(['Amount: 12345.678']))).toBeUndefined();
    expect(extractAmount(createDocumentText(['Total: 1,250.00.']))).toBe('1250.00');
  });

  it('should return undefined when no amount is labeled', () => {
    expect(extractAmount(createDocumentText(['Thank you']))).toBeUndefined();
  });
});

describe('amountHints', () => {
  it('should combine the detected currency and language', () => {
    expect(amountHints(createDocumentText(['Rechnung', 'Gesamtbetrag: 10,00 €']))).toEqual({
      currency: 'EUR',
      language: 'de',
    });
  });
});
