import { describe, it, expect } from 'vitest';
import { UNRESOLVED } from '@fieldwise/contracts';
import { createDocumentText } from '@fieldwise/shared';
import { hasStructuredTrigger, patternFallbackStrategy } from './pattern-fallback.js';

describe('patternFallbackStrategy', () => {
  it('should apply only when no structured trigger is present', () => {
    expect(patternFallbackStrategy.canHandle(createDocumentText(['IBAN: DE89 3704 0044 0532 0130 00']))).toBe(true);
    expect(patternFallbackStrategy.canHandle(createDocumentText(['From: Acme GmbH']))).toBe(false);
    expect(patternFallbackStrategy.canHandle(createDocumentText(['DB Vertrieb GmbH']))).toBe(false);
  });

  it('should read banking fields from unlabeled documents', () => {
    const { fieldMap } = patternFallbackStrategy.extract(
      createDocumentText(['IBAN: DE89 3704 0044 0532 0130 00', 'BIC: DEUTDEFF']),
    );

    expect(fieldMap.iban).toBe('DE89370400440532013000');
    expect(fieldMap.bic).toBe('DEUTDEFF');
    expect(fieldMap.payment_method).toBe('SEPA');
    expect(fieldMap.sender).toBe(UNRESOLVED);
  });

  it('should leave an over-precise amount unresolved', () => {
    const { fieldMap } = patternFallbackStrategy.extract(
      createDocumentText(['Acme GmbH billing@acme.com', 'Amount: 12345.678']),
    );

    expect(fieldMap.amount).toBe(UNRESOLVED);
    expect(fieldMap.sender).toBe('Acme GmbH');
  });

  it('should name the sender from the text before its mailbox', () => {
    const { fieldMap } = patternFallbackStrategy.extract(
      createDocumentText(['Acme GmbH billing@acme.com', 'Contact: jane@beta.io', 'Total: €99.00']),
    );

    expect(fieldMap.sender).toBe('Acme GmbH');
    expect(fieldMap.sender_email).toBe('billing@acme.com');
    expect(fieldMap.recipient_email).toBe('jane@beta.io');
    expect(fieldMap.amount).toBe('99.00');
    expect(fieldMap.currency).toBe('EUR');
  });

  it('should not take label text for a sender name', () => {
    const { fieldMap } = patternFallbackStrategy.extract(createDocumentText(['Contact: billing@acme.com']));

    expect(fieldMap.sender).toBe(UNRESOLVED);
    expect(fieldMap.sender_email).toBe('billing@acme.com');
  });
});

describe('hasStructuredTrigger', () => {
  it('should detect single-column labels', () => {
    expect(hasStructuredTrigger(createDocumentText(['Rechnungsempfänger:']))).toBe(true);
    expect(hasStructuredTrigger(createDocumentText(['Total: 10.00']))).toBe(false);
  });
});
