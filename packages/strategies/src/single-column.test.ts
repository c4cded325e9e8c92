import { describe, it, expect } from 'vitest';
import { UNRESOLVED } from '@fieldwise/contracts';
import { createDocumentText } from '@fieldwise/shared';
import { createSingleColumnStrategy, singleColumnStrategy } from './single-column.js';

describe('singleColumnStrategy', () => {
  it('should apply to party labels only', () => {
    expect(singleColumnStrategy.canHandle(createDocumentText(['Absender:', 'Acme GmbH']))).toBe(true);
    expect(singleColumnStrategy.canHandle(createDocumentText(['From: Acme']))).toBe(false);
  });

  it('should read German sections stacked one below the other', () => {
    const { fieldMap } = singleColumnStrategy.extract(
      createDocumentText([
        'Absender:',
        'Acme GmbH',
        'Hauptstraße 5',
        '10115 Berlin',
        '',
        'Rechnungsempfänger:',
        'Beta AG',
        'Marktplatz 1',
        '80331 München',
        'kontakt@beta.de',
        '',
        'Rechnungsbetrag: 1.190,00 EUR',
      ]),
    );

    expect(fieldMap.sender).toBe('Acme GmbH');
    expect(fieldMap.sender_address).toBe('Hauptstraße 5, 10115 Berlin');
    expect(fieldMap.recipient).toBe('Beta AG');
    expect(fieldMap.recipient_address).toBe('Marktplatz 1, 80331 München');
    expect(fieldMap.recipient_email).toBe('kontakt@beta.de');
    expect(fieldMap.sender_email).toBe(UNRESOLVED);
    expect(fieldMap.amount).toBe('1190.00');
    expect(fieldMap.currency).toBe('EUR');
  });

  it('should end a section at a document keyword', () => {
    const { fieldMap, details } = singleColumnStrategy.extract(
      createDocumentText(['Vendor: Acme Corp', '12 Elm Road', 'Invoice Date: 2024-03-01', 'Customer: Beta LLC']),
    );

    expect(fieldMap.sender).toBe('Acme Corp');
    expect(fieldMap.sender_address).toBe('12 Elm Road');
    expect(fieldMap.recipient).toBe('Beta LLC');
    expect(fieldMap.recipient_address).toBe(UNRESOLVED);
    expect(details.invoice_date).toBe('2024-03-01');
  });

  it('should fall back to mailbox heuristics for emails outside the sections', () => {
    const { fieldMap } = singleColumnStrategy.extract(
      createDocumentText(['Sender: Acme GmbH', '', 'Recipient: Beta Ltd', '', 'Questions? billing@acme.com']),
    );

    expect(fieldMap.sender_email).toBe('billing@acme.com');
    expect(fieldMap.recipient_email).toBe(UNRESOLVED);
  });

  it('should cap a section at the configured number of lines', () => {
    const strategy = createSingleColumnStrategy({ maxSectionLines: 1 });
    const { fieldMap } = strategy.extract(createDocumentText(['Absender:', 'Acme GmbH', 'Hauptstraße 5']));

    expect(fieldMap.sender).toBe('Acme GmbH');
    expect(fieldMap.sender_address).toBe(UNRESOLVED);
  });
});
