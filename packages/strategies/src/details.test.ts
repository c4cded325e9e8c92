import { describe, it, expect } from 'vitest';
import { UNRESOLVED } from '@fieldwise/contracts';
import { createDocumentText } from '@fieldwise/shared';
import { extractDocumentDetails } from './details.js';

describe('extractDocumentDetails', () => {
  it('should read English invoice metadata and tax fields', () => {
    const details = extractDocumentDetails(
      createDocumentText([
        'Invoice Number: INV-2024-001',
        'Invoice Date: 2024-01-15',
        'Due Date: 2024-02-14',
        'Payment Terms: Net 30',
        'VAT (19%): 237.50',
        'VAT ID: DE123456789',
      ]),
    );

    expect(details).toEqual({
      invoice_number: 'INV-2024-001',
      invoice_date: '2024-01-15',
      due_date: '2024-02-14',
      payment_terms: 'Net 30',
      tax_amount: '237.50',
      tax_rate: '19%',
      tax_id: 'DE123456789',
    });
  });

  it('should read German labels and normalize the tax amount', () => {
    const details = extractDocumentDetails(
      createDocumentText([
        'Rechnungsnummer: RE-1042',
        'Rechnungsdatum: 15.01.2024',
        'MwSt. 19%: 190,00 EUR',
        'USt-IdNr.: DE123456789',
      ]),
    );

    expect(details.invoice_number).toBe('RE-1042');
    expect(details.invoice_date).toBe('15.01.2024');
    expect(details.tax_amount).toBe('190.00');
    expect(details.tax_rate).toBe('19%');
    expect(details.tax_id).toBe('DE123456789');
  });

  it('should not take a due date for the invoice date', () => {
    const details = extractDocumentDetails(createDocumentText(['Due Date: 2024-02-14']));

    expect(details.invoice_date).toBe(UNRESOLVED);
    expect(details.due_date).toBe('2024-02-14');
  });

  it('should accept a US employer identification number', () => {
    expect(extractDocumentDetails(createDocumentText(['EIN: 12-3456789'])).tax_id).toBe('12-3456789');
  });

  it('should leave every detail unresolved for empty text', () => {
    const details = extractDocumentDetails(createDocumentText(''));

    expect(Object.values(details).every((value) => value === UNRESOLVED)).toBe(true);
  });
});
