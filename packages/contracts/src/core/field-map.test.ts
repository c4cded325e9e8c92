import { describe, it, expect } from 'vitest';
import { createDocumentDetails, detailsToRecord } from './details.js';
import { FIELD_NAMES, UNRESOLVED, countResolved, createFieldMap, fieldMapToRecord, isResolved } from './field-map.js';

describe('createFieldMap', () => {
  it('should fill every field in canonical order', () => {
    const map = createFieldMap({ iban: 'DE89370400440532013000', sender: ' Acme GmbH ', bic: '  ', amount: null });

    expect(Object.keys(map)).toEqual([...FIELD_NAMES]);
    expect(map.sender).toBe('Acme GmbH');
    expect(map.bic).toBe(UNRESOLVED);
    expect(map.amount).toBe(UNRESOLVED);
    expect(countResolved(map)).toBe(2);
    expect(Object.isFrozen(map)).toBe(true);
  });

  it('should tell resolved values from the sentinel', () => {
    expect(isResolved('EUR')).toBe(true);
    expect(isResolved(UNRESOLVED)).toBe(false);
  });
});

describe('fieldMapToRecord', () => {
  it('should serialize unresolved fields as null and restore them', () => {
    const map = createFieldMap({ sender: 'Acme GmbH', currency: 'EUR' });

    const record = fieldMapToRecord(map);

    expect(record.sender).toBe('Acme GmbH');
    expect(record.iban).toBeNull();
    expect(JSON.parse(JSON.stringify(record))).toEqual(record);
    expect(createFieldMap(record)).toEqual(map);
  });
});

describe('detailsToRecord', () => {
  it('should serialize unresolved details as null and restore them', () => {
    const details = createDocumentDetails({ invoice_number: 'INV-2024-001', tax_rate: '' });

    const record = detailsToRecord(details);

    expect(record).toEqual({
      invoice_number: 'INV-2024-001',
      invoice_date: null,
      due_date: null,
      payment_terms: null,
      tax_amount: null,
      tax_rate: null,
      tax_id: null,
    });
    expect(createDocumentDetails(record)).toEqual(details);
  });
});
