import { describe, it, expect, vi } from 'vitest';
import { UNRESOLVED, type EntityRecognizer, type LayoutModel } from '@fieldwise/contracts';
import { ConfigurationError } from '@fieldwise/shared';
import { createInvoiceParser, parseInvoiceText } from './invoice-parser.js';

const FROM_TO = ['From: Acme Consulting GmbH', 'To: Tech Solutions Ltd', 'Amount: 1,250.00', 'Currency: EUR'];

const SEPA = [
  'Acme GmbH billing@acme.com',
  'IBAN: DE89 3704 0044 0532 0130 00',
  'BIC: DEUTDEFF',
  'Total: €99.00',
];

function createMockLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn() };
}

describe('createInvoiceParser', () => {
  it('should register the built-in strategies', () => {
    const parser = createInvoiceParser({ logger: createMockLogger() });

    expect(parser.registry.list().map((r) => r.strategy.id)).toEqual([
      'two_column',
      'single_column',
      'company_specific',
      'pattern_fallback',
    ]);
    expect(parser.configHash).toMatch(/^sha256:[0-9a-f]{64}$/);
  });

  it('should parse a From/To invoice with the two-column strategy', async () => {
    const result = await createInvoiceParser({ logger: createMockLogger() }).parse(FROM_TO);

    expect(result.strategyId).toBe('two_column');
    expect(result.source).toBe('two_column');
    expect(result.confidence).toBe(0.55);
    expect(result.needsReview).toBe(true);
    expect(result.learnedStatus).toBe('disabled');
    expect(result.fieldMap.sender).toBe('Acme Consulting GmbH');
    expect(result.fieldMap.recipient).toBe('Tech Solutions Ltd');
    expect(result.fieldMap.amount).toBe('1250.00');
    expect(result.fieldMap.currency).toBe('EUR');
    expect(result.fieldMap.iban).toBe(UNRESOLVED);
    expect(result.fieldMap.payment_method).toBe(UNRESOLVED);
    expect(result.evaluations).toEqual([
      { strategyId: 'two_column', applicable: true, confidence: 0.55, resolvedFields: 4 },
      { strategyId: 'single_column', applicable: false, confidence: 0, resolvedFields: 0 },
      { strategyId: 'company_specific', applicable: false, confidence: 0, resolvedFields: 0 },
      { strategyId: 'pattern_fallback', applicable: false, confidence: 0, resolvedFields: 0 },
    ]);
  });

  it('should evaluate in the order hinted by a trained layout model without changing the winner', async () => {
    const layoutModel: LayoutModel = {
      id: 'layout-v2',
      predict: vi.fn(() => ({ category: 'unstructured', confidence: 0.99 })),
    };
    const logger = createMockLogger();
    const parser = createInvoiceParser({ config: { layoutModelRef: 'layout-v2' }, layoutModel, logger });

    const result = await parser.parse(FROM_TO);

    expect(result.evaluations.map((e) => e.strategyId)).toEqual([
      'pattern_fallback',
      'single_column',
      'two_column',
      'company_specific',
    ]);
    expect(result.strategyId).toBe('two_column');
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should warn and use rules when the referenced layout model is missing', () => {
    const logger = createMockLogger();
    createInvoiceParser({ config: { layoutModelRef: 'layout-v2' }, logger });

    expect(logger.warn).toHaveBeenCalledWith('Layout model not supplied, using rule-based classification', {
      layoutModelRef: 'layout-v2',
    });
  });

  it('should evaluate in canonical order without a layout classifier', async () => {
    const result = await createInvoiceParser({ layoutClassifier: false, logger: createMockLogger() }).parse(SEPA);

    expect(result.evaluations.map((e) => e.strategyId)).toEqual([
      'two_column',
      'single_column',
      'company_specific',
      'pattern_fallback',
    ]);
    expect(result.strategyId).toBe('pattern_fallback');
  });

  it('should fill rule gaps from the entity recognizer', async () => {
    const entityRecognizer: EntityRecognizer = {
      id: 'fake-ner',
      recognize: () => [
        { label: 'ORG', text: 'Acme Consulting GmbH' },
        { label: 'ORG', text: 'Tech Solutions Ltd' },
        { label: 'GPE', text: 'Berlin' },
      ],
    };
    const parser = createInvoiceParser({
      config: { mlEnabled: true, mlMinConfidence: 0.4 },
      entityRecognizer,
      logger: createMockLogger(),
    });

    const result = await parser.parse(FROM_TO);

    expect(result.source).toBe('ensemble');
    expect(result.strategyId).toBe('two_column');
    expect(result.learnedStatus).toBe('applied');
    expect(result.fieldsFromModel).toEqual(['sender_address']);
    expect(result.fieldMap.sender_address).toBe('Berlin');
    expect(result.fieldMap.sender).toBe('Acme Consulting GmbH');
    expect(result.confidence).toBe(0.6);
  });

  it('should run rule-only when ML is enabled without a model', async () => {
    const logger = createMockLogger();
    const parser = createInvoiceParser({ config: { mlEnabled: true }, logger });

    const result = await parser.parse(FROM_TO);

    expect(logger.warn).toHaveBeenCalledWith('Learned fallback enabled without a model, running rule-based only');
    expect(result.learnedStatus).toBe('unavailable');
    expect(result.source).toBe('two_column');
  });

  it('should report unresolved when no enabled strategy applies', async () => {
    const parser = createInvoiceParser({ config: { strategies: { pattern_fallback: false } }, logger: createMockLogger() });

    const result = await parser.parse(['Thank you']);

    expect(result.source).toBe('unresolved');
    expect(result.confidence).toBe(0);
    expect(result.needsReview).toBe(true);
    expect('strategyId' in result).toBe(false);
    expect(result.evaluations.map((e) => e.strategyId)).toEqual(['single_column', 'two_column', 'company_specific']);
  });

  it('should pass strategy tuning through', async () => {
    const parser = createInvoiceParser({
      strategies: {
        companySpecific: {
          profiles: [{ id: 'acme', markers: ['ACME Utilities'], recipientWindow: [1, 5], recipientSkipWords: [] }],
        },
      },
      logger: createMockLogger(),
    });

    const result = await parser.parse(['ACME Utilities', 'Jane Doe']);

    expect(result.strategyId).toBe('company_specific');
    expect(result.fieldMap.sender).toBe('ACME Utilities');
    expect(result.fieldMap.recipient).toBe('Jane Doe');
    expect(result.confidence).toBe(0.4);
  });

  it('should dispatch to every hook in a list', async () => {
    const first = { onParseComplete: vi.fn() };
    const second = { onParseComplete: vi.fn() };
    const parser = createInvoiceParser({ hooks: [first, second], logger: createMockLogger() });

    await parser.parse(FROM_TO);

    expect(first.onParseComplete).toHaveBeenCalledTimes(1);
    expect(second.onParseComplete).toHaveBeenCalledWith(
      expect.objectContaining({ source: 'two_column', strategyId: 'two_column', confidence: 0.55 }),
    );
  });

  it('should parse batches in input order', async () => {
    const parser = createInvoiceParser({ logger: createMockLogger() });

    const outcomes = await parser.parseMany([FROM_TO, SEPA], { maxParallelism: 1 });

    expect(outcomes.map((outcome) => (outcome.ok ? outcome.result.strategyId : undefined))).toEqual([
      'two_column',
      'pattern_fallback',
    ]);
  });

  it('should reject an invalid configuration before parsing', () => {
    expect(() => createInvoiceParser({ config: { confidenceThreshold: 2 } })).toThrow(ConfigurationError);
  });
});

describe('parseInvoiceText', () => {
  it('should accept a compact IBAN and BIC as SEPA', async () => {
    const result = await parseInvoiceText(['IBAN: DE89370400440532013000', 'BIC: DEUTDEFF']);

    expect(result.fieldMap.iban).toBe('DE89370400440532013000');
    expect(result.fieldMap.bic).toBe('DEUTDEFF');
    expect(result.fieldMap.payment_method).toBe('SEPA');
  });

  it('should read SEPA banking details from a document without party labels', async () => {
    const result = await parseInvoiceText(SEPA);

    expect(result.strategyId).toBe('pattern_fallback');
    expect(result.fieldMap.sender).toBe('Acme GmbH');
    expect(result.fieldMap.sender_email).toBe('billing@acme.com');
    expect(result.fieldMap.iban).toBe('DE89370400440532013000');
    expect(result.fieldMap.bic).toBe('DEUTDEFF');
    expect(result.fieldMap.payment_method).toBe('SEPA');
    expect(result.fieldMap.amount).toBe('99.00');
    expect(result.confidence).toBe(0.7);
  });

  it('should honour the confidence threshold', async () => {
    const result = await parseInvoiceText(SEPA, { confidenceThreshold: 0.7 });

    expect(result.needsReview).toBe(false);
  });

  it('should reject an invalid configuration', async () => {
    await expect(parseInvoiceText(FROM_TO, { mlTimeoutMs: 0 })).rejects.toThrow(ConfigurationError);
  });

  it('should read ACH details', async () => {
    const result = await parseInvoiceText(['Routing Number: 121000248', 'Account Number: 1234567890']);

    expect(result.fieldMap.routing_number).toBe('121000248');
    expect(result.fieldMap.account_number).toBe('1234567890');
    expect(result.fieldMap.payment_method).toBe('ACH');
  });
});
