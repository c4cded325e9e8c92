/**
 * Document language hint used for number formatting.
 */
export type DocumentLanguage = 'de' | 'en';

const GERMAN_INDICATORS: readonly string[] = [
  'Rechnung',
  'Rechnungsnummer',
  'Absender',
  'Rechnungsempfänger',
  'Gesamtbetrag',
  'Rechnungsbetrag',
  'MwSt',
  'Mehrwertsteuer',
  'Zahlungsbedingungen',
  'Fälligkeitsdatum',
  'Kundennummer',
  'straße',
  'strasse',
  'GmbH',
];

const ENGLISH_INDICATORS: readonly string[] = [
  'Invoice',
  'Bill to',
  'From:',
  'To:',
  'Amount Due',
  'Total Amount',
  'Payment Terms',
  'Due Date',
  'Customer',
  'Street',
  'Avenue',
  'Road',
  'Inc',
  'Corp',
  'LLC',
];

/**
 * `de` when German indicators outnumber English ones, otherwise `en`.
 */
export function detectLanguage(text: string): DocumentLanguage {
  const count = (indicators: readonly string[]): number =>
    indicators.filter((indicator) => text.includes(indicator)).length;
  return count(GERMAN_INDICATORS) > count(ENGLISH_INDICATORS) ? 'de' : 'en';
}
