import { toFieldValue, type DocumentText } from '@fieldwise/contracts';
import {
  ACCOUNT_LABELED,
  BANK_NAME_PATTERNS,
  BIC_LABELED,
  IBAN_CANDIDATE,
  IBAN_LABELED,
  PAYMENT_ADDRESS_HEADER,
  ROUTING_LABELED,
  SORT_CODE_LABELED,
  compactIban,
  inspectIban,
  inspectSortCode,
  isSepaCountry,
  validateAbaRouting,
  validateBic,
  validateIban,
} from '@fieldwise/shared';
import type { BankingFields, PaymentMethod } from './types.js';

const PAYMENT_ADDRESS_MAX_LINES = 4;

/**
 * Longest valid IBAN at the start of a candidate. Pattern matches can run
 * into the following word, so trailing groups are dropped until the
 * checksum holds.
 */
export function trimToValidIban(candidate: string): string | undefined {
  const groups = candidate.trim().split(/\s+/);
  while (groups.length > 0) {
    const joined = groups.join('');
    if (validateIban(joined)) {
      return compactIban(joined);
    }
    groups.pop();
  }
  return undefined;
}

function findIban(text: string): string | undefined {
  const labeled = IBAN_LABELED.exec(text)?.[1];
  const fromLabel = labeled !== undefined ? trimToValidIban(labeled) : undefined;
  if (fromLabel !== undefined) {
    return fromLabel;
  }

  for (const match of text.matchAll(IBAN_CANDIDATE)) {
    const iban = trimToValidIban(match[0]);
    if (iban !== undefined) {
      return iban;
    }
  }
  return undefined;
}

function findBic(text: string): string | undefined {
  const candidate = BIC_LABELED.exec(text)?.[1]?.toUpperCase();
  return candidate !== undefined && validateBic(candidate) ? candidate : undefined;
}

function findBankName(text: string): string | undefined {
  for (const pattern of BANK_NAME_PATTERNS) {
    const name = pattern.exec(text)?.[1]?.trim();
    if (name) {
      return name;
    }
  }
  return undefined;
}

function findPaymentAddress(lines: readonly string[]): string | undefined {
  const header = lines.findIndex((line) => PAYMENT_ADDRESS_HEADER.test(line));
  if (header < 0) {
    return undefined;
  }

  const parts: string[] = [];
  for (const line of lines.slice(header + 1, header + 1 + PAYMENT_ADDRESS_MAX_LINES)) {
    if (line.length === 0 || line.startsWith('---') || line.includes('Description')) {
      break;
    }
    parts.push(line);
  }
  return parts.length > 0 ? parts.join(', ') : undefined;
}

function findRoutingNumber(text: string): string | undefined {
  const candidate = ROUTING_LABELED.exec(text)?.[1];
  return candidate !== undefined && validateAbaRouting(candidate) ? candidate : undefined;
}

function findSortCode(text: string): string | undefined {
  const candidate = SORT_CODE_LABELED.exec(text)?.[1];
  if (candidate === undefined) {
    return undefined;
  }
  const inspection = inspectSortCode(candidate);
  return inspection.valid ? inspection.normalized : undefined;
}

/**
 * Payment rail implied by validated identifiers: an IBAN first, then a US
 * routing number, then a UK sort code.
 */
export function resolvePaymentMethod(
  iban: string | undefined,
  routingNumber: string | undefined,
  sortCode: string | undefined,
): PaymentMethod | undefined {
  if (iban !== undefined) {
    const countryCode = inspectIban(iban).countryCode;
    return countryCode !== undefined && isSepaCountry(countryCode) ? 'SEPA' : 'SEPA_INTERNATIONAL';
  }
  if (routingNumber !== undefined) {
    return 'ACH';
  }
  if (sortCode !== undefined) {
    return 'BACS';
  }
  return undefined;
}

/**
 * Banking fields shared by every strategy. Identifiers that fail their
 * validator are left UNRESOLVED.
 *
 * @example
 * ```typescript
 * const banking = extractBankingFields(createDocumentText([
 *   'IBAN: DE89 3704 0044 0532 0130 00',
 *   'BIC: DEUTDEFF',
 * ]));
 * banking.iban;           // 'DE89370400440532013000'
 * banking.payment_method; // 'SEPA'
 * ```
 */
export function extractBankingFields(doc: DocumentText): BankingFields {
  const iban = findIban(doc.text);
  const routingNumber = findRoutingNumber(doc.text);
  const sortCode = findSortCode(doc.text);

  return Object.freeze({
    iban: toFieldValue(iban),
    bic: toFieldValue(findBic(doc.text)),
    bank_name: toFieldValue(findBankName(doc.text)),
    payment_address: toFieldValue(findPaymentAddress(doc.lines)),
    routing_number: toFieldValue(routingNumber),
    account_number: toFieldValue(ACCOUNT_LABELED.exec(doc.text)?.[1]),
    sort_code: toFieldValue(sortCode),
    payment_method: toFieldValue(resolvePaymentMethod(iban, routingNumber, sortCode)),
  });
}
