/**
 * Email candidates. The domain must end in a dotted label, so trailing
 * punctuation is not captured.
 */
export const EMAIL_PATTERN = /[\w.+-]+@[\w-]+(?:\.[\w-]+)+/g;

/**
 * Mailboxes that usually belong to the issuing company rather than the
 * customer.
 */
export const SENDER_MAILBOX_PREFIXES: readonly string[] = [
  'support@',
  'billing@',
  'info@',
  'invoices@',
  'invoice@',
  'accounts@',
  'sales@',
  'contact@',
  'hello@',
  'noreply@',
  'no-reply@',
];

/**
 * All email candidates in order of appearance.
 */
export function findEmails(text: string): string[] {
  return Array.from(text.matchAll(EMAIL_PATTERN), (match) => match[0]);
}

export function isSenderMailbox(email: string): boolean {
  const lower = email.toLowerCase();
  return SENDER_MAILBOX_PREFIXES.some((prefix) => lower.startsWith(prefix));
}

/**
 * First sender-looking mailbox and first other mailbox in the text.
 */
export function splitPartyEmails(text: string): { sender?: string; recipient?: string } {
  const result: { sender?: string; recipient?: string } = {};
  for (const email of findEmails(text)) {
    if (isSenderMailbox(email)) {
      if (result.sender === undefined) result.sender = email;
    } else if (result.recipient === undefined) {
      result.recipient = email;
    }
  }
  return result;
}
