/**
 * Party block helpers shared by the label-driven strategies.
 */

import { findEmails, isLabelLine, isSectionBoundary, isValidEmail, looksLikeAddress, type LabelMatch } from '@fieldwise/shared';

/**
 * Name, address and email of one party as found in the text.
 */
export interface PartyBlock {
  readonly name: string | undefined;

  /** Address lines joined with `, ` */
  readonly address: string | undefined;

  readonly email: string | undefined;
}

/**
 * First valid email on a line.
 */
export function emailIn(line: string): string | undefined {
  return findEmails(line).find(isValidEmail);
}

/**
 * A line with one email removed, along with brackets and separators left
 * dangling around it.
 *
 * @example
 * ```typescript
 * withoutEmail('Acme GmbH <billing@acme.com>', 'billing@acme.com'); // 'Acme GmbH'
 * ```
 */
export function withoutEmail(line: string, email: string): string {
  return line
    .replace(email, '')
    .replace(/[<>()[\]]/g, '')
    .replace(/[\s,;|-]+$/, '')
    .replace(/^[\s,;|-]+/, '')
    .trim();
}

/**
 * Party name from the text after a label; undefined when the value is
 * empty or only an email.
 */
export function nameFromValue(value: string): string | undefined {
  const email = emailIn(value);
  const name = email !== undefined ? withoutEmail(value, email) : value.trim();
  return name.length > 0 ? name : undefined;
}

const joinAddress = (lines: readonly string[]): string | undefined => (lines.length > 0 ? lines.join(', ') : undefined);

/**
 * Party introduced by a two-column header such as `From:` or `Bill to:`.
 *
 * The name is the text after the label, or else the first non-empty line
 * below it. The block below runs until the next `Label:` line or a blank
 * line; its emails give the party email and every other line is address.
 */
export function readLabeledParty(lines: readonly string[], label: LabelMatch, maxBlockLines: number): PartyBlock {
  let name = nameFromValue(label.value);
  let email = emailIn(label.value);
  let cursor = label.index + 1;

  if (label.value.length === 0) {
    while (cursor < lines.length && lines[cursor] === '') {
      cursor++;
    }
    const next = lines[cursor];
    if (next !== undefined && !isLabelLine(next)) {
      const nextEmail = emailIn(next);
      name = nextEmail !== undefined ? nameFromValue(next) : next;
      email = nextEmail;
      cursor++;
    }
  }

  const address: string[] = [];
  for (const line of lines.slice(cursor, cursor + maxBlockLines)) {
    const lineEmail = emailIn(line);
    if (line.length === 0 || (lineEmail === undefined && isLabelLine(line))) {
      break;
    }
    if (lineEmail === undefined) {
      address.push(line);
      continue;
    }
    if (email === undefined) {
      email = lineEmail;
    }
    // `Email: ...` contributes the email only
    const rest = withoutEmail(line, lineEmail);
    if (rest.length > 0 && !isLabelLine(line)) {
      address.push(rest);
    }
  }

  return { name, address: joinAddress(address), email };
}

/**
 * Party introduced by a single-column label such as `Absender:`.
 *
 * The section spans at most `maxLines` lines below the label and ends
 * early at `endIndex` (the other party's label), at a section boundary, or
 * at a blank line once something was collected. The name is the text after
 * the label or the first line that does not read as an address.
 */
export function readLabeledSection(
  lines: readonly string[],
  label: LabelMatch,
  endIndex: number,
  maxLines: number,
): PartyBlock {
  let name = nameFromValue(label.value);
  let email = emailIn(label.value);
  const address: string[] = [];
  const end = Math.min(endIndex, label.index + 1 + maxLines, lines.length);

  for (let index = label.index + 1; index < end; index++) {
    let line = lines[index] ?? '';
    if (line.length === 0) {
      if (name !== undefined || email !== undefined || address.length > 0) break;
      continue;
    }

    const lineEmail = emailIn(line);
    if (lineEmail !== undefined) {
      if (email === undefined) {
        email = lineEmail;
      }
      if (isLabelLine(line)) continue;
      line = withoutEmail(line, lineEmail);
      if (line.length === 0) continue;
    }

    if (isSectionBoundary(line)) break;
    if (isLabelLine(line)) continue;

    if (looksLikeAddress(line)) {
      address.push(line);
    } else if (name === undefined && line.length > 2) {
      name = line;
    }
  }

  return { name, address: joinAddress(address), email };
}
