/**
 * Pattern catalog: the regular expressions and token lists strategies use
 * to locate candidate substrings.
 *
 * @module @fieldwise/shared/patterns
 */

export * from './labels.js';
export * from './email.js';
export * from './amounts.js';
export * from './address.js';
export * from './banking.js';
export * from './details.js';
export * from './language.js';
