/**
 * Injectable id generation, so tests and audits can use fixed ids.
 */
export interface IdGenerator {
  generate(prefix?: string): string;
}

/**
 * Timestamp plus eight characters of `crypto.randomUUID()`.
 */
export const defaultIdGenerator: IdGenerator = {
  generate: (prefix?: string) => {
    const timestamp = Date.now().toString(36);
    const random = globalThis.crypto.randomUUID().slice(0, 8);
    return prefix ? `${prefix}-${timestamp}-${random}` : `${timestamp}-${random}`;
  },
};

/**
 * Id of one parse, used to correlate hook events and log lines.
 *
 * @example
 * generateParseId() // => 'parse-lq2x4y-a1b2c3d4'
 * generateParseId({ generate: () => 'fixed' }) // => 'fixed'
 */
export function generateParseId(idGenerator: IdGenerator = defaultIdGenerator): string {
  return idGenerator.generate('parse');
}
