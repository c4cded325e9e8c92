/**
 * Normalized text of one document, as handed to strategies and classifiers.
 */
export interface DocumentText {
  /** Normalized lines, blank lines preserved as `''` */
  readonly lines: readonly string[];

  /** Lines joined with `\n` */
  readonly text: string;
}
