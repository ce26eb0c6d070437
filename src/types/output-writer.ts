/**
 * Output writer interface
 * Abstracts the standard streams so rendered text can be captured in tests
 */

export interface OutputWriter {
  /**
   * Write a block of text verbatim (no newline is appended)
   */
  write(text: string): void;
}
