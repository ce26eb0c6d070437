/**
 * In-memory OutputWriter implementation
 * For testing - keeps every write instead of printing it
 */

import { OutputWriter } from '../types/output-writer';

export class BufferOutput implements OutputWriter {
  private readonly chunks: string[] = [];

  write(text: string): void {
    this.chunks.push(text);
  }

  /**
   * Everything written so far, concatenated
   */
  text(): string {
    return this.chunks.join('');
  }

  /**
   * Written text split into lines (a trailing newline does not add an empty line)
   */
  lines(): string[] {
    const text = this.text();
    if (text === '') {
      return [];
    }
    return text.replace(/\n$/, '').split('\n');
  }

  /** Number of write() calls */
  get writeCount(): number {
    return this.chunks.length;
  }

  clear(): void {
    this.chunks.length = 0;
  }
}

export function createBufferOutput(): BufferOutput {
  return new BufferOutput();
}
