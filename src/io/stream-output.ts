/**
 * Real OutputWriter implementation
 * Writes straight to a process stream
 */

import { OutputWriter } from '../types/output-writer';

export class StreamOutput implements OutputWriter {
  constructor(private readonly stream: NodeJS.WritableStream) {}

  write(text: string): void {
    this.stream.write(text);
  }
}

export function createStdoutOutput(): OutputWriter {
  return new StreamOutput(process.stdout);
}

export function createStderrOutput(): OutputWriter {
  return new StreamOutput(process.stderr);
}
