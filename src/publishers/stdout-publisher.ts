import type { OutputStream, Publisher } from '../types/publisher.ts';
import { writeOutput } from './write-output.ts';

/** Passes chunks through untouched: no parsing, no background tasks. */
export class StdoutPublisher implements Publisher {
  constructor(private readonly output: OutputStream = process.stdout) {}

  async write(chunk: string): Promise<void> {
    await writeOutput(this.output, chunk);
  }

  async close(): Promise<void> {
    // Nothing to close for stdout
    return Promise.resolve();
  }
}
