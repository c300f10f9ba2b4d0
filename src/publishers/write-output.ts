import type { OutputStream } from '../types/publisher.ts';

export function writeOutput(output: OutputStream, text: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    output.write(text, (error) => (error ? reject(error) : resolve()));
  });
}
