/**
 * Splits a chunk of text into the lines that get fed to a parser. Only
 * truly empty lines are dropped; whitespace-only lines pass through.
 */
export function splitLines(chunk: string): string[] {
  return chunk.split('\n').filter((line) => line !== '');
}
