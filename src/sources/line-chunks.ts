/**
 * Regroups an arbitrary text stream into chunks that end on a line boundary,
 * so a line split across two reads reaches the publisher in one piece. Any
 * unterminated tail is emitted once the input ends.
 */
export async function* lineAlignedChunks(input: AsyncIterable<string>): AsyncGenerator<string> {
  let remainder = '';
  for await (const piece of input) {
    const text = remainder + piece;
    const cut = text.lastIndexOf('\n');
    if (cut === -1) {
      remainder = text;
      continue;
    }
    remainder = text.slice(cut + 1);
    yield text.slice(0, cut + 1);
  }
  if (remainder !== '') {
    yield remainder;
  }
}
