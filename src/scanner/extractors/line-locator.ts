/**
 * Maps character offsets in `content` to 1-based line numbers: one plus the
 * number of `\n` characters before the offset.
 */
export function createLineLocator(content: string): (offset: number) => number {
  const newlineOffsets: number[] = [];
  for (let index = content.indexOf("\n"); index !== -1; index = content.indexOf("\n", index + 1)) {
    newlineOffsets.push(index);
  }

  return (offset: number): number => {
    let low = 0;
    let high = newlineOffsets.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      const newline = newlineOffsets[mid];
      if (newline !== undefined && newline < offset) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low + 1;
  };
}
