import { SizeSummary } from '../types';

// Berkeley-style `size` output: "   text    data     bss     dec     hex filename"
const SIZE_LINE_RE = /^\s*([0-9]+)\s+([0-9]+)\s+([0-9]+)\s+([0-9]+)/;

export function deriveSizes(textSize: number, dataSize: number, bssSize: number, overallSize: number): SizeSummary {
  return {
    textSize,
    dataSize,
    bssSize,
    overallSize,
    progMemSize: textSize + dataSize,
    staticRamSize: dataSize + bssSize
  };
}

// First line with four unsigned integers wins; undefined when there is none.
export function parseSizeSummary(output: string): SizeSummary | undefined {
  for (const line of output.split(/\r?\n/)) {
    const m = line.match(SIZE_LINE_RE);
    if (m) {
      return deriveSizes(parseInt(m[1], 10), parseInt(m[2], 10), parseInt(m[3], 10), parseInt(m[4], 10));
    }
  }
  return undefined;
}
