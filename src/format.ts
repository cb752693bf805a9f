// Formatting helpers for one-line binary summaries in verbose output

export interface BinarySummaryFields {
  filename: string;
  fileFormat?: string;
  progMemSize: number;
  staticRamSize: number;
  symbols: ReadonlyMap<string, unknown>;
  numSymbolsDropped: number;
  sourceFiles: ReadonlyMap<number, unknown>;
  toolsReliable: boolean;
  instructionsAvailable: boolean;
}

// Join provided (string | false) parts into a comma separated list.
// Falsy entries are skipped.
export function joinParts(parts: Array<string | false>): string {
  return parts.filter(Boolean).join(', ');
}

export function formatBytes(n: number): string {
  return `${n} byte${n === 1 ? '' : 's'}`;
}

export function describeBinary(b: BinarySummaryFields): string {
  const flags = joinParts([
    !b.toolsReliable && 'sizes unavailable',
    !b.instructionsAvailable && 'no disassembly'
  ]);
  return `${b.filename} (${b.fileFormat ?? 'unknown format'}): ` +
    `${b.symbols.size} symbols, ${b.numSymbolsDropped} dropped, ${b.sourceFiles.size} source files, ` +
    `program memory ${formatBytes(b.progMemSize)}, static RAM ${formatBytes(b.staticRamSize)}` +
    (flags ? ` [${flags}]` : '');
}
