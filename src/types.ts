export const SYMBOL_LANGUAGES = ['c', 'cpp'] as const;
export type SymbolLanguage = typeof SYMBOL_LANGUAGES[number];

export interface ToolCommands {
  objdump: string;
  nm: string;
  readelf: string;
  size: string;
}

export const TOOL_NAMES: readonly (keyof ToolCommands)[] = ['objdump', 'nm', 'readelf', 'size'];

// Runs an inspection tool to completion and reports what it produced.
export type ToolRunner = (cmd: string, args: string[], timeoutMs?: number) => Promise<ToolRunResult>;

export interface ToolRunResult {
  stdout: string;
  failed: boolean;
  errorMessage?: string;
}

export type ToolReaderName =
  | 'archive-headers'
  | 'size-summary'
  | 'symbols-mangled'
  | 'symbols-demangled'
  | 'disassembly'
  | 'debug-info';

export interface ToolStatus {
  name: ToolReaderName;
  command: string;
  args: string[];
  available: boolean;
  durationMs?: number;
  outputBytes?: number;
  error?: string;
}

export interface BinaryDiagnostics {
  tools: ToolStatus[];
  degraded: boolean; // whether any tool failed or produced unrecognized output
  degradationReasons: string[];
  totalLoadTimeMs?: number;
  symbolListing?: SymbolPropertyStats;
  disassembly?: DisassemblyStats;
  debugInfo?: DebugInfoStats;
}

export interface SizeSummary {
  textSize: number;
  dataSize: number;
  bssSize: number;
  overallSize: number;
  progMemSize: number; // text + data
  staticRamSize: number; // data + bss
}

export interface SourceFile {
  id: number;
  filename: string;
}

export interface DisassemblyStats {
  instructionLines: number;
  symbolsWithInstructions: number;
}

export interface DebugInfoStats {
  entries: number;
  symbolsAnnotated: number;
  sourceFilesRegistered: number;
}

export interface SymbolPropertyStats {
  created: number;
  updated: number;
  dropped: number;
}
