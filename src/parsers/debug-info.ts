import { DebugInfoParseError } from '../errors';
import { BinarySymbol } from '../symbol';
import { DebugInfoStats, SourceFile } from '../types';

// " <1><2d>: Abbrev Number: 2 (DW_TAG_subprogram)"
const HEADER_LINE_RE = /^\s*<[0-9a-f]+>\s*<[0-9a-f]+>:\s+Abbrev Number:\s*(\d+)\s+\((\w+)\)/;
// "    <2e>   DW_AT_linkage_name: (indirect string, offset: 0x1c): _Z3foov"
const ATTRIBUTE_LINE_RE = /^\s*<[0-9a-f]+>\s+(\S+)\s*:\s*(\S.*)/;
// the name is the last whitespace separated token of the value
const TRAILING_TOKEN_RE = /^.*\s+(\S+)/;
const LEADING_INT_RE = /^(\d+)/;

const COMPILE_UNIT_TAG = 'DW_TAG_compile_unit';

export interface DebugInfoContext {
  symbols: ReadonlyMap<string, BinarySymbol>;
  registerSourceFile(sourceFile: SourceFile): void;
}

export type DebugInfoState =
  | { name: 'AwaitingHeader' }
  | { name: 'AccumulatingAttributes'; headerId: number; headerTag: string };

interface PendingEntry {
  mangledName?: string;
  sourceFileId?: number;
  sourceLine?: number;
  sourceColumn?: number;
}

/**
 * Reads `readelf --debug-dump=info` output and attaches declaration file, line
 * and column to the symbols already known. Compile units register source files.
 * Construct one per dump.
 */
export class DebugInfoCollector {
  private state: DebugInfoState = { name: 'AwaitingHeader' };
  private pending: PendingEntry = {};
  private readonly stats: DebugInfoStats = { entries: 0, symbolsAnnotated: 0, sourceFilesRegistered: 0 };

  constructor(private readonly ctx: DebugInfoContext) {}

  get currentState(): DebugInfoState['name'] {
    return this.state.name;
  }

  collect(output: string): DebugInfoStats {
    for (const line of output.split(/\r?\n/)) this.processLine(line);
    this.flush();
    return { ...this.stats };
  }

  processLine(line: string): void {
    const header = line.match(HEADER_LINE_RE);
    if (header) {
      this.flush();
      this.state = { name: 'AccumulatingAttributes', headerId: parseInt(header[1], 10), headerTag: header[2] };
      this.stats.entries++;
      return;
    }
    const state = this.state;
    if (state.name !== 'AccumulatingAttributes') return;

    const attribute = line.match(ATTRIBUTE_LINE_RE);
    if (!attribute) return;
    const [, tag, value] = attribute;

    switch (tag) {
      case 'DW_AT_linkage_name':
        this.pending.mangledName = this.trailingToken(value, line, 'Undecipherable linkage name in debug info line');
        break;
      case 'DW_AT_decl_file':
        this.pending.sourceFileId = this.integer(value, line);
        break;
      case 'DW_AT_decl_line':
        this.pending.sourceLine = this.integer(value, line);
        break;
      case 'DW_AT_decl_column':
        this.pending.sourceColumn = this.integer(value, line);
        break;
      case 'DW_AT_name':
        if (state.headerTag === COMPILE_UNIT_TAG) {
          const filename = this.trailingToken(value, line, 'Unable to determine source filename from debug info line');
          this.ctx.registerSourceFile({ id: state.headerId, filename });
          this.stats.sourceFilesRegistered++;
        }
        break;
    }
  }

  private trailingToken(value: string, line: string, message: string): string {
    const m = value.match(TRAILING_TOKEN_RE);
    if (!m) throw new DebugInfoParseError(message, line);
    return m[1];
  }

  private integer(value: string, line: string): number {
    const m = value.match(LEADING_INT_RE);
    if (!m) throw new DebugInfoParseError('Expected an integer attribute value in debug info line', line);
    return parseInt(m[1], 10);
  }

  private flush(): void {
    const { mangledName, sourceFileId, sourceLine, sourceColumn } = this.pending;
    if (mangledName !== undefined) {
      const symbol = this.ctx.symbols.get(mangledName);
      if (symbol) {
        symbol.sourceFileId = sourceFileId;
        symbol.sourceLine = sourceLine;
        symbol.sourceColumn = sourceColumn;
        this.stats.symbolsAnnotated++;
      }
    }
    this.pending = {};
  }
}
