import { SOURCE_LINE_END_TAG, SOURCE_LINE_START_TAG, X86_64_FILE_FORMAT } from '../constants';
import { BinarySymbol } from '../symbol';
import { DisassemblyStats } from '../types';

// "0000000000001139 <main>:"
const HEADER_LINE_RE = /^(0x)?[0-9A-Fa-f]+ <(.+)>:/;
// "    1139:\t55                   \tpush   %rbp"
const INSTRUCTION_LINE_RE = /^\s*[0-9A-Fa-f]+:\s*((?:\s*[0-9a-fA-F]{2})+)\s+(.*?)\s*$/;
const X86_RETQ_RE = /^(.*\sc3\s+)retq(.*)$/;

export function tagSourceLine(line: string): string {
  return `${SOURCE_LINE_START_TAG}${line}${SOURCE_LINE_END_TAG}`;
}

export function isSourceLine(line: string): boolean {
  return line.startsWith(SOURCE_LINE_START_TAG) && line.endsWith(SOURCE_LINE_END_TAG);
}

export function stripSourceTags(line: string): string {
  if (!isSourceLine(line)) return line;
  return line.slice(SOURCE_LINE_START_TAG.length, line.length - SOURCE_LINE_END_TAG.length);
}

/**
 * Rewrites a raw objdump line so that the same machine code reads the same
 * regardless of the objdump version. Some versions print `retq` for the x86-64
 * near return (0xc3), others `ret`; `ret` is kept.
 */
export function normalizeInstructionLine(line: string, fileFormat: string | undefined): string {
  if (fileFormat === X86_64_FILE_FORMAT) return line.replace(X86_RETQ_RE, '$1ret$2');
  return line;
}

export type DisassemblyState =
  | { name: 'NoCurrentSymbol' }
  | { name: 'InCurrentSymbol'; symbol: BinarySymbol };

/**
 * Assigns the lines of an `objdump -drwS` listing to already known symbols.
 * Sections of unknown symbols are skipped until the next symbol header.
 * Construct one per listing.
 */
export class DisassemblyCollector {
  private state: DisassemblyState = { name: 'NoCurrentSymbol' };
  private instructionLines = 0;
  private readonly touched = new Set<string>();

  constructor(
    private readonly symbols: ReadonlyMap<string, BinarySymbol>,
    private readonly fileFormat?: string
  ) {}

  get currentState(): DisassemblyState['name'] {
    return this.state.name;
  }

  get currentSymbol(): BinarySymbol | undefined {
    return this.state.name === 'InCurrentSymbol' ? this.state.symbol : undefined;
  }

  collect(output: string): DisassemblyStats {
    for (const line of output.split(/\r?\n/)) this.processLine(line);
    this.leaveSymbol();
    return { instructionLines: this.instructionLines, symbolsWithInstructions: this.touched.size };
  }

  processLine(raw: string): void {
    const line = normalizeInstructionLine(raw, this.fileFormat);

    const header = line.match(HEADER_LINE_RE);
    if (header) {
      this.enterSymbol(header[2]);
      return;
    }

    const instruction = line.match(INSTRUCTION_LINE_RE);
    if (instruction) this.instructionLines++;
    if (this.state.name !== 'InCurrentSymbol') return;

    if (instruction) {
      this.append(this.state.symbol, instruction[2]);
    } else if (line.trim().length > 0) {
      this.append(this.state.symbol, tagSourceLine(line));
    }
  }

  private enterSymbol(mangledName: string): void {
    this.leaveSymbol();
    const symbol = this.symbols.get(mangledName);
    if (symbol) this.state = { name: 'InCurrentSymbol', symbol };
  }

  // Instructions are appended as they are read, so leaving only resets state
  private leaveSymbol(): void {
    this.state = { name: 'NoCurrentSymbol' };
  }

  private append(symbol: BinarySymbol, line: string): void {
    symbol.addInstructions(line);
    this.touched.add(symbol.mangledName);
  }
}
