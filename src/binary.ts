import * as fs from 'fs-extra';
import { BinaryNotFoundError } from './errors';
import { describeBinary } from './format';
import { Mangling } from './mangling';
import { DebugInfoCollector } from './parsers/debug-info';
import { DisassemblyCollector } from './parsers/disassembly';
import { detectFileFormat } from './parsers/file-format';
import { parseSizeSummary } from './parsers/size-summary';
import { collectSymbolProperties } from './parsers/symbol-listing';
import { SymbolSelection } from './selection';
import { defaultSettings, Settings } from './settings';
import { BinarySymbol, createSymbol } from './symbol';
import { Toolchain } from './toolchain';
import { BinaryDiagnostics, SizeSummary, SourceFile, ToolRunner } from './types';
import { processWarnings, WarningRegistry } from './warnings';

export interface BinaryOptions {
  settings?: Settings;
  mangling?: Mangling; // loaded from settings.manglingFile when omitted
  warnings?: WarningRegistry;
  runner?: ToolRunner;
}

// Mutable state the load phases fill in before the Binary is constructed.
interface BinaryDraft extends SizeSummary {
  fileFormat?: string;
  toolsReliable: boolean;
  instructionsAvailable: boolean;
  numInstructionLines: number;
  numSymbolsDropped: number;
  symbols: Map<string, BinarySymbol>;
  sourceFiles: Map<number, SourceFile>;
  diagnostics: BinaryDiagnostics;
}

async function isRegularFile(filename: string): Promise<boolean> {
  try {
    return (await fs.stat(filename)).isFile();
  } catch {
    return false; // missing or unreadable
  }
}

function byMangledName(a: BinarySymbol, b: BinarySymbol): number {
  return a.mangledName < b.mangledName ? -1 : a.mangledName > b.mangledName ? 1 : 0;
}

/**
 * Per-symbol model of one compiled binary, reconciled from objdump, nm, readelf
 * and size output. Obtain one through {@link Binary.load}; the model is not
 * modified after loading completes.
 */
export class Binary {
  readonly fileFormat?: string;

  readonly textSize: number;
  readonly dataSize: number;
  readonly bssSize: number;
  readonly overallSize: number;
  readonly progMemSize: number;
  readonly staticRamSize: number;

  /** false when the size utility output was not recognized; nm demangling is then not trusted either */
  readonly toolsReliable: boolean;
  /** false when the disassembly tool failed or its listing held no instruction */
  readonly instructionsAvailable: boolean;
  readonly numInstructionLines: number;
  readonly numSymbolsDropped: number;

  readonly symbols: ReadonlyMap<string, BinarySymbol>;
  readonly sourceFiles: ReadonlyMap<number, SourceFile>;
  readonly diagnostics: Readonly<BinaryDiagnostics>;

  private constructor(
    readonly filename: string,
    readonly settings: Settings,
    readonly mangling: Mangling | undefined,
    draft: BinaryDraft
  ) {
    this.fileFormat = draft.fileFormat;
    this.textSize = draft.textSize;
    this.dataSize = draft.dataSize;
    this.bssSize = draft.bssSize;
    this.overallSize = draft.overallSize;
    this.progMemSize = draft.progMemSize;
    this.staticRamSize = draft.staticRamSize;
    this.toolsReliable = draft.toolsReliable;
    this.instructionsAvailable = draft.instructionsAvailable;
    this.numInstructionLines = draft.numInstructionLines;
    this.numSymbolsDropped = draft.numSymbolsDropped;
    this.symbols = draft.symbols;
    this.sourceFiles = draft.sourceFiles;
    this.diagnostics = draft.diagnostics;
  }

  static async load(filename: string, options: BinaryOptions = {}): Promise<Binary> {
    if (!filename || !(await isRegularFile(filename))) throw new BinaryNotFoundError(filename);

    const settings = options.settings ?? defaultSettings();
    const warnings = options.warnings ?? processWarnings;
    const selection = new SymbolSelection(settings.selectionPattern, settings.exclusionPattern);
    const mangling = options.mangling ?? (settings.manglingFile ? await Mangling.load(settings.manglingFile, settings.verbose) : undefined);

    const loader = new BinaryLoader(filename, settings, mangling, selection, warnings);
    const toolchain = new Toolchain(filename, settings, warnings, loader.draft.diagnostics, options.runner);
    const startHr = process.hrtime();
    await loader.parse(toolchain);
    const diff = process.hrtime(startHr);
    loader.draft.diagnostics.totalLoadTimeMs = (diff[0] * 1e3) + (diff[1] / 1e6);

    const binary = new Binary(filename, settings, mangling, loader.draft);
    if (settings.verbose) console.log(`📊 ${describeBinary(binary)}`);
    return binary;
  }

  getSymbol(mangledName: string): BinarySymbol | undefined {
    return this.symbols.get(mangledName);
  }

  getSortedSymbols(): BinarySymbol[] {
    return [...this.symbols.values()].sort(byMangledName);
  }

  getSourceFile(id: number): SourceFile | undefined {
    return this.sourceFiles.get(id);
  }
}

class BinaryLoader {
  readonly draft: BinaryDraft = {
    textSize: 0,
    dataSize: 0,
    bssSize: 0,
    overallSize: 0,
    progMemSize: 0,
    staticRamSize: 0,
    toolsReliable: true,
    instructionsAvailable: false,
    numInstructionLines: 0,
    numSymbolsDropped: 0,
    symbols: new Map(),
    sourceFiles: new Map(),
    diagnostics: { tools: [], degraded: false, degradationReasons: [] }
  };

  constructor(
    private readonly filename: string,
    private readonly settings: Settings,
    private readonly mangling: Mangling | undefined,
    private readonly selection: SymbolSelection,
    private readonly warnings: WarningRegistry
  ) {}

  // Phases run strictly in this order; each relies on the symbol table left by the previous ones.
  async parse(toolchain: Toolchain): Promise<void> {
    await this.determineFileFormat(toolchain);
    await this.determineSizes(toolchain);
    await this.gatherSymbolProperties(toolchain);
    await this.gatherInstructions(toolchain);
    await this.gatherDebugInformation(toolchain);
    this.initializeSymbols();
  }

  private async determineFileFormat(toolchain: Toolchain): Promise<void> {
    this.draft.fileFormat = detectFileFormat(await toolchain.readArchiveHeaders());
    if (!this.settings.verbose) return;
    if (this.draft.fileFormat) console.log(`🔍 File format of binary ${this.filename}: ${this.draft.fileFormat}`);
    else console.log(`🔍 Unable to detect binary file format of ${this.filename}`);
  }

  private async determineSizes(toolchain: Toolchain): Promise<void> {
    const sizes = parseSizeSummary(await toolchain.readSizeSummary());
    if (!sizes) {
      this.draft.toolsReliable = false;
      this.markDegraded('size-summary-unrecognized');
      this.warnings.warn('Unable to determine resource consumptions. Is the proper size utility used?', this.filename);
      return;
    }
    Object.assign(this.draft, sizes);
  }

  private async gatherSymbolProperties(toolchain: Toolchain): Promise<void> {
    const mangledOutput = await toolchain.readSymbolListing(false);
    const demangledOutput = await toolchain.readSymbolListing(true);
    const language = this.settings.language;
    const stats = collectSymbolProperties(mangledOutput, demangledOutput, {
      symbols: this.draft.symbols,
      selection: this.selection,
      mangling: this.mangling,
      toolsReliable: this.draft.toolsReliable,
      createSymbol: (mangledName, displayName, isDemangled) => createSymbol(language, mangledName, displayName, isDemangled)
    });
    this.draft.numSymbolsDropped += stats.dropped;
    this.draft.diagnostics.symbolListing = stats;
  }

  private async gatherInstructions(toolchain: Toolchain): Promise<void> {
    const listing = await toolchain.readDisassembly();
    // A killed or failing objdump may leave a truncated listing; none of it is attached.
    if (toolchain.hasFailed('disassembly')) return;
    const stats = new DisassemblyCollector(this.draft.symbols, this.draft.fileFormat).collect(listing);
    this.draft.diagnostics.disassembly = stats;
    this.draft.numInstructionLines = stats.instructionLines;
    this.draft.instructionsAvailable = stats.instructionLines > 0;
    if (!this.draft.instructionsAvailable) {
      this.markDegraded('no-instructions');
      this.warnings.warn(`Unable to read assembly from binary '${this.filename}'.`, this.filename);
    }
  }

  private async gatherDebugInformation(toolchain: Toolchain): Promise<void> {
    const sourceFiles = this.draft.sourceFiles;
    const collector = new DebugInfoCollector({
      symbols: this.draft.symbols,
      registerSourceFile: sourceFile => { sourceFiles.set(sourceFile.id, sourceFile); }
    });
    this.draft.diagnostics.debugInfo = collector.collect(await toolchain.readDebugInfo());
  }

  private initializeSymbols(): void {
    const ordered = [...this.draft.symbols.values()].sort(byMangledName);
    this.draft.symbols.clear();
    for (const symbol of ordered) {
      symbol.initialize();
      this.draft.symbols.set(symbol.mangledName, symbol);
    }
  }

  private markDegraded(reason: string): void {
    this.draft.diagnostics.degraded = true;
    this.draft.diagnostics.degradationReasons.push(reason);
  }
}
