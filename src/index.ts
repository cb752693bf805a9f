export { Binary, BinaryOptions } from './binary';
export {
  BinscopeError,
  BinaryNotFoundError,
  DebugInfoParseError,
  InvalidPatternError,
  SettingsError,
  ToolExecutionError
} from './errors';
export { describeBinary, formatBytes } from './format';
export { Mangling, DemangleResult, parseManglingText, resolveDisplayName } from './mangling';
export { DebugInfoCollector, DebugInfoContext } from './parsers/debug-info';
export {
  DisassemblyCollector,
  isSourceLine,
  normalizeInstructionLine,
  stripSourceTags,
  tagSourceLine
} from './parsers/disassembly';
export { detectFileFormat } from './parsers/file-format';
export { deriveSizes, parseSizeSummary } from './parsers/size-summary';
export { collectSymbolProperties, parseNmLine, NmEntry, SymbolPropertyContext } from './parsers/symbol-listing';
export { safeExec, SafeExecResult } from './safe-exec';
export { SymbolSelection } from './selection';
export { defaultSettings, loadSettings, mergeSettings, Settings, SettingsOverrides } from './settings';
export { BinarySymbol, CppSymbol, CSymbol, createSymbol } from './symbol';
export { Toolchain } from './toolchain';
export * from './types';
export { processWarnings, WarningEntry, WarningRegistry } from './warnings';
