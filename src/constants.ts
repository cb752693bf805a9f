// Centralized constants for tool invocation, output tagging and environment parsing

// Interleaved source lines inside a symbol's instruction sequence are wrapped in these
// markers so that renderers can tell them apart from decoded instructions.
export const SOURCE_LINE_START_TAG = '...BINSCOPE_SOURCE_START...';
export const SOURCE_LINE_END_TAG = '...BINSCOPE_SOURCE_END...';

// objdump names the same 0xc3 opcode 'ret' or 'retq' depending on its version
export const X86_64_FILE_FORMAT = 'elf64-x86-64';

export const DEFAULT_COMMANDS = {
  objdump: 'objdump',
  nm: 'nm',
  readelf: 'readelf',
  size: 'size'
} as const;

// Storage classes nm reports for symbols living in RAM (initialized and zero-initialized data)
export const RAM_SYMBOL_KINDS = ['b', 'B', 'd', 'D'];

export const ENV_PREFIX = 'BINSCOPE_';

export function parsePositiveInt(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const parsed = parseInt(raw, 10);
  if (!isNaN(parsed) && parsed > 0) return parsed;
  return undefined; // invalid values ignored by caller
}

export function parseBooleanFlag(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === '') return undefined;
  const v = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(v)) return true;
  if (['0', 'false', 'no', 'off'].includes(v)) return false;
  return undefined;
}

// 0 lets every tool run to completion; a limit is opt-in, since a killed objdump leaves a truncated listing
export const DEFAULT_TOOL_TIMEOUT_MS = parsePositiveInt(process.env.BINSCOPE_TOOL_TIMEOUT_MS) ?? 0;

export function readSkippedTools(): string[] {
  return (process.env.BINSCOPE_SKIP_TOOLS || '')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
}
