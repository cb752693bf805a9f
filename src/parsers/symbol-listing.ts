import { Mangling, resolveDisplayName } from '../mangling';
import { SymbolSelection } from '../selection';
import { BinarySymbol } from '../symbol';
import { SymbolPropertyStats } from '../types';

// `nm --print-size --size-sort --radix=d`: "<address> <size> <type> <name>"
const NM_LINE_RE = /^[0-9A-Fa-f]+\s([0-9A-Fa-f]+)\s(\w)\s(.+)/;

export interface NmEntry {
  size: number;
  kind: string;
  name: string;
}

export function parseNmLine(line: string): NmEntry | undefined {
  const m = line.match(NM_LINE_RE);
  if (!m) return undefined;
  const size = parseInt(m[1], 10); // decimal because of --radix=d
  if (isNaN(size)) return undefined;
  return { size, kind: m[2], name: m[3] };
}

export interface SymbolPropertyContext {
  symbols: Map<string, BinarySymbol>;
  selection: SymbolSelection;
  mangling?: Mangling;
  toolsReliable: boolean;
  createSymbol(mangledName: string, displayName: string, isDemangled: boolean): BinarySymbol;
}

/**
 * Walks the mangled and demangled nm listings side by side. Both passes list the
 * same symbols in the same order, so line i of one describes line i of the other.
 */
export function collectSymbolProperties(
  mangledOutput: string,
  demangledOutput: string,
  ctx: SymbolPropertyContext
): SymbolPropertyStats {
  const stats: SymbolPropertyStats = { created: 0, updated: 0, dropped: 0 };
  const mangledLines = mangledOutput.split(/\r?\n/);
  const demangledLines = demangledOutput.split(/\r?\n/);
  const pairs = Math.min(mangledLines.length, demangledLines.length);

  for (let i = 0; i < pairs; i++) {
    const mangled = parseNmLine(mangledLines[i]);
    if (!mangled) continue;
    const demangled = parseNmLine(demangledLines[i]);
    const candidate = demangled ? demangled.name : mangled.name;

    const existing = ctx.symbols.get(mangled.name);
    if (existing) {
      existing.size = mangled.size;
      existing.kind = mangled.kind;
      stats.updated++;
      continue;
    }

    const { name, isDemangled } = resolveDisplayName(mangled.name, candidate, ctx.mangling, ctx.toolsReliable);
    if (!ctx.selection.isSelected(name)) {
      stats.dropped++;
      continue;
    }
    const symbol = ctx.createSymbol(mangled.name, name, isDemangled);
    symbol.size = mangled.size;
    symbol.kind = mangled.kind;
    ctx.symbols.set(mangled.name, symbol);
    stats.created++;
  }
  return stats;
}
