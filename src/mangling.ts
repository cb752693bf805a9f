import * as fs from 'fs-extra';

export interface DemangleResult {
  name: string;
  isDemangled: boolean;
}

// Parse alternating lines: mangled name, then its demangled form.
export function parseManglingText(text: string): Map<string, string> {
  const mangling = new Map<string, string>();
  const lines = text.split(/\r?\n/);
  if (lines.length && lines[lines.length - 1] === '') lines.pop();
  for (let i = 0; i + 1 < lines.length; i += 2) {
    mangling.set(lines[i], lines[i + 1]);
  }
  return mangling;
}

/**
 * Externally supplied mangled → demangled mapping, for toolchains whose nm
 * cannot demangle the names their compiler produces.
 */
export class Mangling {
  private constructor(
    readonly manglingFile: string | undefined,
    private readonly mapping: Map<string, string> | undefined
  ) {}

  static async load(manglingFile?: string, verbose = false): Promise<Mangling> {
    if (!manglingFile || !(await fs.pathExists(manglingFile))) return new Mangling(manglingFile, undefined);
    const mapping = parseManglingText(await fs.readFile(manglingFile, 'utf8'));
    if (verbose) console.log(`🔤 Mangling info of ${mapping.size} symbols read from file '${manglingFile}'`);
    return new Mangling(manglingFile, mapping);
  }

  static fromEntries(entries: Iterable<[string, string]>): Mangling {
    return new Mangling(undefined, new Map(entries));
  }

  get size(): number {
    return this.mapping?.size ?? 0;
  }

  isConfigured(): boolean {
    return this.mapping !== undefined;
  }

  demangle(name: string): DemangleResult {
    const mapped = this.mapping?.get(name);
    if (mapped === undefined) return { name, isDemangled: false };
    return { name: mapped, isDemangled: true };
  }
}

/**
 * Display name for a symbol: the mangling map wins, then the name nm produced
 * in its demangling pass (only when the tools proved reliable), and otherwise
 * the candidate is returned flagged as not demangled.
 */
export function resolveDisplayName(
  mangledName: string,
  toolCandidate: string,
  mangling: Mangling | undefined,
  toolsReliable: boolean
): DemangleResult {
  if (mangling) {
    const fromMap = mangling.demangle(mangledName);
    if (fromMap.isDemangled) return fromMap;
    if (toolCandidate !== mangledName) {
      const fromCandidate = mangling.demangle(toolCandidate);
      if (fromCandidate.isDemangled) return fromCandidate;
    }
  }
  if (toolsReliable) return { name: toolCandidate, isDemangled: true };
  return { name: toolCandidate, isDemangled: false };
}
