// Process-wide collection of non-fatal problems found while loading binaries.
// Callers create or reset it before a run and read it once afterwards to decide
// their exit status.

export interface WarningEntry {
  message: string;
  source?: string; // binary file the warning relates to
  ts: number;
}

export class WarningRegistry {
  private entries: WarningEntry[] = [];

  constructor(private readonly quiet: boolean = false) {}

  warn(message: string, source?: string): void {
    this.entries.push({ message, source, ts: Date.now() });
    if (!this.quiet) console.warn(`⚠️  ${message}`);
  }

  hasWarnings(): boolean {
    return this.entries.length > 0;
  }

  list(): readonly WarningEntry[] {
    return this.entries;
  }

  messages(): string[] {
    return this.entries.map(e => e.message);
  }

  reset(): void {
    this.entries = [];
  }
}

export const processWarnings = new WarningRegistry();
