import { InvalidPatternError } from './errors';

function compile(role: 'selection' | 'exclusion', pattern: string | undefined): RegExp | undefined {
  if (pattern === undefined) return undefined;
  try {
    // Patterns match from the start of the name, not necessarily to its end
    return new RegExp(`^(?:${pattern})`);
  } catch (e: unknown) {
    throw new InvalidPatternError(role, pattern, e instanceof Error ? e.message : String(e));
  }
}

// Decides which candidate symbols become part of the model. Exclusion always wins.
export class SymbolSelection {
  private readonly selection?: RegExp;
  private readonly exclusion?: RegExp;

  constructor(selectionPattern?: string, exclusionPattern?: string) {
    this.selection = compile('selection', selectionPattern);
    this.exclusion = compile('exclusion', exclusionPattern);
  }

  isSelected(name: string): boolean {
    if (this.exclusion && this.exclusion.test(name)) return false;
    if (!this.selection) return true;
    return this.selection.test(name);
  }
}
