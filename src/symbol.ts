import { RAM_SYMBOL_KINDS, SOURCE_LINE_END_TAG, SOURCE_LINE_START_TAG } from './constants';
import { SymbolLanguage } from './types';

// Capabilities the introspection pipeline relies on. The pipeline never looks
// at which language variant it is holding.
export interface BinarySymbol {
  readonly mangledName: string;
  readonly displayName: string;
  readonly isDemangled: boolean;
  readonly language: SymbolLanguage;
  size: number;
  kind: string; // nm type code, e.g. 'T', 'd', 'B'
  readonly instructions: string[];
  sourceFileId?: number;
  sourceLine?: number;
  sourceColumn?: number;
  baseName: string;
  namespace: string;

  addInstructions(line: string): void;
  initialize(): void;
  hasInstructions(): boolean;
  livesInProgramMemory(): boolean;
  getInstructionsBlock(indent?: string): string;
}

abstract class BaseSymbol implements BinarySymbol {
  abstract readonly language: SymbolLanguage;
  size = 0;
  kind = '?';
  readonly instructions: string[] = [];
  sourceFileId?: number;
  sourceLine?: number;
  sourceColumn?: number;
  baseName: string;
  namespace = '';

  constructor(
    readonly mangledName: string,
    readonly displayName: string,
    readonly isDemangled: boolean
  ) {
    this.baseName = displayName;
  }

  addInstructions(line: string): void {
    this.instructions.push(line);
  }

  abstract initialize(): void;

  hasInstructions(): boolean {
    return this.instructions.length > 0;
  }

  livesInProgramMemory(): boolean {
    return !RAM_SYMBOL_KINDS.includes(this.kind);
  }

  getInstructionsBlock(indent = ''): string {
    return this.instructions
      .map(l => indent + l.replace(SOURCE_LINE_START_TAG, '').replace(SOURCE_LINE_END_TAG, ''))
      .join('\n');
  }
}

export class CSymbol extends BaseSymbol {
  readonly language = 'c';

  initialize(): void {
    this.baseName = this.displayName;
    this.namespace = '';
  }
}

// Scan from `from` down to the '(' that balances the ')' at `from`.
function findOpeningParen(s: string, from: number): number {
  let depth = 0;
  for (let i = from; i >= 0; i--) {
    if (s[i] === ')') depth++;
    else if (s[i] === '(') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

// Operator spellings that would otherwise read as template brackets or separators, longest first
const OPERATOR_TOKENS = ['<<=', '>>=', '<=>', '->*', '<<', '>>', '<=', '>=', '->', '<', '>', ','];
const OPERATOR_KEYWORD = 'operator';

// Length of `operator<`, `operator<<=`, ... starting at `i`, or 0.
function operatorTokenLength(s: string, i: number): number {
  if (!s.startsWith(OPERATOR_KEYWORD, i) || (i > 0 && /\w/.test(s[i - 1]))) return 0;
  const after = i + OPERATOR_KEYWORD.length;
  const token = OPERATOR_TOKENS.find(t => s.startsWith(t, after));
  return token ? OPERATOR_KEYWORD.length + token.length : 0;
}

// Split on `separator` wherever parentheses and template brackets are balanced.
export function splitTopLevel(s: string, separator: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < s.length; i++) {
    const operatorLength = operatorTokenLength(s, i);
    if (operatorLength > 0) {
      i += operatorLength - 1;
      continue;
    }
    const ch = s[i];
    if (ch === '<' || ch === '(') depth++;
    else if (ch === '>' || ch === ')') depth = Math.max(0, depth - 1);
    else if (depth === 0 && s.startsWith(separator, i)) {
      parts.push(s.slice(start, i));
      i += separator.length - 1;
      start = i + 1;
    }
  }
  parts.push(s.slice(start));
  return parts;
}

/**
 * Demangled C++ name split into its parts, for instance
 * `ns::Foo<int>::bar(int, char const*) const` gives namespace `ns::Foo<int>`,
 * base name `bar`, arguments `['int', 'char const*']` and qualifiers `const`.
 */
export class CppSymbol extends BaseSymbol {
  readonly language = 'cpp';
  argumentList?: string;
  arguments: string[] = [];
  qualifiers = '';

  initialize(): void {
    const name = this.displayName.trim();
    let prefix = name;
    const close = name.lastIndexOf(')');
    const open = close >= 0 ? findOpeningParen(name, close) : -1;
    if (open > 0) {
      prefix = name.slice(0, open);
      this.argumentList = name.slice(open + 1, close).trim();
      this.arguments = this.argumentList.length ? splitTopLevel(this.argumentList, ',').map(a => a.trim()) : [];
      this.qualifiers = name.slice(close + 1).trim();
    }
    const scopes = splitTopLevel(prefix, '::');
    this.baseName = scopes[scopes.length - 1].trim();
    this.namespace = scopes.slice(0, -1).join('::').trim();
  }
}

export function createSymbol(
  language: SymbolLanguage,
  mangledName: string,
  displayName: string,
  isDemangled: boolean
): BinarySymbol {
  switch (language) {
    case 'c':
      return new CSymbol(mangledName, displayName, isDemangled);
    case 'cpp':
      return new CppSymbol(mangledName, displayName, isDemangled);
  }
}
