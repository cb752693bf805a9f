import * as fs from 'fs';
import * as path from 'path';
import {
  DisassemblyCollector,
  isSourceLine,
  normalizeInstructionLine,
  stripSourceTags,
  tagSourceLine
} from '../src/parsers/disassembly';
import { BinarySymbol, createSymbol } from '../src/symbol';
import { FIXTURE_DIR } from './helpers';

function table(...names: string[]): Map<string, BinarySymbol> {
  const symbols = new Map<string, BinarySymbol>();
  for (const n of names) symbols.set(n, createSymbol('c', n, n, false));
  return symbols;
}

describe('instruction normalization', () => {
  it('rewrites retq to ret for x86-64', () => {
    expect(normalizeInstructionLine('1000:\tc3\tretq', 'elf64-x86-64')).toBe('1000:\tc3\tret');
    expect(normalizeInstructionLine('    110a:\tc3                   \tretq   ', 'elf64-x86-64'))
      .toBe('    110a:\tc3                   \tret   ');
  });

  it('leaves other architectures and unknown formats alone', () => {
    expect(normalizeInstructionLine('1000:\tc3\tretq', 'elf32-i386')).toBe('1000:\tc3\tretq');
    expect(normalizeInstructionLine('1000:\tc3\tretq', undefined)).toBe('1000:\tc3\tretq');
  });

  it('only touches the c3 opcode', () => {
    expect(normalizeInstructionLine('1000:\tc2 08 00\tretq   $0x8', 'elf64-x86-64')).toBe('1000:\tc2 08 00\tretq   $0x8');
  });
});

describe('source line tags', () => {
  it('wraps and unwraps interleaved source', () => {
    const tagged = tagSourceLine('int foo() {');
    expect(isSourceLine(tagged)).toBe(true);
    expect(isSourceLine('push   %rbp')).toBe(false);
    expect(stripSourceTags(tagged)).toBe('int foo() {');
    expect(stripSourceTags('push   %rbp')).toBe('push   %rbp');
  });
});

describe('DisassemblyCollector', () => {
  it('appends the normalized instruction to a known symbol', () => {
    const symbols = table('foo');
    const stats = new DisassemblyCollector(symbols, 'elf64-x86-64').collect('0000000000001000 <foo>:\n1000:\tc3\tretq');
    expect(symbols.get('foo')?.instructions).toEqual(['ret']);
    expect(stats).toEqual({ instructionLines: 1, symbolsWithInstructions: 1 });
  });

  it('switches state on headers', () => {
    const c = new DisassemblyCollector(table('foo'));
    expect(c.currentState).toBe('NoCurrentSymbol');
    c.processLine('0x0000000000001000 <foo>:');
    expect(c.currentState).toBe('InCurrentSymbol');
    expect(c.currentSymbol?.mangledName).toBe('foo');
    c.processLine('0000000000001010 <unknown>:');
    expect(c.currentState).toBe('NoCurrentSymbol');
    expect(c.currentSymbol).toBeUndefined();
  });

  it('drops lines of symbols absent from the model without creating them', () => {
    const symbols = table('foo');
    const out = [
      '0000000000001000 <bar>:',
      '    1000:\t55\tpush   %rbp',
      'int bar() {',
      '0000000000001010 <foo>:',
      '    1010:\t90\tnop'
    ].join('\n');
    const stats = new DisassemblyCollector(symbols).collect(out);
    expect(symbols.has('bar')).toBe(false);
    expect(symbols.size).toBe(1);
    expect(symbols.get('foo')?.instructions).toEqual(['nop']);
    // counted even though discarded
    expect(stats.instructionLines).toBe(2);
  });

  it('reports zero instruction lines for a stripped listing', () => {
    const stats = new DisassemblyCollector(table('foo')).collect('\nsample.elf:     file format elf64-x86-64\n\n');
    expect(stats).toEqual({ instructionLines: 0, symbolsWithInstructions: 0 });
  });

  it('collects a full listing with interleaved source', () => {
    const symbols = table('_Z3barv', '_Z3foov', 'main');
    const listing = fs.readFileSync(path.join(FIXTURE_DIR, 'sample-x86_64', 'disassembly.txt'), 'utf8');
    const stats = new DisassemblyCollector(symbols, 'elf64-x86-64').collect(listing);
    expect(symbols.get('_Z3barv')?.instructions).toEqual([
      tagSourceLine('int bar() {'),
      'push   %rbp',
      'mov    %rsp,%rbp',
      tagSourceLine('  return 1;'),
      'mov    $0x1,%eax',
      tagSourceLine('}'),
      'pop    %rbp',
      'ret'
    ]);
    expect(symbols.get('_Z3foov')?.instructions).toEqual(['ret']);
    expect(symbols.get('main')?.instructions).toEqual(['xor    %eax,%eax', 'ret']);
    expect(stats).toEqual({ instructionLines: 9, symbolsWithInstructions: 3 });
  });

  it('keeps retq in the same listing for a non x86-64 format', () => {
    const symbols = table('main');
    const listing = fs.readFileSync(path.join(FIXTURE_DIR, 'sample-x86_64', 'disassembly.txt'), 'utf8');
    new DisassemblyCollector(symbols, 'elf32-i386').collect(listing);
    expect(symbols.get('main')?.instructions).toEqual(['xor    %eax,%eax', 'retq']);
  });
});
