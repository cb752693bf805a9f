import * as fs from 'fs';
import * as path from 'path';
import { ToolReaderName, ToolRunner } from '../src/types';

export type ReaderName = ToolReaderName;

export type ToolOutputs = Partial<Record<ReaderName, string>>;

export function readerFor(cmd: string, args: string[]): ReaderName {
  if (args.includes('-a')) return 'archive-headers';
  if (args.includes('-drwS')) return 'disassembly';
  if (args.includes('--print-size')) return args.includes('-C') ? 'symbols-demangled' : 'symbols-mangled';
  if (args.includes('--debug-dump=info')) return 'debug-info';
  return 'size-summary';
}

// In-process stand-in for binutils: canned stdout per reader, a failure for readers left out.
export function fakeRunner(outputs: ToolOutputs, calls: string[][] = []): ToolRunner {
  return async (cmd, args) => {
    calls.push([cmd, ...args]);
    const stdout = outputs[readerFor(cmd, args)];
    if (stdout === undefined) return { stdout: '', failed: true, errorMessage: `spawn ${cmd} ENOENT` };
    return { stdout, failed: false };
  };
}

export const FIXTURE_DIR = path.join(__dirname, 'fixtures');

export function loadFixtureOutputs(name: string): Required<ToolOutputs> {
  const read = (f: string) => fs.readFileSync(path.join(FIXTURE_DIR, name, f), 'utf8');
  return {
    'archive-headers': read('archive-headers.txt'),
    'disassembly': read('disassembly.txt'),
    'symbols-mangled': read('nm-mangled.txt'),
    'symbols-demangled': read('nm-demangled.txt'),
    'debug-info': read('debug-info.txt'),
    'size-summary': read('size.txt')
  };
}
