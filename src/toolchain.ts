import { ToolExecutionError } from './errors';
import { safeExec } from './safe-exec';
import { Settings } from './settings';
import { BinaryDiagnostics, ToolReaderName, ToolRunner, ToolStatus } from './types';
import { WarningRegistry } from './warnings';

export type ToolchainSettings = Pick<Settings, 'commands' | 'toolTimeoutMs' | 'strictTools' | 'verbose'>;

/**
 * The binutils invocations one binary needs. Every reader resolves to the
 * tool's stdout (possibly empty); a failing tool is recorded in the
 * diagnostics and reported as a warning, or aborts the load under strictTools.
 */
export class Toolchain {
  constructor(
    private readonly filename: string,
    private readonly settings: ToolchainSettings,
    private readonly warnings: WarningRegistry,
    private readonly diagnostics: BinaryDiagnostics,
    private readonly runner: ToolRunner = safeExec
  ) {}

  readArchiveHeaders(): Promise<string> {
    return this.run('archive-headers', this.settings.commands.objdump, ['-a', this.filename]);
  }

  readDisassembly(): Promise<string> {
    return this.run('disassembly', this.settings.commands.objdump, ['-drwS', this.filename]);
  }

  readSymbolListing(demangle: boolean): Promise<string> {
    const args = ['--print-size', '--size-sort', '--radix=d'];
    if (demangle) args.push('-C');
    args.push(this.filename);
    return this.run(demangle ? 'symbols-demangled' : 'symbols-mangled', this.settings.commands.nm, args);
  }

  readDebugInfo(): Promise<string> {
    return this.run('debug-info', this.settings.commands.readelf, ['--debug-dump=info', this.filename]);
  }

  readSizeSummary(): Promise<string> {
    return this.run('size-summary', this.settings.commands.size, [this.filename]);
  }

  // Whether the last run of a reader failed; its stdout may then be truncated
  hasFailed(name: ToolReaderName): boolean {
    const runs = this.diagnostics.tools.filter(t => t.name === name);
    return runs.length > 0 && !runs[runs.length - 1].available;
  }

  private async run(name: ToolReaderName, command: string, args: string[]): Promise<string> {
    const start = Date.now();
    if (this.settings.verbose) console.log(`🔧 ${command} ${args.join(' ')}`);
    const res = await this.runner(command, args, this.settings.toolTimeoutMs);
    const status: ToolStatus = {
      name,
      command,
      args,
      available: !res.failed,
      durationMs: Date.now() - start,
      outputBytes: res.stdout.length
    };
    if (res.failed) {
      const reason = res.errorMessage || 'failed';
      status.error = reason;
      this.diagnostics.tools.push(status);
      if (this.settings.strictTools) throw new ToolExecutionError(command, reason);
      this.diagnostics.degraded = true;
      this.diagnostics.degradationReasons.push(`${name}-failed`);
      this.warnings.warn(`Tool '${command}' failed while reading ${name} of '${this.filename}': ${reason}`, this.filename);
      return res.stdout;
    }
    this.diagnostics.tools.push(status);
    return res.stdout;
  }
}
