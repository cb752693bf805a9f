import execa from 'execa';
import { DEFAULT_TOOL_TIMEOUT_MS, readSkippedTools } from './constants';

export interface SafeExecResult {
  stdout: string;
  stderr: string;
  code: number | null;
  signal: string | null;
  timedOut: boolean;
  failed: boolean;
  durationMs: number;
  start: number;
  errorMessage?: string;
}

export function isToolSkipped(tool: string): boolean {
  return readSkippedTools().includes(tool);
}

// Fields execa attaches to a rejected child process (spawn failure, killed by timeout).
interface ExecFailureFields {
  stdout?: unknown;
  stderr?: unknown;
  exitCode?: unknown;
  signal?: unknown;
  timedOut?: unknown;
  shortMessage?: unknown;
  message?: unknown;
}

function asString(v: unknown): string | undefined {
  return typeof v === 'string' && v.length > 0 ? v : undefined;
}

export async function safeExec(cmd: string, args: string[] = [], timeoutMs?: number): Promise<SafeExecResult> {
  const start = Date.now();
  if (isToolSkipped(cmd)) {
    return {
      stdout: '',
      stderr: '',
      code: null,
      signal: null,
      timedOut: false,
      failed: true,
      durationMs: Date.now() - start,
      start,
      errorMessage: 'skipped-by-config'
    };
  }
  try {
    const child = await execa(cmd, args, {
      timeout: timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS, // 0: no limit
      reject: false, // handle failures uniformly
      maxBuffer: 512 * 1024 * 1024 // disassembly of large firmware images
    });
    const timedOut = child.timedOut === true;
    const failed = timedOut || child.exitCode !== 0;
    const fields: ExecFailureFields = child;
    const shortMessage = asString(fields.shortMessage);
    return {
      stdout: child.stdout || '',
      stderr: child.stderr || '',
      code: child.exitCode ?? null,
      signal: child.signal || null,
      timedOut,
      failed,
      durationMs: Date.now() - start,
      start,
      errorMessage: failed ? (timedOut ? 'timeout' : asString(child.stderr) || shortMessage || 'non-zero-exit') : undefined
    };
  } catch (e: unknown) {
    const err: ExecFailureFields = e instanceof Error ? e : {};
    const timedOut = err.timedOut === true;
    return {
      stdout: asString(err.stdout) || '',
      stderr: asString(err.stderr) || '',
      code: typeof err.exitCode === 'number' ? err.exitCode : null,
      signal: asString(err.signal) || null,
      timedOut,
      failed: true,
      durationMs: Date.now() - start,
      start,
      errorMessage: timedOut ? 'timeout' : (asString(err.shortMessage) || asString(err.message) || 'exec-error')
    };
  }
}

export function getConfiguredTimeout(): number {
  return DEFAULT_TOOL_TIMEOUT_MS;
}
