import execa from 'execa';
import { DEFAULT_TOOL_TIMEOUT_MS } from '../constants';
import { errorMessage } from '../errors';

export interface SafeExecResult {
  stderr: string;
  code: number | null;
  timedOut: boolean;
  failed: boolean;
  errorMessage?: string;
}

export interface SafeExecOptions {
  timeoutMs?: number;
  cwd?: string;
}

export function skippedTools(): string[] {
  return (process.env.SBOM_EVAL_SKIP_TOOLS || '')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
}

export function isToolSkipped(tool: string): boolean {
  return skippedTools().includes(tool);
}

// Runs an external tool without throwing; every failure mode ends up in the result.
export async function safeExec(cmd: string, args: string[] = [], options: SafeExecOptions = {}): Promise<SafeExecResult> {
  if (isToolSkipped(cmd)) {
    return {
      stderr: '',
      code: null,
      timedOut: false,
      failed: true,
      errorMessage: 'skipped-by-config'
    };
  }
  try {
    const child = await execa(cmd, args, {
      timeout: options.timeoutMs || DEFAULT_TOOL_TIMEOUT_MS,
      cwd: options.cwd,
      reject: false
    });
    const timedOut = child.timedOut === true;
    const failed = timedOut || child.failed || child.exitCode !== 0;
    return {
      stderr: child.stderr || '',
      code: child.exitCode ?? null,
      timedOut,
      failed,
      errorMessage: failed ? (timedOut ? 'timeout' : child.stderr || 'non-zero-exit') : undefined
    };
  } catch (e: unknown) {
    return {
      stderr: '',
      code: null,
      timedOut: false,
      failed: true,
      errorMessage: errorMessage(e) || 'exec-error'
    };
  }
}

export type Exec = typeof safeExec;
