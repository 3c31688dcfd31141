import { type ChildProcess, spawn } from 'node:child_process';

import { hasErrorCode } from './fsUtils';
import type { CommandDiagnostics } from '../types';

export const MAX_CAPTURED_OUTPUT_LENGTH = 64 * 1024;
const DEFAULT_KILL_GRACE_MS = 2_000;

export type CommandRunOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  killGraceMs?: number;
};

export type CommandResult = CommandDiagnostics & {
  timedOut: boolean;
};

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: CommandRunOptions
) => Promise<CommandResult>;

export function appendCapturedOutput(captured: string, chunk: string): string {
  const combined = captured + chunk;
  if (combined.length <= MAX_CAPTURED_OUTPUT_LENGTH) {
    return combined;
  }

  return combined.slice(combined.length - MAX_CAPTURED_OUTPUT_LENGTH);
}

function signalProcessGroup(childProcess: ChildProcess, signal: NodeJS.Signals): void {
  const { pid } = childProcess;
  if (pid === undefined) {
    return;
  }

  try {
    // Negative pid targets the whole group, so descendants of the shell go too.
    process.kill(-pid, signal);
  } catch (error: unknown) {
    if (hasErrorCode(error, 'ESRCH')) {
      return;
    }

    childProcess.kill(signal);
  }
}

// Resolves with diagnostics for any exit status; rejects only when the process cannot be spawned.
export async function runCommand(
  command: string,
  args: readonly string[],
  options: CommandRunOptions = {}
): Promise<CommandResult> {
  const { cwd, env = process.env, timeoutMs, killGraceMs = DEFAULT_KILL_GRACE_MS } = options;
  const startedAt = Date.now();

  return new Promise<CommandResult>((resolve, reject) => {
    const childProcess = spawn(command, args, {
      cwd,
      env,
      detached: true,
      stdio: ['ignore', 'pipe', 'pipe']
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let timeoutTimer: NodeJS.Timeout | null = null;
    let killTimer: NodeJS.Timeout | null = null;

    function clearTimers(): void {
      if (timeoutTimer) {
        clearTimeout(timeoutTimer);
        timeoutTimer = null;
      }

      if (killTimer) {
        clearTimeout(killTimer);
        killTimer = null;
      }
    }

    if (typeof timeoutMs === 'number' && timeoutMs > 0) {
      timeoutTimer = setTimeout(() => {
        timedOut = true;
        signalProcessGroup(childProcess, 'SIGTERM');
        killTimer = setTimeout(() => {
          signalProcessGroup(childProcess, 'SIGKILL');
        }, killGraceMs);
      }, timeoutMs);
    }

    childProcess.stdout.setEncoding('utf8');
    childProcess.stdout.on('data', (chunk: string) => {
      stdout = appendCapturedOutput(stdout, chunk);
    });

    childProcess.stderr.setEncoding('utf8');
    childProcess.stderr.on('data', (chunk: string) => {
      stderr = appendCapturedOutput(stderr, chunk);
    });

    childProcess.on('error', (error) => {
      clearTimers();
      reject(error);
    });

    childProcess.on('close', (exitCode, signal) => {
      clearTimers();
      if (timedOut) {
        signalProcessGroup(childProcess, 'SIGKILL');
      }

      resolve({
        exitCode,
        signal,
        stdout,
        stderr,
        durationMs: Date.now() - startedAt,
        timedOut
      });
    });
  });
}

export function formatCommandFailure(command: string, args: readonly string[], result: CommandResult): string {
  const status = result.signal ? `signal ${result.signal}` : `exit ${result.exitCode ?? 'unknown'}`;
  const details = result.stderr.trim().length > 0 ? `: ${result.stderr.trim()}` : '';
  return `Command failed: ${command} ${args.join(' ')} (${status})${details}`;
}
