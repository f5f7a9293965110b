/**
 * Subprocess executor.
 *
 * Runs one snippet per child process with:
 * - Stripped environment (no reasoning-service credentials)
 * - Optional stdin, written once and closed
 * - Timeout enforcement on the whole process group (SIGTERM, grace period, SIGKILL)
 * - Output capture bounded while the program runs
 *
 * This bounds time only. It is not a sandbox: the child can touch the
 * filesystem and network with the service's own permissions.
 */

import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import { constants } from 'node:os';
import { Logger } from '@code-coach/shared/Utils/logger.js';
import { getStrippedEnv, type RunnerConfig } from '../config.js';
import { OutputCapture, type TruncateConfig } from '../utils/output-truncate.js';
import type {
  ExecutionOutcome,
  ExecutionRunner,
  InterpreterCommand,
  RunRequest,
} from './types.js';

export interface SubprocessRunnerOptions {
  interpreter: InterpreterCommand;
  /** Time between SIGTERM and SIGKILL once the deadline has passed */
  killGraceMs: number;
  truncation: TruncateConfig;
  env: Record<string, string>;
  logger?: Logger;
}

function exitCodeFrom(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  const match: [string, number] | undefined = Object.entries(constants.signals)
    .find(([name]) => name === signal);
  return match ? -match[1] : -1;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SubprocessRunner implements ExecutionRunner {
  private readonly logger: Logger;

  constructor(private readonly options: SubprocessRunnerOptions) {
    this.logger = options.logger ?? new Logger('runner:executor');
  }

  async run(request: RunRequest): Promise<ExecutionOutcome> {
    const { interpreter, env, truncation } = this.options;
    const startTime = Date.now();
    const elapsedSeconds = (): number => (Date.now() - startTime) / 1000;

    let child: ChildProcessWithoutNullStreams;
    try {
      // Own process group, so the deadline reaches anything the program starts
      child = spawn(interpreter.command, [interpreter.codeFlag, request.code], { env, detached: true });
    } catch (error) {
      // Synchronous failures: invalid arguments (e.g. NUL bytes in code), EAGAIN
      this.logger.warn('Spawn failed', { error });
      return { kind: 'dispatch_failed', message: describeError(error), durationSeconds: elapsedSeconds() };
    }

    return new Promise<ExecutionOutcome>((resolve) => {
      const stdout = new OutputCapture(truncation);
      const stderr = new OutputCapture(truncation);
      let timedOut = false;
      let settled = false;
      let killTimer: ReturnType<typeof setTimeout> | null = null;

      const timeoutTimer = setTimeout(() => {
        if (child.exitCode !== null || child.signalCode !== null) {
          // Program finished; only a process that left the group still holds the pipes
          settleCompleted(child.exitCode, child.signalCode);
          return;
        }
        timedOut = true;
        this.logger.debug('Deadline reached, terminating', { pid: child.pid, timeoutSeconds: request.timeoutSeconds });
        this.signalGroup(child, 'SIGTERM');

        killTimer = setTimeout(() => {
          this.signalGroup(child, 'SIGKILL');
          settleTimedOut();
        }, this.options.killGraceMs);
      }, request.timeoutSeconds * 1000);

      const settle = (outcome: ExecutionOutcome): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutTimer);
        if (killTimer) clearTimeout(killTimer);
        // A descendant that escaped the group may still hold the pipes open
        child.stdin.destroy();
        child.stdout.destroy();
        child.stderr.destroy();
        resolve(outcome);
      };

      const settleCompleted = (code: number | null, signal: NodeJS.Signals | null): void => {
        const out = stdout.finish();
        const err = stderr.finish();
        settle({
          kind: 'completed',
          exitCode: exitCodeFrom(code, signal),
          stdout: out.text,
          stderr: err.text,
          durationSeconds: elapsedSeconds(),
          truncated: out.truncated || err.truncated,
        });
      };

      const settleTimedOut = (): void => {
        const out = stdout.finish();
        const err = stderr.finish();
        settle({ kind: 'timed_out', stdout: out.text, stderr: err.text, durationSeconds: elapsedSeconds() });
      };

      child.stdout.on('data', (chunk: Buffer) => stdout.write(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.write(chunk));

      // EPIPE when the program exits without reading its input
      child.stdin.on('error', (error) => {
        this.logger.debug('stdin write failed', { pid: child.pid, error });
      });
      if (request.stdin.length > 0) {
        child.stdin.end(request.stdin);
      }

      // Asynchronous spawn errors (command not found, resource exhaustion)
      child.on('error', (error) => {
        if (settled) return;
        this.logger.warn('Child process error', { error });
        settle({ kind: 'dispatch_failed', message: error.message, durationSeconds: elapsedSeconds() });
      });

      child.on('exit', () => {
        if (timedOut) {
          settleTimedOut();
          return;
        }
        // Background processes the program left behind do not outlive the run
        this.signalGroup(child, 'SIGKILL');
      });

      child.on('close', (code, signal) => {
        if (timedOut) {
          settleTimedOut();
          return;
        }
        settleCompleted(code, signal);
      });
    });
  }

  private signalGroup(child: ChildProcessWithoutNullStreams, signal: NodeJS.Signals): void {
    if (child.pid === undefined) return;
    try {
      process.kill(-child.pid, signal);
    } catch (error) {
      // ESRCH: every process in the group has already exited
      this.logger.debug('Process group not signalled', { pid: child.pid, signal, error });
    }
  }
}

/**
 * Build the Python runner described by the service configuration.
 */
export function createSubprocessRunner(config: RunnerConfig, logger?: Logger): SubprocessRunner {
  return new SubprocessRunner({
    interpreter: { command: config.pythonBin, codeFlag: '-c' },
    killGraceMs: config.killGraceMs,
    truncation: {
      maxChars: config.maxOutputChars,
      head: config.truncationHead,
      tail: config.truncationTail,
    },
    env: getStrippedEnv(),
    logger,
  });
}
