/**
 * Core types for code execution.
 */

export interface RunRequest {
  code: string;
  /** Text fed to the program's stdin. Empty string = leave stdin open and unwritten. */
  stdin: string;
  timeoutSeconds: number;
}

/** Program ran to completion within the deadline (any exit code). */
export interface CompletedOutcome {
  kind: 'completed';
  /** Process exit code; a signal death is reported as the negated signal number. */
  exitCode: number;
  stdout: string;
  stderr: string;
  durationSeconds: number;
  truncated: boolean;
}

/** Deadline elapsed and the child was terminated. */
export interface TimedOutOutcome {
  kind: 'timed_out';
  stdout: string;
  stderr: string;
  durationSeconds: number;
}

/** The child process could not be started at all. */
export interface DispatchFailedOutcome {
  kind: 'dispatch_failed';
  message: string;
  durationSeconds: number;
}

export type ExecutionOutcome = CompletedOutcome | TimedOutOutcome | DispatchFailedOutcome;

/** How to hand source text to an interpreter, e.g. `python3 -c <code>`. */
export interface InterpreterCommand {
  command: string;
  codeFlag: string;
}

/**
 * Anything that can execute one request. The HTTP layer depends on this,
 * not on the subprocess implementation.
 */
export interface ExecutionRunner {
  run(request: RunRequest): Promise<ExecutionOutcome>;
}
