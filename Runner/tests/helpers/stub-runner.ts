import type { ExecutionOutcome, ExecutionRunner, RunRequest } from '../../src/executor/types.js';

/**
 * Runner that returns a canned outcome and records what it was asked to run.
 */
export class StubRunner implements ExecutionRunner {
  readonly requests: RunRequest[] = [];

  constructor(private readonly outcome: ExecutionOutcome) {}

  async run(request: RunRequest): Promise<ExecutionOutcome> {
    this.requests.push(request);
    return this.outcome;
  }
}

export function completed(exitCode: number, stdout: string, stderr: string, durationSeconds = 0.05): ExecutionOutcome {
  return { kind: 'completed', exitCode, stdout, stderr, durationSeconds, truncated: false };
}

export function timedOut(durationSeconds = 1.01): ExecutionOutcome {
  return { kind: 'timed_out', stdout: '', stderr: '', durationSeconds };
}

export function dispatchFailed(message: string, durationSeconds = 0.001): ExecutionOutcome {
  return { kind: 'dispatch_failed', message, durationSeconds };
}
