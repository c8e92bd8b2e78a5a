import type { Invocation } from '../suite/types.js';

export interface RunResult {
  stdoutLines: string[];
  /** Whether the final stdout line was terminated; keeps the captured text exact. */
  stdoutEndsWithNewline: boolean;
  stderrText: string;
  exitCode: number;
}

export interface RunOptions {
  cwd?: string;
  env?: Record<string, string>;
  /** 0 or undefined disables the timeout. */
  timeoutMs?: number;
}

/** Runs one invocation to completion. Throws HarnessError only when no exit status could be observed. */
export interface ProcessRunner {
  run(invocation: Invocation, options?: RunOptions): Promise<RunResult>;
}
