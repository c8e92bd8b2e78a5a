import os from 'os';
import execa from 'execa';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Invocation } from '../suite/types.js';
import { drainLines, drainText } from './line-splitter.js';
import type { ProcessRunner, RunOptions, RunResult } from './types.js';

function signalExitCode(signal: string): number {
  const found = Object.entries(os.constants.signals).find(([name]) => name === signal);
  return 128 + (found ? found[1] : 0);
}

function launchFailure(invocation: Invocation, err: unknown): HarnessError {
  const message = err instanceof Error ? err.message : String(err);
  return new HarnessError(HarnessErrorCode.LAUNCH_FAILURE, `Failed to launch ${invocation.command}: ${message}`, {
    command: invocation.command,
    args: invocation.args,
    errno: err instanceof Error ? (err as NodeJS.ErrnoException).code : undefined,
  });
}

function streamFailure(invocation: Invocation, stream: string, err: unknown): HarnessError {
  const message = err instanceof Error ? err.message : String(err);
  return new HarnessError(HarnessErrorCode.STREAM_FAILURE, `Lost ${stream} of ${invocation.command}: ${message}`, {
    command: invocation.command,
    args: invocation.args,
  });
}

export class ExecaProcessRunner implements ProcessRunner {
  async run(invocation: Invocation, options?: RunOptions): Promise<RunResult> {
    const start = performance.now();
    const timeoutMs = options?.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : undefined;
    logger.debug({ command: invocation.command, args: invocation.args, timeoutMs }, 'Launching');

    // Streams are drained by hand so stdout can be split as it arrives.
    const child = execa(invocation.command, invocation.args, {
      cwd: options?.cwd,
      env: options?.env,
      timeout: timeoutMs,
      stdin: 'ignore',
      buffer: false,
      reject: false,
    });

    const spawn: { error?: Error } = {};
    child.once('error', err => {
      spawn.error = err;
    });

    // Both drains start before the exit is awaited: a child blocked on a full pipe would
    // otherwise never exit.
    const drains = Promise.allSettled([drainLines(child.stdout), drainText(child.stderr)]);
    const [outcome] = await Promise.allSettled([child]);
    if (outcome.status === 'fulfilled' && outcome.value.timedOut) {
      // A grandchild that inherited the pipes can keep them open after the kill.
      child.stdout?.destroy();
      child.stderr?.destroy();
    }
    const [stdoutDrain, stderrDrain] = await drains;
    const durationMs = Math.round(performance.now() - start);

    if (spawn.error) throw launchFailure(invocation, spawn.error);
    // With reject: false, execa only rejects when spawn() itself threw.
    if (outcome.status === 'rejected') throw launchFailure(invocation, outcome.reason);
    const settled = outcome.value;
    const stderrText = stderrDrain.status === 'fulfilled' ? stderrDrain.value : '';

    if (settled.timedOut) {
      throw new HarnessError(HarnessErrorCode.PROCESS_TIMEOUT, `Process timed out after ${timeoutMs}ms`, {
        command: invocation.command,
        args: invocation.args,
        stderr: stderrText,
      });
    }
    if (stdoutDrain.status === 'rejected') throw streamFailure(invocation, 'stdout', stdoutDrain.reason);
    if (stderrDrain.status === 'rejected') throw streamFailure(invocation, 'stderr', stderrDrain.reason);
    const stdout = stdoutDrain.value;

    // execa leaves this null when a signal ended the process and undefined when it never ran.
    const rawExitCode: number | null | undefined = settled.exitCode;
    let exitCode: number;
    if (typeof rawExitCode === 'number') {
      exitCode = rawExitCode;
    } else if (settled.signal) {
      exitCode = signalExitCode(settled.signal);
    } else {
      throw launchFailure(invocation, new Error('no exit status reported'));
    }

    logger.debug({ command: invocation.command, exitCode, durationMs }, 'Process exited');
    return {
      stdoutLines: stdout.lines,
      stdoutEndsWithNewline: stdout.endsWithNewline,
      stderrText,
      exitCode,
    };
  }
}
