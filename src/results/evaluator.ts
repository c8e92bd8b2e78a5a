// Verdict logic for a finished run. Success cases compare stdout byte for byte;
// error cases only require the expected fragment somewhere in stderr.
import { HarnessErrorCode } from '../shared/errors.js';
import { prefixLines } from '../shared/text.js';
import type { RunResult } from '../runner/types.js';
import { formatLineDiff } from './diff.js';
import { PASS, fail } from './types.js';
import type { Verdict } from './types.js';

export const STDERR_PREFIX = 'stderr| ';

/** The captured stdout exactly as the process wrote it. */
export function stdoutText(result: Pick<RunResult, 'stdoutLines' | 'stdoutEndsWithNewline'>): string {
  const joined = result.stdoutLines.join('\n');
  return result.stdoutEndsWithNewline ? `${joined}\n` : joined;
}

function stderrBlock(stderrText: string): string {
  return stderrText.length > 0 ? prefixLines(stderrText, STDERR_PREFIX) : '(stderr was empty)';
}

/** Surrounding whitespace, the file's trailing newline included, is not part of the fragment. */
export function errorPattern(expected: string): string {
  return expected.trim();
}

export function evaluate(expected: string, actual: RunResult, expectError: boolean): Verdict {
  if (expectError) {
    if (actual.exitCode === 0) {
      return fail(HarnessErrorCode.UNEXPECTED_SUCCESS, 'expected error, got success');
    }
    const pattern = errorPattern(expected);
    if (pattern.length === 0) {
      return fail(
        HarnessErrorCode.ERROR_PATTERN_MISMATCH,
        ['expected error output is empty, nothing to match', stderrBlock(actual.stderrText)].join('\n')
      );
    }
    if (actual.stderrText.includes(pattern)) return PASS;
    return fail(
      HarnessErrorCode.ERROR_PATTERN_MISMATCH,
      [
        'stderr did not match expected error pattern',
        `expected fragment: ${pattern}`,
        stderrBlock(actual.stderrText),
      ].join('\n')
    );
  }

  if (actual.exitCode !== 0) {
    return fail(
      HarnessErrorCode.NONZERO_EXIT,
      [`exited with code ${actual.exitCode}`, stderrBlock(actual.stderrText)].join('\n')
    );
  }

  const output = stdoutText(actual);
  if (output === expected) return PASS;

  const lines = ['stdout did not match expected output', formatLineDiff(expected, output)];
  if (actual.stderrText.length > 0) lines.push(stderrBlock(actual.stderrText));
  return fail(HarnessErrorCode.OUTPUT_MISMATCH, lines.join('\n'));
}
