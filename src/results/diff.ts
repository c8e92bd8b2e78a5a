export type DiffOp =
  | { type: 'equal'; text: string }
  | { type: 'delete'; text: string }
  | { type: 'insert'; text: string };

const CONTEXT_LINES = 2;
/** Larger differing regions are summarised instead of diffed; the LCS table is quadratic. */
export const MAX_DIFF_LINES = 2000;

/** Lengths of the common leading and trailing runs, never overlapping. */
function commonEnds(expected: readonly string[], actual: readonly string[]): { head: number; tail: number } {
  const limit = Math.min(expected.length, actual.length);
  let head = 0;
  while (head < limit && expected[head] === actual[head]) head++;
  let tail = 0;
  while (
    tail < limit - head &&
    expected[expected.length - 1 - tail] === actual[actual.length - 1 - tail]
  ) {
    tail++;
  }
  return { head, tail };
}

/** LCS line diff of expected against actual. */
export function diffLines(expected: readonly string[], actual: readonly string[]): DiffOp[] {
  const { head, tail } = commonEnds(expected, actual);
  const ops: DiffOp[] = expected.slice(0, head).map((text): DiffOp => ({ type: 'equal', text }));
  ops.push(...diffMiddle(expected.slice(head, expected.length - tail), actual.slice(head, actual.length - tail)));
  for (const text of expected.slice(expected.length - tail)) ops.push({ type: 'equal', text });
  return ops;
}

function diffMiddle(expected: readonly string[], actual: readonly string[]): DiffOp[] {
  const n = expected.length;
  const m = actual.length;
  // lcs[i][j] = length of the common subsequence of expected[i..] and actual[j..]
  const lcs: number[][] = Array.from({ length: n + 1 }, () => new Array<number>(m + 1).fill(0));
  for (let i = n - 1; i >= 0; i--) {
    for (let j = m - 1; j >= 0; j--) {
      lcs[i][j] = expected[i] === actual[j]
        ? lcs[i + 1][j + 1] + 1
        : Math.max(lcs[i + 1][j], lcs[i][j + 1]);
    }
  }

  const ops: DiffOp[] = [];
  let i = 0;
  let j = 0;
  while (i < n && j < m) {
    if (expected[i] === actual[j]) {
      ops.push({ type: 'equal', text: expected[i] });
      i++;
      j++;
    } else if (lcs[i + 1][j] >= lcs[i][j + 1]) {
      ops.push({ type: 'delete', text: expected[i] });
      i++;
    } else {
      ops.push({ type: 'insert', text: actual[j] });
      j++;
    }
  }
  for (; i < n; i++) ops.push({ type: 'delete', text: expected[i] });
  for (; j < m; j++) ops.push({ type: 'insert', text: actual[j] });
  return ops;
}

function splitText(text: string): { lines: string[]; endsWithNewline: boolean } {
  if (text.length === 0) return { lines: [], endsWithNewline: false };
  const endsWithNewline = text.endsWith('\n');
  const body = endsWithNewline ? text.slice(0, -1) : text;
  return { lines: body.split('\n'), endsWithNewline };
}

/**
 * Unified-style rendering: `-` lines only in expected, `+` lines only in actual,
 * unchanged runs longer than the context window collapsed.
 */
export function formatLineDiff(expected: string, actual: string): string {
  const exp = splitText(expected);
  const act = splitText(actual);
  const out: string[] = ['--- expected', '+++ actual'];
  const newlineNote = exp.endsWithNewline === act.endsWithNewline
    ? []
    : [exp.endsWithNewline
      ? '\\ expected ends with a newline, actual does not'
      : '\\ actual ends with a newline, expected does not'];

  const { head, tail } = commonEnds(exp.lines, act.lines);
  if (exp.lines.length - head - tail > MAX_DIFF_LINES || act.lines.length - head - tail > MAX_DIFF_LINES) {
    out.push(`first difference at line ${head + 1}`);
    if (head < exp.lines.length) out.push(`-${exp.lines[head]}`);
    if (head < act.lines.length) out.push(`+${act.lines[head]}`);
    out.push(`expected ${exp.lines.length} lines, actual ${act.lines.length} lines`);
    return [...out, ...newlineNote].join('\n');
  }

  const ops = diffLines(exp.lines, act.lines);

  const changed = ops.map(op => op.type !== 'equal');
  const nearChange = (index: number): boolean => {
    for (let k = Math.max(0, index - CONTEXT_LINES); k <= Math.min(ops.length - 1, index + CONTEXT_LINES); k++) {
      if (changed[k]) return true;
    }
    return false;
  };

  let hidden = 0;
  ops.forEach((op, index) => {
    if (op.type === 'equal' && !nearChange(index)) {
      hidden++;
      return;
    }
    if (hidden > 0) {
      out.push(`  ... ${hidden} unchanged line${hidden === 1 ? '' : 's'}`);
      hidden = 0;
    }
    const marker = op.type === 'equal' ? ' ' : op.type === 'delete' ? '-' : '+';
    out.push(`${marker}${op.text}`);
  });
  if (hidden > 0) out.push(`  ... ${hidden} unchanged line${hidden === 1 ? '' : 's'}`);

  return [...out, ...newlineNote].join('\n');
}
