import { MAX_DIFF_LINES, diffLines, formatLineDiff } from '../../../src/results/diff.js';

describe('diffLines', () => {
  it('marks inserted and deleted lines around common ones', () => {
    expect(diffLines(['a', 'b', 'c'], ['a', 'x', 'c', 'd'])).toEqual([
      { type: 'equal', text: 'a' },
      { type: 'delete', text: 'b' },
      { type: 'insert', text: 'x' },
      { type: 'equal', text: 'c' },
      { type: 'insert', text: 'd' },
    ]);
  });

  it('handles empty sides', () => {
    expect(diffLines([], ['a'])).toEqual([{ type: 'insert', text: 'a' }]);
    expect(diffLines(['a'], [])).toEqual([{ type: 'delete', text: 'a' }]);
  });
});

describe('formatLineDiff', () => {
  it('collapses unchanged lines outside the context window', () => {
    const expected = ['1', '2', '3', '4', '5', '6', '7'].join('\n') + '\n';
    const actual = ['1', '2', '3', '4', '5', '6', 'seven'].join('\n') + '\n';
    expect(formatLineDiff(expected, actual)).toBe(
      ['--- expected', '+++ actual', '  ... 4 unchanged lines', ' 5', ' 6', '-7', '+seven'].join('\n')
    );
  });

  it('notes a newline present only in actual', () => {
    expect(formatLineDiff('ok', 'ok\n')).toBe(
      ['--- expected', '+++ actual', '  ... 1 unchanged line', '\\ actual ends with a newline, expected does not'].join('\n')
    );
  });

  it('diffs only the changed region of a long output', () => {
    const lines = Array.from({ length: 20_000 }, (_, i) => `l${i}`);
    const changed = [...lines];
    changed[10_000] = 'changed';
    expect(formatLineDiff(lines.join('\n') + '\n', changed.join('\n') + '\n')).toBe(
      [
        '--- expected',
        '+++ actual',
        '  ... 9998 unchanged lines',
        ' l9998',
        ' l9999',
        '-l10000',
        '+changed',
        ' l10001',
        ' l10002',
        '  ... 9997 unchanged lines',
      ].join('\n')
    );
  });

  it('summarises a differing region larger than the diff limit', () => {
    const count = MAX_DIFF_LINES * 6;
    const expected = Array.from({ length: count }, (_, i) => `line ${i}`).join('\n') + '\n';
    const actual = Array.from({ length: count }, (_, i) => `row ${i}`).join('\n');
    expect(formatLineDiff(expected, actual)).toBe(
      [
        '--- expected',
        '+++ actual',
        'first difference at line 1',
        '-line 0',
        '+row 0',
        `expected ${count} lines, actual ${count} lines`,
        '\\ expected ends with a newline, actual does not',
      ].join('\n')
    );
  });
});
