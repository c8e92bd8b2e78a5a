import type { Readable } from 'stream';

export interface SplitLines {
  lines: string[];
  endsWithNewline: boolean;
}

/** Accumulates decoded chunks into lines split on "\n"; an unterminated tail is kept as the last line. */
export class LineSplitter {
  private lines: string[] = [];
  private pending = '';
  private sawAny = false;

  push(chunk: string): void {
    if (chunk.length === 0) return;
    this.sawAny = true;
    const parts = (this.pending + chunk).split('\n');
    this.pending = parts.pop() ?? '';
    this.lines.push(...parts);
  }

  finish(): SplitLines {
    if (!this.sawAny) return { lines: [], endsWithNewline: false };
    if (this.pending.length > 0) {
      return { lines: [...this.lines, this.pending], endsWithNewline: false };
    }
    return { lines: [...this.lines], endsWithNewline: true };
  }
}

export async function drainLines(stream: Readable | null): Promise<SplitLines> {
  const splitter = new LineSplitter();
  if (!stream) return splitter.finish();
  stream.setEncoding('utf8');
  for await (const chunk of stream) {
    splitter.push(String(chunk));
  }
  return splitter.finish();
}

export async function drainText(stream: Readable | null): Promise<string> {
  if (!stream) return '';
  stream.setEncoding('utf8');
  let text = '';
  for await (const chunk of stream) {
    text += String(chunk);
  }
  return text;
}
