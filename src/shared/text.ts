export function prefixLines(text: string, prefix: string): string {
  const body = text.endsWith('\n') ? text.slice(0, -1) : text;
  return body.split('\n').map(line => `${prefix}${line}`).join('\n');
}

export function indent(text: string, width: number): string {
  return prefixLines(text, ' '.repeat(width));
}
