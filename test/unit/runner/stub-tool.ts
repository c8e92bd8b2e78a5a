// Helpers for tests that drive test/fixtures/stub-tool.cjs through a real process.
import fs from 'fs/promises';
import path from 'path';

export const STUB_TOOL = path.resolve(__dirname, '../../fixtures/stub-tool.cjs');

export interface StubBehaviour {
  stdout?: string;
  stderr?: string;
  exit?: number;
  sleepMs?: number;
  floodBytes?: number;
  helperMs?: number;
}

export async function writeArtifact(dir: string, name: string, behaviour: StubBehaviour): Promise<string> {
  const file = path.join(dir, `${name}.bc.json`);
  await fs.writeFile(file, JSON.stringify(behaviour), 'utf-8');
  return file;
}

/** Argument lists recorded by the stub, one per launch. */
export async function readLaunchLog(logFile: string): Promise<string[][]> {
  let raw: string;
  try {
    raw = await fs.readFile(logFile, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return [];
    throw err;
  }
  return raw
    .split('\n')
    .filter(line => line.length > 0)
    .map(line => JSON.parse(line) as string[]);
}
