// End-to-end through real processes: stub tool, real files, launch log.
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { runSuite } from '../../../src/runner/driver.js';
import type { DriverSettings } from '../../../src/runner/driver.js';
import { ExecaProcessRunner } from '../../../src/runner/process-runner.js';
import type { ProcessRunner, RunOptions, RunResult } from '../../../src/runner/types.js';
import { parseSuite } from '../../../src/suite/loader.js';
import type { Invocation } from '../../../src/suite/types.js';
import { STUB_TOOL, readLaunchLog, writeArtifact } from './stub-tool.js';

/** Points the stub's launch log at a file; everything else goes to the real runner. */
class LoggingRunner implements ProcessRunner {
  private inner = new ExecaProcessRunner();

  constructor(private logFile: string) {}

  run(invocation: Invocation, options?: RunOptions): Promise<RunResult> {
    return this.inner.run(invocation, { ...options, env: { STUB_LOG: this.logFile } });
  }
}

const suite = parseSuite(`
- name: add
- name: div_by_zero
  is_error: true
- name: skipped_feature
  skip: not implemented
- name: uses_lib
  dependencies: [lib]
- name: broken
`);

describe('suite run against the stub tool', () => {
  let cwd: string;
  let logFile: string;
  let settings: DriverSettings;

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), 'bc-harness-suite-'));
    const runDir = path.join(cwd, 'test/run');
    await fs.mkdir(runDir, { recursive: true });
    logFile = path.join(cwd, 'launches.log');
    settings = { tool: process.execPath, toolArgs: [STUB_TOOL], runDir: 'test/run', cwd, timeoutMs: 10_000, failFast: false };

    await writeArtifact(runDir, 'add', { stdout: '3\n' });
    await fs.writeFile(path.join(runDir, 'add.output'), '3\n');
    await writeArtifact(runDir, 'div_by_zero', { stderr: 'Error: division by zero at line 4', exit: 1 });
    await fs.writeFile(path.join(runDir, 'div_by_zero.output'), 'division by zero');
    await writeArtifact(runDir, 'lib', {});
    await writeArtifact(runDir, 'uses_lib', { stdout: 'linked\n' });
    await fs.writeFile(path.join(runDir, 'uses_lib.output'), 'linked\n');
    await writeArtifact(runDir, 'broken', { stdout: '2\n' });
    await fs.writeFile(path.join(runDir, 'broken.output'), '3\n');
  });

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true });
  });

  it('produces the expected verdicts and launches only non-skipped cases', async () => {
    const summary = await runSuite(suite, settings, { runner: new LoggingRunner(logFile) });

    expect(summary.cases.map(c => [c.name, c.verdict.kind])).toEqual([
      ['add', 'pass'],
      ['div_by_zero', 'pass'],
      ['skipped_feature', 'skip'],
      ['uses_lib', 'pass'],
      ['broken', 'fail'],
    ]);
    expect(summary.exitCode).toBe(1);

    const launches = await readLaunchLog(logFile);
    expect(launches).toEqual([
      ['run', 'test/run/add.bc.json'],
      ['run', 'test/run/div_by_zero.bc.json'],
      ['run', 'test/run/uses_lib.bc.json', 'test/run/lib.bc.json'],
      ['run', 'test/run/broken.bc.json'],
    ]);
  });

  it('gives identical verdicts on a second run', async () => {
    const runner = new LoggingRunner(logFile);
    const first = await runSuite(suite, settings, { runner });
    const second = await runSuite(suite, settings, { runner });
    expect(second.cases.map(c => c.verdict)).toEqual(first.cases.map(c => c.verdict));
    expect(await readLaunchLog(logFile)).toHaveLength(8);
  });

  it('reports a missing tool as a failure of each executed case', async () => {
    const summary = await runSuite(
      suite,
      { ...settings, tool: path.join(cwd, 'missing-tool'), toolArgs: [] },
      { runner: new ExecaProcessRunner() }
    );
    expect(summary.cases.map(c => (c.verdict.kind === 'fail' ? c.verdict.code : c.verdict.kind))).toEqual([
      'LAUNCH_FAILURE',
      'LAUNCH_FAILURE',
      'skip',
      'LAUNCH_FAILURE',
      'LAUNCH_FAILURE',
    ]);
  });
});
