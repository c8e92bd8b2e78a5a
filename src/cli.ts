#!/usr/bin/env node
import path from 'path';
import { Command, CommanderError } from 'commander';
import { DEFAULT_CONFIG_FILE, configFromEnv, loadConfigFile, resolveConfig } from './config/loader.js';
import type { ConfigLayer } from './config/loader.js';
import { formatCaseLine, formatSummary } from './report/format.js';
import { writeReport } from './report/report-generator.js';
import { runSuite } from './runner/driver.js';
import { ExecaProcessRunner } from './runner/process-runner.js';
import type { ProcessRunner } from './runner/types.js';
import { isHarnessError } from './shared/errors.js';
import { logger } from './shared/logger.js';
import { loadSuite } from './suite/loader.js';

export const EXIT_FATAL = 2;

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
  cwd: string;
  env: NodeJS.ProcessEnv;
  runner: ProcessRunner;
}

interface CliOptions {
  tool?: string;
  toolArg?: string[];
  runDir?: string;
  timeout?: string;
  filter?: string;
  failFast?: boolean;
  report?: string;
  config?: string;
}

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

export function buildProgram(): Command {
  return new Command()
    .name('bc-run-harness')
    .description('Run a bytecode test suite against an external tool and compare its output')
    .argument('[suite]', 'suite descriptor (YAML or JSON)')
    .option('--tool <path>', 'executable invoked as `<tool> run <artifact> [deps...]`')
    .option('--tool-arg <arg>', 'argument placed before `run` (repeatable)', collect)
    .option('--run-dir <dir>', 'directory holding <name>.bc.json and <name>.output')
    .option('--timeout <ms>', 'per-process timeout in milliseconds, 0 disables')
    .option('--filter <text>', 'only run cases whose name contains <text>')
    .option('--fail-fast', 'skip remaining cases after the first failure')
    .option('--report <path>', 'write a markdown report')
    .option('--config <path>', `config file (default ${DEFAULT_CONFIG_FILE})`)
    .exitOverride();
}

function cliLayer(suite: string | undefined, opts: CliOptions): ConfigLayer {
  return {
    suite,
    tool: opts.tool,
    toolArgs: opts.toolArg,
    runDir: opts.runDir,
    timeoutMs: opts.timeout !== undefined ? Number(opts.timeout) : undefined,
    filter: opts.filter,
    failFast: opts.failFast,
    report: opts.report,
  };
}

/** Returns the process exit status: 0 all passed, 1 some case failed, 2 fatal error. */
export async function main(argv: string[], io: CliIo): Promise<number> {
  const program = buildProgram().configureOutput({
    writeOut: text => io.out(text.trimEnd()),
    writeErr: text => io.err(text.trimEnd()),
  });
  try {
    program.parse(argv, { from: 'user' });
  } catch (err) {
    // --help and --version land here too, with exit code 0.
    if (err instanceof CommanderError) return err.exitCode === 0 ? 0 : EXIT_FATAL;
    throw err;
  }
  const opts = program.opts<CliOptions>();
  const suiteArg: string | undefined = program.args[0];

  try {
    const config = resolveConfig(
      loadConfigFile(opts.config, io.cwd),
      configFromEnv(io.env),
      cliLayer(suiteArg, opts)
    );
    const suite = await loadSuite(path.resolve(io.cwd, config.suite));
    const startedAt = new Date().toISOString();

    const summary = await runSuite(
      suite,
      { ...config, cwd: io.cwd },
      { runner: io.runner, onCase: report => io.out(formatCaseLine(report)) }
    );
    io.out(formatSummary(summary));

    if (config.report) {
      await writeReport(path.resolve(io.cwd, config.report), summary, {
        suitePath: config.suite,
        tool: config.tool,
        startedAt,
      });
    }
    return summary.exitCode;
  } catch (err) {
    if (isHarnessError(err) && err.fatal) {
      io.err(`error: ${err.message}`);
      return EXIT_FATAL;
    }
    throw err;
  }
}

if (require.main === module) {
  main(process.argv.slice(2), {
    out: line => process.stdout.write(line + '\n'),
    err: line => process.stderr.write(line + '\n'),
    cwd: process.cwd(),
    env: process.env,
    runner: new ExecaProcessRunner(),
  }).then(
    code => {
      process.exitCode = code;
    },
    (err: unknown) => {
      logger.fatal({ err }, 'Harness crashed');
      process.exitCode = EXIT_FATAL;
    }
  );
}
