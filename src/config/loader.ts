// Config resolution: built-in defaults, then the YAML config file, then BC_HARNESS_* env vars,
// then CLI flags. Later layers override earlier ones key by key; undefined never overrides.
// The merged result is validated once, so every layer shares the same error path.
import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const DEFAULT_CONFIG_FILE = 'bc-harness.yaml';

export const harnessConfigSchema = z.object({
  tool: z.string().min(1),
  toolArgs: z.array(z.string()),
  suite: z.string().min(1),
  runDir: z.string().min(1),
  timeoutMs: z.number().int().nonnegative(),
  failFast: z.boolean(),
  filter: z.string().optional(),
  report: z.string().optional(),
});

export type HarnessConfig = z.infer<typeof harnessConfigSchema>;
export type ConfigLayer = Partial<HarnessConfig>;

const configFileSchema = harnessConfigSchema.partial().strict();

export const DEFAULT_CONFIG: HarnessConfig = {
  tool: 'bcvm',
  toolArgs: [],
  suite: 'test/suite.yaml',
  runDir: 'test/run',
  timeoutMs: 0,
  failFast: false,
};

function invalid(message: string, context?: Record<string, unknown>): HarnessError {
  return new HarnessError(HarnessErrorCode.INVALID_CONFIG, message, context);
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || 'config'}: ${i.message}`).join('; ');
}

/**
 * Reads the config file. An explicitly named file must exist; the default
 * file in the working directory is optional.
 */
export function loadConfigFile(explicitPath?: string, cwd: string = process.cwd()): ConfigLayer {
  const configPath = path.resolve(cwd, explicitPath ?? DEFAULT_CONFIG_FILE);
  if (!existsSync(configPath)) {
    if (explicitPath) throw invalid(`Config file not found: ${configPath}`, { configPath });
    return {};
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw invalid(`Failed to parse config ${configPath}: ${(err as Error).message}`, { configPath });
  }
  if (parsed === null || parsed === undefined) return {};

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    throw invalid(`Invalid config ${configPath}: ${describeIssues(result.error)}`, { configPath });
  }
  logger.debug({ configPath }, 'Config file loaded');
  return result.data;
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  const layer: ConfigLayer = {};
  const tool = env['BC_HARNESS_TOOL'];
  const runDir = env['BC_HARNESS_RUN_DIR'];
  const timeout = env['BC_HARNESS_TIMEOUT_MS'];
  if (tool) layer.tool = tool;
  if (runDir) layer.runDir = runDir;
  if (timeout) layer.timeoutMs = Number(timeout);
  return layer;
}

function withoutUndefined(layer: ConfigLayer): Record<string, unknown> {
  return Object.fromEntries(Object.entries(layer).filter(([, v]) => v !== undefined));
}

export function resolveConfig(...layers: ConfigLayer[]): HarnessConfig {
  const merged = layers.reduce<Record<string, unknown>>(
    (acc, layer) => ({ ...acc, ...withoutUndefined(layer) }),
    { ...DEFAULT_CONFIG }
  );
  const result = harnessConfigSchema.safeParse(merged);
  if (!result.success) {
    throw invalid(`Invalid configuration: ${describeIssues(result.error)}`);
  }
  return result.data;
}
