import path from 'path';
import type { Invocation, TestCase } from './types.js';

export const ARTIFACT_SUFFIX = '.bc.json';
export const EXPECTED_OUTPUT_SUFFIX = '.output';

export interface InvocationSettings {
  tool: string;
  toolArgs: readonly string[];
  runDir: string;
}

export function artifactPath(runDir: string, name: string): string {
  return path.join(runDir, `${name}${ARTIFACT_SUFFIX}`);
}

export function expectedOutputPath(runDir: string, name: string): string {
  return path.join(runDir, `${name}${EXPECTED_OUTPUT_SUFFIX}`);
}

/** Dependency artifacts in declaration order. Existence is left for the tool to report. */
export function resolveDependencies(runDir: string, testCase: TestCase): string[] {
  return testCase.dependencies.map(dep => artifactPath(runDir, dep));
}

export function buildInvocation(settings: InvocationSettings, testCase: TestCase): Invocation {
  return {
    command: settings.tool,
    args: [
      ...settings.toolArgs,
      'run',
      artifactPath(settings.runDir, testCase.name),
      ...resolveDependencies(settings.runDir, testCase),
    ],
  };
}
