// false: run normally; true: skip with the default reason; string: skip with that reason.
export type SkipSetting = boolean | string;

export interface TestCase {
  readonly name: string;
  readonly expectError: boolean;
  readonly skip: SkipSetting;
  readonly dependencies: readonly string[];
}

export interface Suite {
  readonly sourcePath?: string;
  readonly cases: readonly TestCase[];
}

export interface Invocation {
  command: string;
  args: string[];
}
