export enum HarnessErrorCode {
  MALFORMED_SPEC = 'MALFORMED_SPEC',
  INVALID_CONFIG = 'INVALID_CONFIG',
  LAUNCH_FAILURE = 'LAUNCH_FAILURE',
  PROCESS_TIMEOUT = 'PROCESS_TIMEOUT',
  STREAM_FAILURE = 'STREAM_FAILURE',
  MISSING_EXPECTED_OUTPUT = 'MISSING_EXPECTED_OUTPUT',
  OUTPUT_MISMATCH = 'OUTPUT_MISMATCH',
  NONZERO_EXIT = 'NONZERO_EXIT',
  UNEXPECTED_SUCCESS = 'UNEXPECTED_SUCCESS',
  ERROR_PATTERN_MISMATCH = 'ERROR_PATTERN_MISMATCH',
  INTERNAL = 'INTERNAL',
}

// Codes that abort the whole run; every other code is confined to one case.
const FATAL_CODES: ReadonlySet<HarnessErrorCode> = new Set([
  HarnessErrorCode.MALFORMED_SPEC,
  HarnessErrorCode.INVALID_CONFIG,
]);

export class HarnessError extends Error {
  readonly code: HarnessErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: HarnessErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'HarnessError';
    this.code = code;
    this.context = context;
  }

  get fatal(): boolean {
    return FATAL_CODES.has(this.code);
  }
}

export function isHarnessError(err: unknown): err is HarnessError {
  return err instanceof HarnessError;
}
