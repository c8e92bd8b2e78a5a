import { HarnessError, HarnessErrorCode, isHarnessError } from '../../../src/shared/errors.js';

describe('HarnessError', () => {
  it('creates error with code and message', () => {
    const err = new HarnessError(HarnessErrorCode.MALFORMED_SPEC, 'Test #1: name is required');
    expect(err.code).toBe(HarnessErrorCode.MALFORMED_SPEC);
    expect(err.message).toBe('Test #1: name is required');
    expect(err.name).toBe('HarnessError');
    expect(err instanceof Error).toBe(true);
  });

  it('includes optional context', () => {
    const err = new HarnessError(HarnessErrorCode.LAUNCH_FAILURE, 'Failed to launch bcvm', { errno: 'ENOENT' });
    expect(err.context).toEqual({ errno: 'ENOENT' });
  });

  it('treats only suite and config errors as fatal', () => {
    expect(new HarnessError(HarnessErrorCode.MALFORMED_SPEC, 'x').fatal).toBe(true);
    expect(new HarnessError(HarnessErrorCode.INVALID_CONFIG, 'x').fatal).toBe(true);
    expect(new HarnessError(HarnessErrorCode.LAUNCH_FAILURE, 'x').fatal).toBe(false);
    expect(new HarnessError(HarnessErrorCode.PROCESS_TIMEOUT, 'x').fatal).toBe(false);
    expect(new HarnessError(HarnessErrorCode.INTERNAL, 'x').fatal).toBe(false);
  });

  it('isHarnessError narrows only HarnessError instances', () => {
    expect(isHarnessError(new HarnessError(HarnessErrorCode.NONZERO_EXIT, 'x'))).toBe(true);
    expect(isHarnessError(new Error('plain'))).toBe(false);
    expect(isHarnessError('MALFORMED_SPEC')).toBe(false);
  });
});
