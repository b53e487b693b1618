import { describe, expect, it } from 'vitest';

import { ErrorCategory, ExitCode, classify, failureResult, formatSummary } from '../src/api.js';

describe('public API', () => {
  it('exposes the category and exit code tables', () => {
    expect(Object.values(ErrorCategory)).toEqual(['timeout', 'connectivity', 'http', 'unknown']);
    expect(ExitCode).toEqual({ SUCCESS: 0, FAILURE: 1, TIMEOUT: 2 });
  });

  it('wires classifier, builder and summary together', () => {
    const record = failureResult('network unreachable');

    expect(classify('network unreachable').category).toBe(ErrorCategory.CONNECTIVITY);
    expect(formatSummary(record, { timeZone: 'UTC' }).split('\n').slice(0, 3)).toEqual([
      'Download Result: FAILED',
      '  Exit code: 1',
      '  Message: Network connectivity issue: network unreachable',
    ]);
  });
});
