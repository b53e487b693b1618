import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  DEFAULT_FAILURE_MESSAGE,
  buildResult,
  failureResult,
  resultFromVerdict,
  successResult,
} from '../src/result/result.js';
import { classify } from '../src/classifier/classifier.js';
import type { OutcomeRecord, Table } from '../src/types.js';
import { makeTable } from './helpers/tables.js';

const NOW = new Date('2026-10-19T08:30:05Z');

function expectConsistent(record: OutcomeRecord): void {
  expect(record.success).toBe(record.exitCode === 0);
  if (record.isTimeout) {
    expect(record.success).toBe(false);
    expect(record.exitCode).toBe(2);
  }
  if (!record.success) {
    expect(record.payload).toBeUndefined();
    expect(record.checksum).toBeUndefined();
    expect(record.message).not.toBe('');
  }
}

describe('buildResult', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('builds a success record without a checksum unless supplied', () => {
    const payload = makeTable(5);
    const record = buildResult({ success: true, payload, exitCode: 0, message: 'OK' });

    expect(record.success).toBe(true);
    expect(record.exitCode).toBe(0);
    expect(record.isTimeout).toBe(false);
    expect(record.message).toBe('OK');
    expect(record.payload).toBe(payload);
    expect(record.checksum).toBeUndefined();
    expect('checksum' in record).toBe(false);
    expect(record.createdAt).toEqual(NOW);
  });

  it('keeps a supplied checksum on success', () => {
    const record = buildResult({ success: true, payload: makeTable(3), checksum: 'abc123' });
    expect(record.checksum).toBe('abc123');
  });

  it('builds a timeout failure record', () => {
    const record = buildResult({
      success: false,
      exitCode: 2,
      message: 'Server timeout',
      isTimeout: true,
    });

    expect(record.success).toBe(false);
    expect(record.exitCode).toBe(2);
    expect(record.isTimeout).toBe(true);
    expect(record.payload).toBeUndefined();
  });

  it('forces exit code 0 and no timeout on success', () => {
    const record = buildResult({ success: true, exitCode: 1, isTimeout: true });
    expect(record.exitCode).toBe(0);
    expect(record.isTimeout).toBe(false);
  });

  it('drops payload and checksum from failures and fills an empty message', () => {
    const record = buildResult({
      success: false,
      payload: makeTable(2),
      checksum: 'abc123',
      exitCode: 0,
    });

    expect(record.exitCode).toBe(1);
    expect(record.payload).toBeUndefined();
    expect(record.checksum).toBeUndefined();
    expect(record.message).toBe(DEFAULT_FAILURE_MESSAGE);
  });

  it('ties the timeout flag to exit code 2 in both directions', () => {
    expect(buildResult({ success: false, exitCode: 2, message: 'x' }).isTimeout).toBe(true);
    expect(buildResult({ success: false, exitCode: 1, isTimeout: true, message: 'x' }).exitCode).toBe(2);
  });

  it('never produces a contradictory record', () => {
    const payload: Table = makeTable(1);
    for (const success of [true, false]) {
      for (const exitCode of [0, 1, 2, 7]) {
        for (const isTimeout of [true, false]) {
          expectConsistent(buildResult({ success, payload, exitCode, isTimeout, checksum: 'c', message: '' }));
        }
      }
    }
  });

  it('freezes the record', () => {
    const record = buildResult({ success: true });
    expect(Object.isFrozen(record)).toBe(true);
  });
});

describe('successResult', () => {
  it('passes the payload, message and checksum through', () => {
    const payload = makeTable(4);
    const record = successResult(payload, { message: 'Downloaded 4 rows', checksum: 'ff00' });

    expect(record).toMatchObject({
      success: true,
      exitCode: 0,
      message: 'Downloaded 4 rows',
      checksum: 'ff00',
      isTimeout: false,
    });
    expect(record.payload).toBe(payload);
  });

  it('allows a success without payload', () => {
    const record = successResult(undefined, { message: 'Data unchanged' });
    expect(record.success).toBe(true);
    expect(record.payload).toBeUndefined();
  });
});

describe('failureResult', () => {
  it('derives everything from the verdict', () => {
    const record = failureResult('Gateway Timeout (504)');
    expect(record).toMatchObject({
      success: false,
      exitCode: 2,
      message: 'Server timeout: Gateway Timeout (504)',
      isTimeout: true,
    });
  });

  it('classifies absent error text as unknown', () => {
    const record = failureResult(null);
    expect(record.exitCode).toBe(1);
    expect(record.isTimeout).toBe(false);
    expect(record.message).toBe('API error: Unknown error');
  });

  it('matches resultFromVerdict for the same text', () => {
    const text = 'Could not resolve host: api.example.com';
    const fromText = failureResult(text);
    const fromVerdict = resultFromVerdict(classify(text));

    expect(fromText.exitCode).toBe(fromVerdict.exitCode);
    expect(fromText.message).toBe(fromVerdict.message);
    expect(fromText.isTimeout).toBe(fromVerdict.isTimeout);
  });
});
