import { describe, it, expect } from 'vitest';
import { QueryHistoryLog } from './history.js';
import type { PipelineResult } from '../types/models.js';

function entry(question: string, success: boolean, seconds: number): PipelineResult {
  const base = {
    question,
    schemaDocumentsUsed: ['orders'],
    processingTimeSeconds: seconds,
    timestamp: '2026-01-01T00:00:00.000Z',
  };
  return success
    ? { ...base, success: true, sqlQuery: 'SELECT 1', rows: [], columns: [], analysis: '' }
    : { ...base, success: false, errorKind: 'invalid-sql', errorMessage: 'bad' };
}

describe('QueryHistoryLog', () => {
  it('evicts the oldest entries beyond capacity', () => {
    const log = new QueryHistoryLog(3);
    for (let i = 0; i < 8; i++) {
      log.record(entry(`q${i}`, true, 1));
    }

    expect(log.size).toBe(3);
    expect(log.recent().map((e) => e.question)).toEqual(['q5', 'q6', 'q7']);
  });

  it('returns the last entries in insertion order', () => {
    const log = new QueryHistoryLog(10);
    ['a', 'b', 'c'].forEach((q) => log.record(entry(q, true, 1)));

    expect(log.recent(2).map((e) => e.question)).toEqual(['b', 'c']);
    expect(log.recent(10).map((e) => e.question)).toEqual(['a', 'b', 'c']);
    expect(log.recent(0)).toEqual([]);
  });

  it('returns a copy', () => {
    const log = new QueryHistoryLog(5);
    log.record(entry('a', true, 1));
    log.recent().pop();
    expect(log.size).toBe(1);
  });

  it('clears and reports how many entries were removed', () => {
    const log = new QueryHistoryLog(5);
    log.record(entry('a', true, 1));
    log.record(entry('b', false, 1));

    expect(log.clear()).toBe(2);
    expect(log.size).toBe(0);
  });

  it('reports zeros when empty', () => {
    expect(new QueryHistoryLog(5).stats()).toEqual({
      total: 0,
      successful: 0,
      failed: 0,
      successRate: 0,
      avgProcessingTimeSeconds: 0,
    });
  });

  it('rounds success rate and average time', () => {
    const log = new QueryHistoryLog(5);
    log.record(entry('a', true, 1));
    log.record(entry('b', true, 1.5));
    log.record(entry('c', false, 1));

    expect(log.stats()).toEqual({
      total: 3,
      successful: 2,
      failed: 1,
      successRate: 66.7,
      avgProcessingTimeSeconds: 1.17,
    });
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new QueryHistoryLog(0)).toThrow(RangeError);
  });
});
