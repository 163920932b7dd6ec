/**
 * Bounded, in-memory log of pipeline results.
 *
 * Node runs these synchronous methods to completion on one thread, so each
 * append/evict/read is atomic with respect to concurrent requests.
 */

import type { HistoryStats, PipelineResult } from '../types/models.js';
import { roundTo } from '../types/utils.js';

export class QueryHistoryLog {
  private entries: PipelineResult[] = [];

  constructor(private readonly maxHistory: number) {
    if (!Number.isInteger(maxHistory) || maxHistory < 1) {
      throw new RangeError(`maxHistory must be a positive integer, got ${maxHistory}`);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Append an entry, evicting the oldest ones beyond capacity.
   */
  record(entry: PipelineResult): void {
    this.entries.push(entry);
    if (this.entries.length > this.maxHistory) {
      this.entries.splice(0, this.entries.length - this.maxHistory);
    }
  }

  /**
   * The last `limit` entries in insertion order, or all of them.
   */
  recent(limit?: number): PipelineResult[] {
    if (limit === undefined) return [...this.entries];
    if (limit <= 0) return [];
    return this.entries.slice(-limit);
  }

  /**
   * Remove every entry and return how many there were.
   */
  clear(): number {
    const removed = this.entries.length;
    this.entries = [];
    return removed;
  }

  stats(): HistoryStats {
    const total = this.entries.length;
    if (total === 0) {
      return { total: 0, successful: 0, failed: 0, successRate: 0, avgProcessingTimeSeconds: 0 };
    }

    const successful = this.entries.filter((entry) => entry.success).length;
    const times = this.entries
      .map((entry) => entry.processingTimeSeconds)
      .filter((seconds) => Number.isFinite(seconds) && seconds >= 0);
    const avg = times.length > 0 ? times.reduce((sum, s) => sum + s, 0) / times.length : 0;

    return {
      total,
      successful,
      failed: total - successful,
      successRate: roundTo((successful / total) * 100, 1),
      avgProcessingTimeSeconds: roundTo(avg, 2),
    };
  }
}
