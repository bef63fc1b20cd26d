/**
 * Shared test doubles
 */

import { jest } from '@jest/globals';
import type { FirecrawlClient } from '../src/client/index.js';
import type { Logger, Metrics } from '../src/types/index.js';

export type LogCall = [string, Record<string, unknown> | undefined];

export function createMockLogger(): Logger & { calls: Record<'info' | 'warn' | 'error' | 'debug', LogCall[]> } {
  const calls: Record<'info' | 'warn' | 'error' | 'debug', LogCall[]> = {
    info: [],
    warn: [],
    error: [],
    debug: [],
  };
  return {
    calls,
    info: (msg, meta) => calls.info.push([msg, meta]),
    warn: (msg, meta) => calls.warn.push([msg, meta]),
    error: (msg, meta) => calls.error.push([msg, meta]),
    debug: (msg, meta) => calls.debug.push([msg, meta]),
  };
}

export interface MetricRecord {
  type: 'increment' | 'gauge' | 'timing';
  metric: string;
  value?: number;
  tags?: Record<string, string>;
}

export function createMockMetrics(): Metrics & { records: MetricRecord[] } {
  const records: MetricRecord[] = [];
  return {
    records,
    increment: (metric, tags) => records.push({ type: 'increment', metric, tags }),
    gauge: (metric, value, tags) => records.push({ type: 'gauge', metric, value, tags }),
    timing: (metric, value, tags) => records.push({ type: 'timing', metric, value, tags }),
  };
}

/**
 * Client whose five operations are jest mocks with empty results
 */
export function createMockClient() {
  return {
    scrape: jest.fn<FirecrawlClient['scrape']>().mockResolvedValue({}),
    crawl: jest
      .fn<FirecrawlClient['crawl']>()
      .mockResolvedValue({ status: 'completed', total: 0, completed: 0, data: [] }),
    map: jest.fn<FirecrawlClient['map']>().mockResolvedValue([]),
    extract: jest.fn<FirecrawlClient['extract']>().mockResolvedValue(undefined),
    search: jest.fn<FirecrawlClient['search']>().mockResolvedValue([]),
  };
}

export type MockClient = ReturnType<typeof createMockClient>;
