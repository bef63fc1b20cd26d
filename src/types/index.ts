/**
 * Core type definitions for crawl-loader
 *
 * This module exports the shared types used across the loader, client and
 * normalizer modules.
 */

// ============================================================================
// Modes
// ============================================================================

/**
 * Loader modes, one per crawling service operation
 */
export const LOADER_MODES = ['scrape', 'crawl', 'map', 'extract', 'search'] as const;

export type LoaderMode = (typeof LOADER_MODES)[number];

// ============================================================================
// Records
// ============================================================================

/**
 * Free-form metadata attached to a record
 */
export type Metadata = Record<string, unknown>;

/**
 * Uniform output unit of a load.
 * `content` is never empty.
 */
export interface NormalizedRecord {
  content: string;
  metadata: Metadata;
}

/**
 * Resolved loader configuration. Frozen after resolution.
 */
export interface LoaderConfig {
  readonly url: string;
  readonly apiKey: string | undefined;
  readonly apiUrl: string;
  readonly mode: LoaderMode;
  readonly params: Readonly<Record<string, unknown>>;
}

// ============================================================================
// Observability
// ============================================================================

/**
 * Logger interface for observability
 */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Metrics interface for observability
 */
export interface Metrics {
  increment(metric: string, tags?: Record<string, string>): void;
  gauge(metric: string, value: number, tags?: Record<string, string>): void;
  timing(metric: string, value: number, tags?: Record<string, string>): void;
}

/**
 * Default console logger implementation
 */
export const defaultLogger: Logger = {
  info: (msg, meta) => console.log(`[INFO] ${msg}`, meta ? JSON.stringify(meta) : ''),
  warn: (msg, meta) => console.warn(`[WARN] ${msg}`, meta ? JSON.stringify(meta) : ''),
  error: (msg, meta) => console.error(`[ERROR] ${msg}`, meta ? JSON.stringify(meta) : ''),
  debug: (msg, meta) => console.debug(`[DEBUG] ${msg}`, meta ? JSON.stringify(meta) : ''),
};

/**
 * Default no-op metrics implementation
 */
export const defaultMetrics: Metrics = {
  increment: () => {},
  gauge: () => {},
  timing: () => {},
};
