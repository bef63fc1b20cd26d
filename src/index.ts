/**
 * crawl-loader - Main Entry Point
 *
 * Loads web content through the Firecrawl API as uniform
 * { content, metadata } records.
 *
 * Architecture:
 * - loader dispatches one service call per load, chosen by mode
 * - client is the service boundary (interface + axios implementation)
 * - normalizer turns per-mode results into records
 */

// Core Types
export {
  LOADER_MODES,
  defaultLogger,
  defaultMetrics,
  type LoaderMode,
  type LoaderConfig,
  type Metadata,
  type NormalizedRecord,
  type Logger,
  type Metrics,
} from './types/index.js';

// Errors
export {
  LoaderError,
  InvalidArgumentError,
  DependencyUnavailableError,
  FirecrawlApiError,
  type ErrorCode,
} from './errors/index.js';

// Config
export {
  resolveLoaderConfig,
  DEFAULT_API_URL,
  API_KEY_ENV,
  API_URL_ENV,
  DEFAULT_MODE,
} from './config/index.js';

// Client
export {
  HttpFirecrawlClient,
  createFirecrawlClient,
  buildScrapeOptions,
  SCRAPE_FORMATS,
  CRAWL_OPTION_KEYS,
  type FirecrawlClient,
  type ClientConfig,
  type ClientFactory,
  type ScrapeOptions,
  type ScrapeOptionsResult,
  type ScrapeDocument,
  type SearchDocument,
  type CrawlOptions,
  type CrawlResult,
  type JobStatus,
} from './client/index.js';

// Normalizer
export {
  normalizeResults,
  resolvePageContent,
  resolvePageMetadata,
  type ModeResults,
} from './normalizer/index.js';

// Loader
export {
  FirecrawlLoader,
  stringifyExtractResult,
  type LoaderOptions,
  type LoaderDependencies,
} from './loader/index.js';
