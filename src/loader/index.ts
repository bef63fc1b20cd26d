/**
 * Loader Module
 *
 * FirecrawlLoader maps one (url, mode, params) triple onto exactly one
 * crawling service call and streams the results back as NormalizedRecords.
 *
 * Modes:
 * - scrape: single page
 * - crawl: the page and its reachable sub pages
 * - map: related links, one record per link
 * - extract: structured data from the page, as one serialized record
 * - search: web search, `params.query` is the query
 *
 * Usage:
 * ```typescript
 * const loader = new FirecrawlLoader({ url: 'https://example.com', mode: 'crawl', params: { limit: 10 } });
 * for await (const record of loader.lazyLoad()) {
 *   console.log(record.content.slice(0, 100), record.metadata);
 * }
 * ```
 */

import {
  CRAWL_OPTION_KEYS,
  buildScrapeOptions,
  createFirecrawlClient,
  type ClientFactory,
  type CrawlOptions,
  type FirecrawlClient,
  type ScrapeOptions,
  type ScrapeOptionsResult,
} from '../client/index.js';
import { resolveLoaderConfig } from '../config/index.js';
import {
  DependencyUnavailableError,
  InvalidArgumentError,
  errorMessage,
} from '../errors/index.js';
import { normalizeResults, type ModeResults } from '../normalizer/index.js';
import {
  LOADER_MODES,
  defaultLogger,
  defaultMetrics,
  type LoaderConfig,
  type LoaderMode,
  type Logger,
  type Metrics,
  type NormalizedRecord,
} from '../types/index.js';

// ============================================================================
// Options
// ============================================================================

/**
 * Collaborators of a loader; none of them affect which call is made
 */
export interface LoaderDependencies {
  /** Ready-made client; skips clientFactory */
  client?: FirecrawlClient;
  /** Builds the client from the resolved apiKey and apiUrl (default: HTTP client) */
  clientFactory?: ClientFactory;
  logger?: Logger;
  metrics?: Metrics;
  /** Environment consulted for FIRECRAWL_API_KEY and FIRECRAWL_API_URL */
  env?: NodeJS.ProcessEnv;
}

export interface LoaderOptions extends LoaderDependencies {
  url: string;
  apiKey?: string;
  apiUrl?: string;
  /** default: 'crawl' */
  mode?: LoaderMode;
  params?: Record<string, unknown>;
}

/**
 * Extraction results are emitted as a single string
 */
export function stringifyExtractResult(data: unknown): string {
  if (data === undefined || data === null) {
    return '';
  }
  return typeof data === 'string' ? data : JSON.stringify(data);
}

// ============================================================================
// Loader
// ============================================================================

export class FirecrawlLoader {
  readonly config: LoaderConfig;
  private client: FirecrawlClient;
  private logger: Logger;
  private metrics: Metrics;

  constructor(options: LoaderOptions) {
    const { client, clientFactory, logger, metrics, env, ...input } = options;
    this.config = resolveLoaderConfig(input, env);
    this.logger = logger ?? defaultLogger;
    this.metrics = metrics ?? defaultMetrics;
    this.client = client ?? this.createClient(clientFactory ?? createFirecrawlClient);
  }

  /**
   * Build a loader from untyped input such as parsed JSON
   */
  static fromInput(input: unknown, dependencies: LoaderDependencies = {}): FirecrawlLoader {
    const config = resolveLoaderConfig(input, dependencies.env);
    return new FirecrawlLoader({ ...dependencies, ...config, params: { ...config.params } });
  }

  get mode(): LoaderMode {
    return this.config.mode;
  }

  /**
   * Make the service call, then yield records in service order.
   * Any failure aborts the load and is rethrown as-is.
   */
  async *lazyLoad(): AsyncGenerator<NormalizedRecord, void, undefined> {
    const { mode, url } = this.config;
    const tags = { mode };
    const startTime = Date.now();

    this.logger.info('Starting load', { mode, url });
    this.metrics.increment('loader.started', tags);

    let results: ModeResults;
    try {
      results = await this.fetchResults();
    } catch (error) {
      this.metrics.increment('loader.failed', tags);
      this.logger.error('Load failed', { mode, url, error: errorMessage(error) });
      throw error;
    }

    let emitted = 0;
    for (const record of normalizeResults(results)) {
      emitted++;
      yield record;
    }

    const skipped = results.items.length - emitted;
    const duration = Date.now() - startTime;
    this.metrics.gauge('loader.records', emitted, tags);
    this.metrics.gauge('loader.skipped', skipped, tags);
    this.metrics.timing('loader.duration', duration, tags);
    this.logger.info('Load completed', { mode, records: emitted, skipped, durationMs: duration });
  }

  /**
   * Eager counterpart of lazyLoad; same records, same order
   */
  async load(): Promise<NormalizedRecord[]> {
    const records: NormalizedRecord[] = [];
    for await (const record of this.lazyLoad()) {
      records.push(record);
    }
    return records;
  }

  private createClient(factory: ClientFactory): FirecrawlClient {
    const { apiKey, apiUrl } = this.config;
    try {
      return factory({ apiKey, apiUrl }, this.logger, this.metrics);
    } catch (error) {
      throw new DependencyUnavailableError(
        `Firecrawl client could not be created: ${errorMessage(error)}`,
        error
      );
    }
  }

  private async fetchResults(): Promise<ModeResults> {
    const { mode, url, params } = this.config;

    switch (mode) {
      case 'scrape': {
        const options = this.scrapeModeOptions();
        this.logger.debug('Dispatching scrape', { url, hasScrapeOptions: options !== undefined });
        const page = await this.client.scrape(url, options);
        return { mode, items: [page] };
      }
      case 'crawl': {
        this.requireUrl(mode);
        const options = this.crawlOptions();
        this.logger.debug('Dispatching crawl', { url, options });
        const response = await this.client.crawl(url, options);
        return { mode, items: response.data ?? [] };
      }
      case 'map': {
        this.requireUrl(mode);
        this.logger.debug('Dispatching map', { url });
        const links = await this.client.map(url, { ...params });
        return { mode, items: links };
      }
      case 'extract': {
        this.requireUrl(mode);
        this.logger.debug('Dispatching extract', { url });
        const data = await this.client.extract([url], { ...params });
        return { mode, items: [stringifyExtractResult(data)] };
      }
      case 'search': {
        const query = params['query'];
        this.logger.debug('Dispatching search', { query });
        const hits = await this.client.search(query, { ...params });
        return { mode, items: hits };
      }
      default: {
        const unknownMode: never = mode;
        throw new InvalidArgumentError(
          `Invalid mode '${String(unknownMode)}'. Allowed: ${LOADER_MODES.map((m) => `'${m}'`).join(', ')}.`
        );
      }
    }
  }

  private requireUrl(mode: LoaderMode): void {
    if (!this.config.url) {
      throw new InvalidArgumentError(`URL is required for ${mode} mode`, { mode });
    }
  }

  private scrapeOptionsResult(): ScrapeOptionsResult | undefined {
    const { params } = this.config;
    if (!('scrapeOptions' in params)) {
      return undefined;
    }
    return buildScrapeOptions(params['scrapeOptions']);
  }

  /**
   * Scrape mode omits scrapeOptions that cannot be built
   */
  private scrapeModeOptions(): ScrapeOptions | undefined {
    const result = this.scrapeOptionsResult();
    if (!result) {
      return undefined;
    }
    if (!result.ok) {
      this.logger.warn('Ignoring invalid scrapeOptions', { issues: result.issues });
      return undefined;
    }
    return result.options;
  }

  /**
   * Copy the recognized crawl params as given; the service validates them.
   * scrapeOptions that cannot be built are forwarded as the raw value.
   */
  private crawlOptions(): CrawlOptions {
    const { params } = this.config;
    const options: CrawlOptions = {};
    for (const key of CRAWL_OPTION_KEYS) {
      if (key in params) {
        options[key] = params[key];
      }
    }

    const scrapeOptions = this.scrapeOptionsResult();
    if (scrapeOptions?.ok) {
      options.scrapeOptions = scrapeOptions.options;
    } else if (scrapeOptions) {
      this.logger.warn('Passing scrapeOptions through unvalidated', { issues: scrapeOptions.issues });
      options.scrapeOptions = params['scrapeOptions'];
    }

    return options;
  }
}
