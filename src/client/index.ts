/**
 * Client Module
 *
 * The crawling service boundary. The loader only talks to the
 * FirecrawlClient interface; HttpFirecrawlClient is the default
 * implementation over the Firecrawl v1 REST API.
 *
 * Features:
 * - Scrape options builder (fallible, zod-validated)
 * - Async crawl and extract jobs polled to completion
 * - Crawl result pagination via `next`
 * - No retries: every failure surfaces to the caller
 *
 * Usage:
 * ```typescript
 * const client = createFirecrawlClient({ apiKey: 'fc-...', apiUrl: DEFAULT_API_URL });
 * const page = await client.scrape('https://example.com');
 * ```
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { z } from 'zod';
import { FirecrawlApiError } from '../errors/index.js';
import { defaultLogger, defaultMetrics, type Logger, type Metrics } from '../types/index.js';

// ============================================================================
// Scrape Options
// ============================================================================

export const SCRAPE_FORMATS = [
  'markdown',
  'html',
  'rawHtml',
  'links',
  'screenshot',
  'screenshot@fullPage',
  'json',
  'changeTracking',
] as const;

const ScrapeOptionsSchema = z
  .object({
    formats: z.array(z.enum(SCRAPE_FORMATS)).optional(),
    onlyMainContent: z.boolean().optional(),
    includeTags: z.array(z.string()).optional(),
    excludeTags: z.array(z.string()).optional(),
    headers: z.record(z.string()).optional(),
    waitFor: z.number().int().nonnegative().optional(),
    mobile: z.boolean().optional(),
    skipTlsVerification: z.boolean().optional(),
    timeout: z.number().int().positive().optional(),
    removeBase64Images: z.boolean().optional(),
    blockAds: z.boolean().optional(),
    proxy: z.enum(['basic', 'stealth', 'auto']).optional(),
    location: z
      .object({
        country: z.string().optional(),
        languages: z.array(z.string()).optional(),
      })
      .strict()
      .optional(),
    maxAge: z.number().int().nonnegative().optional(),
  })
  .strict();

/**
 * Per-page rendering and fetching options
 */
export type ScrapeOptions = z.infer<typeof ScrapeOptionsSchema>;

export type ScrapeOptionsResult =
  | { ok: true; options: ScrapeOptions }
  | { ok: false; issues: string[] };

/**
 * Build ScrapeOptions from a loosely-typed mapping.
 * Unknown keys and mistyped values are reported as issues, not thrown.
 */
export function buildScrapeOptions(raw: unknown): ScrapeOptionsResult {
  const parseResult = ScrapeOptionsSchema.safeParse(raw);
  if (!parseResult.success) {
    return {
      ok: false,
      issues: parseResult.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`),
    };
  }
  return { ok: true, options: parseResult.data };
}

// ============================================================================
// Service Result Types
// ============================================================================

/**
 * A scraped page as returned by scrape and crawl
 */
export interface ScrapeDocument {
  markdown?: string | null;
  html?: string | null;
  rawHtml?: string | null;
  links?: string[];
  screenshot?: string | null;
  json?: unknown;
  metadata?: Record<string, unknown> | null;
}

/**
 * A search hit; carries page content only when scrapeOptions were requested
 */
export interface SearchDocument extends ScrapeDocument {
  url: string;
  title?: string;
  description?: string;
}

export type JobStatus = 'scraping' | 'processing' | 'completed' | 'failed' | 'cancelled';

export interface CrawlResult {
  status: JobStatus;
  total: number;
  completed: number;
  data?: ScrapeDocument[];
}

export const CRAWL_OPTION_KEYS = [
  'maxDepth',
  'limit',
  'includePaths',
  'excludePaths',
  'allowExternalLinks',
  'allowBackwardLinks',
  'ignoreSitemap',
] as const;

/**
 * Crawl options in the service's own field names. Values are sent as the
 * caller gave them and checked by the service.
 */
export interface CrawlOptions {
  maxDepth?: unknown;
  limit?: unknown;
  includePaths?: unknown;
  excludePaths?: unknown;
  allowExternalLinks?: unknown;
  allowBackwardLinks?: unknown;
  ignoreSitemap?: unknown;
  /** Built ScrapeOptions, or the caller's value when it could not be built */
  scrapeOptions?: unknown;
}

/**
 * The five crawling service operations the loader depends on
 */
export interface FirecrawlClient {
  scrape(url: string, options?: ScrapeOptions): Promise<ScrapeDocument>;
  crawl(url: string, options?: CrawlOptions): Promise<CrawlResult>;
  map(url: string, params?: Record<string, unknown>): Promise<string[]>;
  extract(urls: string[], params?: Record<string, unknown>): Promise<unknown>;
  /** `query` is forwarded as given; a missing query is the service's to reject */
  search(query: unknown, params?: Record<string, unknown>): Promise<SearchDocument[]>;
}

// ============================================================================
// HTTP Client
// ============================================================================

export interface ClientConfig {
  /** Firecrawl API key; requests fail with FirecrawlApiError without one */
  apiKey?: string;
  apiUrl: string;
  /** Request timeout in milliseconds (default: 60000) */
  timeout?: number;
  /** Delay between job status polls (default: 2000) */
  pollIntervalMs?: number;
  /** Give up on a crawl or extract job after this long (default: 300000) */
  maxWaitMs?: number;
  /** Transport override, passed to axios */
  adapter?: AxiosAdapter;
}

export type ClientFactory = (config: ClientConfig, logger: Logger, metrics: Metrics) => FirecrawlClient;

const DEFAULT_TIMEOUT_MS = 60000;
const DEFAULT_POLL_INTERVAL_MS = 2000;
const DEFAULT_MAX_WAIT_MS = 300000;

interface ApiEnvelope {
  success?: boolean;
  error?: string;
}

interface ScrapeResponse extends ApiEnvelope {
  data?: ScrapeDocument;
}

interface JobStartResponse extends ApiEnvelope {
  id?: string;
  url?: string;
}

interface CrawlStatusResponse extends ApiEnvelope {
  status: JobStatus;
  total: number;
  completed: number;
  data?: ScrapeDocument[];
  next?: string | null;
}

interface MapResponse extends ApiEnvelope {
  links?: string[];
}

interface ExtractResponse extends ApiEnvelope {
  id?: string;
  status?: JobStatus;
  data?: unknown;
}

interface SearchResponse extends ApiEnvelope {
  data?: SearchDocument[];
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class HttpFirecrawlClient implements FirecrawlClient {
  private http: AxiosInstance;
  private apiKey: string | undefined;
  private pollIntervalMs: number;
  private maxWaitMs: number;
  private logger: Logger;
  private metrics: Metrics;

  constructor(config: ClientConfig, logger: Logger = defaultLogger, metrics: Metrics = defaultMetrics) {
    this.apiKey = config.apiKey;
    this.pollIntervalMs = config.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.maxWaitMs = config.maxWaitMs ?? DEFAULT_MAX_WAIT_MS;
    this.logger = logger;
    this.metrics = metrics;
    this.http = axios.create({
      baseURL: config.apiUrl,
      timeout: config.timeout ?? DEFAULT_TIMEOUT_MS,
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${config.apiKey ?? ''}`,
      },
      ...(config.adapter ? { adapter: config.adapter } : {}),
    });
  }

  async scrape(url: string, options?: ScrapeOptions): Promise<ScrapeDocument> {
    const response = await this.post<ScrapeResponse>('/v1/scrape', { url, ...options }, 'Scrape');
    return response.data ?? {};
  }

  async crawl(url: string, options?: CrawlOptions): Promise<CrawlResult> {
    const started = await this.post<JobStartResponse>('/v1/crawl', { url, ...options }, 'Crawl start');
    if (!started.id) {
      throw new FirecrawlApiError('Crawl start failed: no job id returned');
    }
    const crawlId = started.id;
    const deadline = Date.now() + this.maxWaitMs;

    let status = await this.get<CrawlStatusResponse>(`/v1/crawl/${crawlId}`, 'Crawl status');
    while (status.status !== 'completed') {
      this.logger.info('Crawl progress', {
        crawlId,
        status: status.status,
        completed: status.completed,
        total: status.total,
      });
      this.metrics.gauge('client.crawl.progress', status.completed, { crawl_id: crawlId });

      if (status.status === 'failed' || status.status === 'cancelled') {
        throw new FirecrawlApiError(`Crawl ${status.status}: ${status.error || 'Unknown error'}`, {
          crawlId,
        });
      }
      if (Date.now() > deadline) {
        throw new FirecrawlApiError(`Crawl timed out after ${this.maxWaitMs}ms`, { crawlId });
      }

      await sleep(this.pollIntervalMs);
      status = await this.get<CrawlStatusResponse>(`/v1/crawl/${crawlId}`, 'Crawl status');
    }

    // Large crawls are paginated; `next` is an absolute URL.
    const data = [...(status.data ?? [])];
    let next = status.next;
    while (next) {
      const page = await this.get<CrawlStatusResponse>(next, 'Crawl page');
      data.push(...(page.data ?? []));
      next = page.next;
    }

    return {
      status: status.status,
      total: status.total,
      completed: status.completed,
      data,
    };
  }

  async map(url: string, params: Record<string, unknown> = {}): Promise<string[]> {
    const response = await this.post<MapResponse>('/v1/map', { url, ...params }, 'Map');
    return response.links ?? [];
  }

  async extract(urls: string[], params: Record<string, unknown> = {}): Promise<unknown> {
    const started = await this.post<ExtractResponse>('/v1/extract', { urls, ...params }, 'Extract start');
    if (!started.id) {
      return started.data;
    }
    const extractId = started.id;
    const deadline = Date.now() + this.maxWaitMs;

    let status = await this.get<ExtractResponse>(`/v1/extract/${extractId}`, 'Extract status');
    while (status.status !== 'completed') {
      this.logger.info('Extract progress', { extractId, status: status.status });

      if (status.status === 'failed' || status.status === 'cancelled') {
        throw new FirecrawlApiError(`Extract ${status.status}: ${status.error || 'Unknown error'}`, {
          extractId,
        });
      }
      if (Date.now() > deadline) {
        throw new FirecrawlApiError(`Extract timed out after ${this.maxWaitMs}ms`, { extractId });
      }

      await sleep(this.pollIntervalMs);
      status = await this.get<ExtractResponse>(`/v1/extract/${extractId}`, 'Extract status');
    }

    return status.data;
  }

  async search(query: unknown, params: Record<string, unknown> = {}): Promise<SearchDocument[]> {
    const response = await this.post<SearchResponse>('/v1/search', { ...params, query }, 'Search');
    return response.data ?? [];
  }

  private async post<T extends ApiEnvelope>(path: string, body: Record<string, unknown>, context: string): Promise<T> {
    this.requireApiKey();
    this.logger.debug(`${context} request`, { path });
    const response = await this.http.post<T>(path, body);
    return this.unwrap(response.data, context);
  }

  private async get<T extends ApiEnvelope>(path: string, context: string): Promise<T> {
    this.requireApiKey();
    this.logger.debug(`${context} request`, { path });
    const response = await this.http.get<T>(path);
    return this.unwrap(response.data, context);
  }

  private unwrap<T extends ApiEnvelope>(data: T | null | undefined, context: string): T {
    if (!data) {
      throw new FirecrawlApiError(`${context} failed: empty response body`);
    }
    if (data.success === false) {
      throw new FirecrawlApiError(`${context} failed: ${data.error || 'Unknown error'}`);
    }
    return data;
  }

  private requireApiKey(): void {
    if (!this.apiKey) {
      throw new FirecrawlApiError('FIRECRAWL_API_KEY is required. Set it in config or environment variable.');
    }
  }
}

/**
 * Default client factory
 */
export const createFirecrawlClient: ClientFactory = (config, logger, metrics) =>
  new HttpFirecrawlClient(config, logger, metrics);
