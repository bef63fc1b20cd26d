/**
 * Config Module
 *
 * Resolves caller input and environment defaults into a frozen LoaderConfig.
 *
 * Usage:
 * ```typescript
 * const config = resolveLoaderConfig({ url: 'https://example.com', mode: 'scrape' });
 * ```
 */

import { z } from 'zod';
import { InvalidArgumentError } from '../errors/index.js';
import { LOADER_MODES, type LoaderConfig, type LoaderMode } from '../types/index.js';

export const DEFAULT_API_URL = 'https://api.firecrawl.dev';
export const API_KEY_ENV = 'FIRECRAWL_API_KEY';
export const API_URL_ENV = 'FIRECRAWL_API_URL';
export const DEFAULT_MODE: LoaderMode = 'crawl';

/**
 * Raw loader input. Validated at runtime, so JavaScript callers and parsed
 * JSON get the same checks as typed callers.
 */
const LoaderInputSchema = z.object({
  url: z.string(),
  apiKey: z.string().optional(),
  apiUrl: z.string().optional(),
  mode: z.string().optional(),
  params: z.record(z.unknown()).optional(),
});

function isLoaderMode(value: string): value is LoaderMode {
  return (LOADER_MODES as readonly string[]).includes(value);
}

/**
 * Resolve loader input into a frozen config.
 *
 * apiKey falls back to FIRECRAWL_API_KEY; a missing key is left for the
 * client to report. apiUrl falls back to FIRECRAWL_API_URL, then the public
 * endpoint.
 */
export function resolveLoaderConfig(
  input: unknown,
  env: NodeJS.ProcessEnv = process.env
): LoaderConfig {
  const parseResult = LoaderInputSchema.safeParse(input);

  if (!parseResult.success) {
    const errors = parseResult.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new InvalidArgumentError('Loader input validation failed', { errors });
  }

  const raw = parseResult.data;
  const mode = raw.mode ?? DEFAULT_MODE;

  if (!isLoaderMode(mode)) {
    throw new InvalidArgumentError(
      `Invalid mode '${mode}'. Allowed: ${LOADER_MODES.map((m) => `'${m}'`).join(', ')}.`,
      { mode }
    );
  }

  if (!raw.url) {
    throw new InvalidArgumentError('Url must be provided', { mode });
  }

  return Object.freeze({
    url: raw.url,
    apiKey: raw.apiKey || env[API_KEY_ENV] || undefined,
    apiUrl: raw.apiUrl || env[API_URL_ENV] || DEFAULT_API_URL,
    mode,
    params: Object.freeze({ ...(raw.params ?? {}) }),
  });
}
