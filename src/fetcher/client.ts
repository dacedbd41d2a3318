import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import type { Logger } from 'winston';
import { FetcherConfigSchema, type FetcherConfig } from '../schemas/index.js';
import { ConfigError } from '../errors.js';
import { createSilentLogger } from '../utils/logger.js';
import type {
  FetchFailure,
  FetchResult,
  FetchSuccess,
  PageFetcher,
  PageFetcherOptions,
} from '../types/index.js';

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export interface HttpPageFetcherDeps {
  http?: AxiosInstance;
  logger?: Logger;
}

function headerValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === 'string').join(', ');
  return '';
}

/**
 * GETs pages over axios. Redirects are followed here rather than by axios
 * so the final URL of every response is known. Never rejects: transport
 * errors, timeouts and non-200 responses come back as failures.
 */
export class HttpPageFetcher implements PageFetcher {
  private readonly config: FetcherConfig;
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(options: PageFetcherOptions = {}, deps: HttpPageFetcherDeps = {}) {
    const parsed = FetcherConfigSchema.safeParse(options);
    if (!parsed.success) {
      throw ConfigError.fromZodError(parsed.error);
    }
    this.config = parsed.data;
    this.http = deps.http ?? axios.create();
    this.logger = deps.logger ?? createSilentLogger();
  }

  getRequestConfig(): AxiosRequestConfig {
    return {
      method: 'GET',
      timeout: this.config.timeoutMs,
      responseType: 'text',
      responseEncoding: 'utf8',
      maxRedirects: 0,
      maxContentLength: this.config.maxContentLength,
      // Redirects and error statuses are inspected below, not thrown
      validateStatus: () => true,
      headers: {
        'User-Agent': this.config.userAgent,
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      },
    };
  }

  async fetch(url: string): Promise<FetchResult> {
    let currentUrl = url;
    let lastStatus: number | null = null;

    try {
      for (let hop = 0; hop <= this.config.maxRedirects; hop++) {
        this.logger.debug(`GET ${currentUrl}`, { hop });
        const response = await this.http.request<string>({ ...this.getRequestConfig(), url: currentUrl });
        lastStatus = response.status;

        if (REDIRECT_STATUSES.has(response.status)) {
          const location = headerValue(response.headers['location']);
          if (!location) {
            return this.failure(url, `HTTP ${response.status} without Location header`, response.status);
          }
          currentUrl = new URL(location, currentUrl).href;
          continue;
        }

        if (response.status !== 200) {
          return this.failure(url, `HTTP ${response.status}`, response.status);
        }

        const result: FetchSuccess = {
          ok: true,
          url,
          finalUrl: currentUrl,
          status: response.status,
          contentType: headerValue(response.headers['content-type']),
          body: typeof response.data === 'string' ? response.data : '',
        };
        return result;
      }

      return this.failure(url, `Exceeded ${this.config.maxRedirects} redirects`, lastStatus);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      return this.failure(url, errorMessage, lastStatus);
    }
  }

  private failure(url: string, error: string, status: number | null): FetchFailure {
    return { ok: false, url, error, status };
  }
}
