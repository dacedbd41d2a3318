export interface FetchSuccess {
  ok: true;
  /** URL as requested. */
  url: string;
  /** URL of the response after following redirects. */
  finalUrl: string;
  status: number;
  contentType: string;
  body: string;
}

export interface FetchFailure {
  ok: false;
  url: string;
  error: string;
  /** Status of the last response, when one was received. */
  status: number | null;
}

export type FetchResult = FetchSuccess | FetchFailure;

export interface PageFetcher {
  fetch(url: string): Promise<FetchResult>;
}

export interface PageFetcherOptions {
  userAgent?: string;
  timeoutMs?: number;
  maxRedirects?: number;
  maxContentLength?: number;
}
