export {
  MixedContentScanner,
  scan,
  DEFAULT_MAX_CRAWL_DEPTH,
  DEFAULT_MAX_CONCURRENCY,
} from './crawler/engine.js';
export { HttpPageFetcher, type HttpPageFetcherDeps } from './fetcher/client.js';
export { HtmlDocument, type ElementView } from './parsing/document.js';
export { MixedContentInspector, MIXED_CONTENT_TAGS } from './inspection/mixedContent.js';
export { LinkExtractor, WEB_PAGE_EXTENSIONS } from './extraction/linkExtractor.js';
export { createConsoleReporter, createJsonLinesReporter, formatMixedContentReport } from './reporting/index.js';
export { loadScanConfig, parseScanConfig } from './config.js';
export { ConfigError, InvalidSeedUrlError } from './errors.js';
export * from './schemas/index.js';
export type * from './types/index.js';
