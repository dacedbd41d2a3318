import pLimit from 'p-limit';
import type { Logger } from 'winston';
import { HttpPageFetcher } from '../fetcher/client.js';
import { HtmlDocument } from '../parsing/document.js';
import { MixedContentInspector } from '../inspection/mixedContent.js';
import { LinkExtractor } from '../extraction/linkExtractor.js';
import { InvalidSeedUrlError } from '../errors.js';
import { createSilentLogger } from '../utils/logger.js';
import { isSameNetloc, isValidSeedUrl } from '../utils/url.js';
import type {
  LevelSummary,
  LinkResult,
  PageFetcher,
  PageOutcome,
  Reporter,
  ScanResult,
  ScannerOptions,
  StopReason,
} from '../types/index.js';

export const DEFAULT_MAX_CRAWL_DEPTH = 3;
export const DEFAULT_MAX_CONCURRENCY = 5;

function isHtml(contentType: string): boolean {
  return contentType.includes('text/html');
}

/**
 * Breadth-first crawl of one site. Each level's frontier is fetched through
 * a bounded pool; tasks only return outcomes, and the visited set, frontier
 * and findings are merged once the whole level has settled.
 */
export class MixedContentScanner {
  private readonly maxCrawlDepth: number;
  private readonly maxConcurrency: number;
  private readonly fetcher: PageFetcher;
  private readonly inspector: MixedContentInspector;
  private readonly linkExtractor: LinkExtractor;
  private readonly logger: Logger;

  constructor(options: ScannerOptions = {}) {
    this.maxCrawlDepth = Math.max(0, options.maxCrawlDepth ?? DEFAULT_MAX_CRAWL_DEPTH);
    this.maxConcurrency = Math.max(1, options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY);
    this.fetcher = options.fetcher ?? new HttpPageFetcher();
    this.inspector = new MixedContentInspector();
    this.linkExtractor = new LinkExtractor();
    this.logger = options.logger ?? createSilentLogger();
  }

  async scan(seedUrl: string, reporter: Reporter): Promise<ScanResult> {
    if (!isValidSeedUrl(seedUrl)) {
      throw new InvalidSeedUrlError(seedUrl);
    }

    const limit = pLimit(this.maxConcurrency);
    const visited = new Set<string>([seedUrl]);
    const findings = new Map<string, string[]>();
    const levels: LevelSummary[] = [];
    let frontier = new Set<string>([seedUrl]);
    let depth = 0;

    while (depth < this.maxCrawlDepth && frontier.size > 0) {
      const batch = Array.from(frontier);
      this.logger.info(`Scanning level ${depth}`, { pages: batch.length });

      const outcomes = await Promise.all(batch.map((url) => limit(() => this.processPage(url))));

      const discovered = new Set<string>();
      let inspected = 0;
      let reported = 0;

      for (const outcome of outcomes) {
        if (outcome.kind === 'skipped') {
          if (outcome.reason === 'fetch-failed' || outcome.reason === 'inspection-failed') {
            this.logger.warn(`Skipped (${outcome.reason})`, { url: outcome.url, error: outcome.detail });
          } else {
            this.logger.debug(`Skipped (${outcome.reason})`, { url: outcome.url, detail: outcome.detail });
          }
          continue;
        }

        inspected++;

        if (outcome.findings.length > 0 && !findings.has(outcome.url)) {
          findings.set(outcome.url, outcome.findings);
          reported++;
          await this.deliver(reporter, outcome.url, outcome.findings);
        }

        if (outcome.links.ok) {
          for (const link of outcome.links.links) discovered.add(link);
        } else {
          this.logger.warn('Link extraction failed', { url: outcome.url, error: outcome.links.error });
        }
      }

      const nextFrontier = new Set<string>();
      for (const link of discovered) {
        if (!visited.has(link)) nextFrontier.add(link);
        visited.add(link);
      }

      levels.push({
        depth,
        frontier: batch,
        inspected,
        skipped: outcomes.length - inspected,
        reported,
        nextFrontier: Array.from(nextFrontier),
      });
      this.logger.info(`Finished level ${depth}`, {
        inspected,
        reported,
        discovered: discovered.size,
        queued: nextFrontier.size,
      });

      frontier = nextFrontier;
      depth++;
    }

    const stopReason: StopReason = frontier.size === 0 ? 'frontier-exhausted' : 'depth-limit';

    return {
      seedUrl,
      findings,
      visited: Array.from(visited),
      levels,
      stopReason,
    };
  }

  /** Fetches one page and, when it qualifies, inspects it and extracts its links. */
  async processPage(url: string): Promise<PageOutcome> {
    const result = await this.fetcher.fetch(url);

    if (!result.ok) {
      return { kind: 'skipped', url, reason: 'fetch-failed', detail: result.error };
    }
    if (!isSameNetloc(url, result.finalUrl)) {
      return { kind: 'skipped', url, reason: 'off-origin-redirect', detail: result.finalUrl };
    }
    if (!isHtml(result.contentType)) {
      return { kind: 'skipped', url, reason: 'not-html', detail: result.contentType };
    }

    let document: HtmlDocument;
    let findings: string[];
    try {
      document = HtmlDocument.parse(result.body);
      findings = this.inspector.inspect(document);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      return { kind: 'skipped', url, reason: 'inspection-failed', detail: errorMessage };
    }

    return { kind: 'inspected', url, findings, links: this.extractLinks(document, url) };
  }

  private extractLinks(document: HtmlDocument, url: string): LinkResult {
    try {
      return { ok: true, links: this.linkExtractor.extract(document, url) };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      return { ok: false, error: errorMessage };
    }
  }

  private async deliver(reporter: Reporter, url: string, pageFindings: readonly string[]): Promise<void> {
    try {
      await reporter(url, pageFindings);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error('Reporter failed', { url, error: errorMessage });
    }
  }
}

/**
 * Functional form of {@link MixedContentScanner.scan}.
 */
export async function scan(
  seedUrl: string,
  reporter: Reporter,
  maxDepth = DEFAULT_MAX_CRAWL_DEPTH,
  maxConcurrency = DEFAULT_MAX_CONCURRENCY,
  options: Omit<ScannerOptions, 'maxCrawlDepth' | 'maxConcurrency'> = {}
): Promise<ScanResult> {
  const scanner = new MixedContentScanner({ ...options, maxCrawlDepth: maxDepth, maxConcurrency });
  return scanner.scan(seedUrl, reporter);
}
