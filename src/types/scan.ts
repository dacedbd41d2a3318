import type { Logger } from 'winston';
import type { PageFetcher } from './fetch.js';

export type Reporter = (pageUrl: string, findings: readonly string[]) => void | Promise<void>;

export type StopReason = 'frontier-exhausted' | 'depth-limit';

export type SkipReason = 'fetch-failed' | 'off-origin-redirect' | 'not-html' | 'inspection-failed';

export type LinkResult =
  | { ok: true; links: string[] }
  | { ok: false; error: string };

export type PageOutcome =
  | { kind: 'skipped'; url: string; reason: SkipReason; detail: string }
  | { kind: 'inspected'; url: string; findings: string[]; links: LinkResult };

export interface LevelSummary {
  depth: number;
  frontier: string[];
  inspected: number;
  skipped: number;
  reported: number;
  nextFrontier: string[];
}

export interface ScanResult {
  seedUrl: string;
  /** Page URL to flagged references, in report order. */
  findings: Map<string, string[]>;
  /** Every URL ever queued, seed first. */
  visited: string[];
  levels: LevelSummary[];
  stopReason: StopReason;
}

export interface ScannerOptions {
  maxCrawlDepth?: number;
  maxConcurrency?: number;
  fetcher?: PageFetcher;
  logger?: Logger;
}
