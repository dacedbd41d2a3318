// Fetch types
export type {
  FetchSuccess,
  FetchFailure,
  FetchResult,
  PageFetcher,
  PageFetcherOptions,
} from './fetch.js';

// Scan types
export type {
  Reporter,
  StopReason,
  SkipReason,
  LinkResult,
  PageOutcome,
  LevelSummary,
  ScanResult,
  ScannerOptions,
} from './scan.js';
