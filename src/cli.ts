#!/usr/bin/env node
import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import type { Writable } from 'stream';
import { loadScanConfig } from './config.js';
import { MixedContentScanner } from './crawler/engine.js';
import { HttpPageFetcher } from './fetcher/client.js';
import { createConsoleReporter, createJsonLinesReporter } from './reporting/index.js';
import { InvalidSeedUrlError } from './errors.js';
import { createLogger } from './utils/logger.js';
import { isValidSeedUrl } from './utils/url.js';
import type { PageFetcher } from './types/index.js';

export interface CliArgs {
  url?: string;
  json: boolean;
  help: boolean;
}

export interface CliIo {
  env?: NodeJS.ProcessEnv;
  stdout?: Writable;
  stderr?: Writable;
  fetcher?: PageFetcher;
}

const USAGE = `Usage: mixed-content-scan <url> [--json]

Recursively scans a site for HTTPS pages that load http: resources.

Environment:
  SCAN_MAX_DEPTH      levels to crawl (default 3)
  SCAN_CONCURRENCY    parallel fetches per level (default 5)
  LOG_LEVEL           error | warn | info | debug (default info)
`;

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { json: false, help: false };
  for (const arg of argv) {
    if (arg === '--json') args.json = true;
    else if (arg === '--help' || arg === '-h') args.help = true;
    else if (!args.url) args.url = arg;
  }
  return args;
}

/** Runs one scan and resolves to the process exit code. */
export async function run(argv: string[], io: CliIo = {}): Promise<number> {
  const stdout = io.stdout ?? process.stdout;
  const stderr = io.stderr ?? process.stderr;
  const args = parseArgs(argv);

  if (args.help) {
    stdout.write(USAGE);
    return 0;
  }
  if (!args.url) {
    stderr.write(USAGE);
    return 1;
  }

  try {
    if (!isValidSeedUrl(args.url)) {
      throw new InvalidSeedUrlError(args.url);
    }

    const config = loadScanConfig(io.env ?? process.env);
    const logger = createLogger({ name: 'scan', level: config.logLevel, logFile: config.logFile });
    const fetcher = io.fetcher ?? new HttpPageFetcher(config, { logger });
    const scanner = new MixedContentScanner({
      maxCrawlDepth: config.maxCrawlDepth,
      maxConcurrency: config.maxConcurrency,
      fetcher,
      logger,
    });

    // Banners stay off stdout when it carries JSON lines
    const banner = args.json ? stderr : stdout;
    const reporter = args.json ? createJsonLinesReporter(stdout) : createConsoleReporter(stdout);

    banner.write(`>> Start scanning ${args.url}\n`);
    await scanner.scan(args.url, reporter);
    banner.write('>> Done\n');
    return 0;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    stderr.write(`Error: ${errorMessage}\n`);
    return 1;
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isMainModule()) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exitCode = 1;
    });
}
