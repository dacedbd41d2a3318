import { ScanConfigSchema, ScanEnvSchema, type ScanConfig, type ScanConfigInput } from './schemas/index.js';
import { ConfigError } from './errors.js';

export function parseScanConfig(input: ScanConfigInput = {}): ScanConfig {
  const result = ScanConfigSchema.safeParse(input);
  if (!result.success) {
    throw ConfigError.fromZodError(result.error);
  }
  return result.data;
}

/**
 * Reads ScanConfig from environment variables. Unset or empty variables
 * fall back to the schema defaults.
 */
export function loadScanConfig(env: NodeJS.ProcessEnv = process.env): ScanConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsedEnv = ScanEnvSchema.safeParse(present);
  if (!parsedEnv.success) {
    throw ConfigError.fromZodError(parsedEnv.error);
  }

  const vars = parsedEnv.data;
  return parseScanConfig({
    maxCrawlDepth: vars.SCAN_MAX_DEPTH,
    maxConcurrency: vars.SCAN_CONCURRENCY,
    userAgent: vars.SCAN_USER_AGENT,
    timeoutMs: vars.SCAN_TIMEOUT_MS,
    maxRedirects: vars.SCAN_MAX_REDIRECTS,
    maxContentLength: vars.SCAN_MAX_CONTENT_LENGTH,
    logLevel: vars.LOG_LEVEL,
    logFile: vars.LOG_FILE,
  });
}
