import { z } from 'zod';

export const DEFAULT_USER_AGENT = 'NoMixedContent/v1.0 Scan web page for mixed content issues';

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']);

export const FetcherConfigSchema = z.object({
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  timeoutMs: z.number().int().positive().default(30000),
  maxRedirects: z.number().int().min(0).default(10),
  maxContentLength: z.number().int().positive().default(5 * 1024 * 1024),
});

export const ScanConfigSchema = FetcherConfigSchema.extend({
  maxCrawlDepth: z.number().int().min(0).default(3),
  maxConcurrency: z.number().int().min(1).default(5),
  logLevel: LogLevelSchema.default('info'),
  logFile: z.string().min(1).optional(),
});

const intFromEnv = z.string().trim().regex(/^\d+$/, 'Expected a non-negative integer').transform(Number);

// Environment variable names mapped onto ScanConfig keys.
export const ScanEnvSchema = z.object({
  SCAN_MAX_DEPTH: intFromEnv.optional(),
  SCAN_CONCURRENCY: intFromEnv.optional(),
  SCAN_USER_AGENT: z.string().optional(),
  SCAN_TIMEOUT_MS: intFromEnv.optional(),
  SCAN_MAX_REDIRECTS: intFromEnv.optional(),
  SCAN_MAX_CONTENT_LENGTH: intFromEnv.optional(),
  LOG_LEVEL: LogLevelSchema.optional(),
  LOG_FILE: z.string().optional(),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type FetcherConfig = z.infer<typeof FetcherConfigSchema>;
export type ScanConfig = z.infer<typeof ScanConfigSchema>;
export type ScanConfigInput = z.input<typeof ScanConfigSchema>;
export type ScanEnv = z.infer<typeof ScanEnvSchema>;
