// Config schemas
export {
  DEFAULT_USER_AGENT,
  LogLevelSchema,
  FetcherConfigSchema,
  ScanConfigSchema,
  ScanEnvSchema,
  type LogLevel,
  type FetcherConfig,
  type ScanConfig,
  type ScanConfigInput,
  type ScanEnv,
} from './config.js';
