import winston from 'winston';

export interface LoggerOptions {
  level?: string;
  name: string;
  logFile?: string;
  silent?: boolean;
}

const ALL_LEVELS = Object.keys(winston.config.npm.levels);

export function createLogger(options: LoggerOptions): winston.Logger {
  const { level = 'info', name, logFile, silent = false } = options;

  // Everything goes to stderr; stdout carries the scan report.
  const transports: winston.transport[] = [
    new winston.transports.Console({ stderrLevels: ALL_LEVELS }),
  ];

  if (logFile) {
    transports.push(
      new winston.transports.File({
        filename: logFile,
        maxsize: 10485760, // 10MB
        maxFiles: 5,
      })
    );
  }

  return winston.createLogger({
    level,
    silent,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${timestamp} ${level.toUpperCase()} [${name}] ${message}${metaStr}`;
      })
    ),
    transports,
  });
}

export function createSilentLogger(): winston.Logger {
  return createLogger({ name: 'silent', silent: true });
}
