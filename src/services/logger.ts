import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const STDERR_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

let loggingEnabled = process.env.PAGE2MD_SILENT !== '1';

const logger = winston.createLogger({
  level: 'warn',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat()
  ),
  defaultMeta: { service: 'page2md' },
  transports: [
    // stdout carries CLI output and the MCP stdio protocol
    new winston.transports.Console({
      stderrLevels: STDERR_LEVELS,
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(
          ({ timestamp, level, message, service, ...meta }) => {
            const details =
              Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
            return `${String(timestamp)} [${String(service)}] ${level}: ${String(message)}${details}`;
          }
        )
      ),
    }),
  ],
});

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

export function setLoggingEnabled(enabled: boolean): void {
  loggingEnabled = enabled;
}

export function logInfo(message: string, meta?: Record<string, unknown>): void {
  if (loggingEnabled) logger.info(message, meta);
}

export function logWarn(message: string, meta?: Record<string, unknown>): void {
  if (loggingEnabled) logger.warn(message, meta);
}

export function logDebug(
  message: string,
  meta?: Record<string, unknown>
): void {
  if (loggingEnabled) logger.debug(message, meta);
}

export function logError(
  message: string,
  error?: Error | Record<string, unknown>
): void {
  if (!loggingEnabled) return;

  const errorMeta =
    error instanceof Error
      ? { error: error.message, stack: error.stack }
      : error;
  logger.error(message, errorMeta);
}
