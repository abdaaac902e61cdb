import winston from 'winston'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

/**
 * Process-wide logger. Level starts at `info`; the CLI adjusts it once via
 * `setLogLevel` before the pipeline runs.
 */
export const logger = winston.createLogger({
  level: 'info',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, ...metadata }) => {
          let line = `${String(timestamp)} [${level}]: ${String(message)}`
          if (Object.keys(metadata).length > 0) {
            line += ' ' + JSON.stringify(metadata)
          }
          return line
        }),
      ),
    }),
  ],
})

export function parseLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toLowerCase()
  if (normalized === 'warning') return 'warn'
  return LOG_LEVELS.find((l) => l === normalized) ?? 'info'
}

export function setLogLevel(level: LogLevel): void {
  logger.level = level
}
