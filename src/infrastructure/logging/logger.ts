import winston from 'winston';

export type Logger = winston.Logger;

const isProduction = process.env.NODE_ENV === 'production';

// JSON lines in production, a readable single line per entry otherwise.
const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
    const scope = typeof component === 'string' ? ` [${component}]` : '';
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `[${String(timestamp)}] ${level}${scope}: ${String(message)}${metaStr}`;
  }),
);

const rootLogger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  format: structuredFormat,
  defaultMeta: { service: 'sheet-geocode' },
  silent: process.env.NODE_ENV === 'test',
  transports: [
    new winston.transports.Console({
      format: isProduction ? structuredFormat : consoleFormat,
      stderrLevels: ['error'],
    }),
  ],
  exitOnError: false,
});

/** Child logger tagged with the component that writes through it. */
export function createLogger(component: string): Logger {
  return rootLogger.child({ component });
}

/** Change the level of every logger at once (the CLI's `--verbose`). */
export function setLogLevel(level: string): void {
  rootLogger.level = level;
}
