import winston from 'winston';
import { env, Env } from './env.config';

/**
 * One line per entry outside production. A `source` field is lifted into the
 * prefix so interleaved provider logs stay readable.
 */
export const lineFormat = winston.format.printf(({ level, message, timestamp, source, service: _service, ...meta }) => {
  const tag = typeof source === 'string' ? ` [${source}]` : '';
  const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} [${level}]${tag}: ${message}${rest}`;
});

export function createLogger(config: Pick<Env, 'LOG_LEVEL' | 'NODE_ENV'>): winston.Logger {
  return winston.createLogger({
    level: config.LOG_LEVEL,
    // Tests stay quiet unless a level is asked for explicitly
    silent: config.NODE_ENV === 'test' && process.env.LOG_LEVEL === undefined,
    defaultMeta: { service: 'npb-stats-gateway' },
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      config.NODE_ENV === 'production' ? winston.format.json() : lineFormat
    ),
    transports: [new winston.transports.Console()],
  });
}

export const logger = createLogger(env);
