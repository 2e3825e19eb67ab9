import winston from 'winston';
import { ENGINE_DEFAULTS } from './config/engine-defaults';

// Entries whose message starts with one of these [TAGS] are dropped.
const suppressedTags = ENGINE_DEFAULTS.SUPPRESSED_LOG_TAGS.map((tag) => new RegExp(`^\\[${tag}\\]`, 'i'));

const serializeError = (error: Error) => {
  const serialized: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack
  };
  for (const [key, value] of Object.entries(error)) {
    serialized[key] = value;
  }
  return serialized;
};

// Errors passed in the metadata (handler failures, effect errors) are logged as plain objects.
const serializeErrorsFormat = winston.format((info) => {
  for (const [key, value] of Object.entries(info)) {
    if (value instanceof Error) {
      info[key] = serializeError(value);
    }
  }
  return info;
});

const suppressTagsFormat = winston.format((info) => {
  const message = typeof info.message === 'string' ? info.message : '';
  return suppressedTags.some((pattern) => pattern.test(message)) ? false : info;
});

const logger = winston.createLogger({
  level: ENGINE_DEFAULTS.LOG_LEVEL,
  silent: ENGINE_DEFAULTS.LOG_SILENT,
  format: winston.format.combine(
    suppressTagsFormat(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    serializeErrorsFormat(),
    winston.format.json()
  ),
  defaultMeta: { service: 'ptcg-match-core' },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        suppressTagsFormat(),
        winston.format.colorize(),
        winston.format.printf(({ level, message, timestamp, gameId, ...meta }) => {
          const match = typeof gameId === 'string' ? ` (${gameId})` : '';
          const details = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${timestamp} [${level}]${match}: ${message}${details}`;
        })
      )
    })
  ]
});

/** Child logger that stamps every entry with the match id. */
export const createMatchLogger = (gameId: string): winston.Logger => logger.child({ gameId });

export default logger;
