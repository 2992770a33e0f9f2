import winston from 'winston';
import { env } from './env';

const isProduction = env.NODE_ENV === 'production';

function serializeError(error: Error): Record<string, unknown> {
  const serialized: Record<string, unknown> = { name: error.name, message: error.message, stack: error.stack };
  if ('code' in error) serialized.code = error.code;
  return serialized;
}

/**
 * `format.errors` solo trata un Error en el nivel superior; los que llegan
 * como meta (`{ error }`) se convierten aquí para que JSON no los deje en `{}`.
 */
export const serializeErrors = winston.format((info) => {
  for (const [key, value] of Object.entries(info)) {
    if (value instanceof Error) {
      info[key] = serializeError(value);
    }
  }
  return info;
});

export const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  serializeErrors(),
  winston.format.json()
);

export const logger = winston.createLogger({
  level: env.LOG_LEVEL || (isProduction ? 'info' : 'debug'),
  silent: env.NODE_ENV === 'test',
  format: logFormat,
  defaultMeta: { service: 'cinevibe' },
  transports: [
    new winston.transports.Console({
      format: isProduction
        ? winston.format.json()
        : winston.format.combine(
            winston.format.colorize(),
            winston.format.printf(({ level, message, timestamp, service, ...meta }) => {
              const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
              return `${timestamp} [${service}] ${level}: ${message}${metaStr}`;
            })
          ),
    }),
  ],
  exitOnError: false,
});

/**
 * Logger hijo con contexto fijo (p. ej. `{ module: 'uploads' }`)
 */
export function createChildLogger(context: Record<string, string | number>): winston.Logger {
  return logger.child(context);
}
