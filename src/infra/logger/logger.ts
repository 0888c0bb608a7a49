import { pino, type LoggerOptions, type TransportMultiOptions } from 'pino';

import { env } from '../../config/index.js';

/**
 * Logger compartido basado en Pino. En desarrollo usa un transporte "pretty";
 * en el resto de entornos emite JSON.
 */
const createTransport = (): TransportMultiOptions | undefined => {
  if (env.NODE_ENV !== 'development') {
    return undefined;
  }

  return {
    targets: [
      {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:yyyy-mm-dd HH:MM:ss.l'
        }
      }
    ]
  } satisfies TransportMultiOptions;
};

const options: LoggerOptions = {
  level: env.LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : 'debug'),
  transport: createTransport(),
  base: {
    service: 'quickrepo'
  }
};

export const logger = pino(options);
