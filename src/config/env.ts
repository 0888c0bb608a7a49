import { config as loadEnv } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

import { z } from 'zod';

/**
 * Carga los archivos `.env` relevantes según el `NODE_ENV` y valida las variables
 * de entorno que usa la librería.
 */
const resolveEnvFiles = (): string[] => {
  const nodeEnv = process.env.NODE_ENV ?? 'development';
  const candidates = [
    `.env.${nodeEnv}.local`,
    `.env.${nodeEnv}`,
    '.env.local',
    '.env'
  ];

  return candidates
    .map((fileName) => resolve(process.cwd(), fileName))
    .filter((absolutePath) => existsSync(absolutePath));
};

resolveEnvFiles().forEach((path) => {
  loadEnv({ path, override: true });
});

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  MONGO_URI: z.string().min(1, 'MONGO_URI no puede estar vacío').default('mongodb://127.0.0.1:27017'),
  MONGO_DB_NAME: z.string().min(1, 'MONGO_DB_NAME no puede estar vacío').default('quickrepo'),
  MONGO_MAX_POOL_SIZE: z.coerce.number().int().positive().default(20),
  MONGO_SERVER_SELECTION_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  MONGO_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  MONGO_SOCKET_TIMEOUT_MS: z.coerce.number().int().positive().default(45000),
  MONGO_TRANSACTIONS: booleanFlag
});

export type AppEnv = z.infer<typeof envSchema>;

/**
 * Valida un conjunto de variables de entorno.
 * @throws Error con una línea `ruta: mensaje` por cada variable inválida
 */
export const parseEnv = (source: NodeJS.ProcessEnv): AppEnv => {
  const parsedEnv = envSchema.safeParse(source);

  if (!parsedEnv.success) {
    const formattedErrors = parsedEnv.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('\n');

    throw new Error(`Variables de entorno inválidas:\n${formattedErrors}`);
  }

  return parsedEnv.data;
};

/**
 * Configuración validada del entorno de ejecución.
 */
export const env = parseEnv(process.env);
