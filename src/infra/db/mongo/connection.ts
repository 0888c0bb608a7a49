import mongoose, { type ConnectOptions, type Connection } from 'mongoose';

import { env, type AppEnv } from '../../../config/index.js';
import { logger } from '../../logger/logger.js';

let connecting: Promise<typeof mongoose> | null = null;
const observed = new WeakSet<Connection>();

/**
 * Opciones del driver derivadas de la configuración validada.
 */
export const mongoConnectOptions = (config: AppEnv): ConnectOptions => ({
  dbName: config.MONGO_DB_NAME,
  maxPoolSize: config.MONGO_MAX_POOL_SIZE,
  autoIndex: config.NODE_ENV !== 'production',
  serverSelectionTimeoutMS: config.MONGO_SERVER_SELECTION_TIMEOUT_MS,
  connectTimeoutMS: config.MONGO_CONNECT_TIMEOUT_MS,
  socketTimeoutMS: config.MONGO_SOCKET_TIMEOUT_MS,
  retryWrites: true,
  retryReads: true
});

const observe = (connection: Connection): void => {
  if (observed.has(connection)) {
    return;
  }
  observed.add(connection);

  connection
    .on('error', (error) => logger.error({ err: error }, 'Error en la conexión de MongoDB'))
    .on('reconnected', () => logger.info('MongoDB reconectado'))
    .on('disconnected', () => {
      logger.warn('MongoDB desconectado');
      connecting = null;
    });
};

const isOpenOrOpening = (connection: Connection): boolean =>
  connection.readyState === mongoose.ConnectionStates.connected ||
  connection.readyState === mongoose.ConnectionStates.connecting;

/**
 * Conexión compartida que usan los contextos sin conexión propia. Llamadas
 * concurrentes comparten el mismo intento; si falla, la siguiente llamada reintenta.
 */
export const connectMongo = async (): Promise<typeof mongoose> => {
  if (isOpenOrOpening(mongoose.connection)) {
    return mongoose;
  }

  if (connecting) {
    return connecting;
  }

  mongoose.set('strictQuery', true);
  observe(mongoose.connection);

  const attempt = mongoose.connect(env.MONGO_URI, mongoConnectOptions(env));
  connecting = attempt;

  void attempt.then(
    () => logger.info({ dbName: env.MONGO_DB_NAME }, 'Conexión a MongoDB establecida'),
    (error: unknown) => {
      logger.error({ err: error }, 'Error al conectar con MongoDB');
      if (connecting === attempt) {
        connecting = null;
      }
    }
  );

  return attempt;
};

export const disconnectMongo = async (): Promise<void> => {
  connecting = null;

  if (mongoose.connection.readyState === mongoose.ConnectionStates.disconnected) {
    return;
  }

  await mongoose.disconnect();
  logger.info('Conexión a MongoDB cerrada');
};
