import mongoose, { Document, type ClientSession, type Connection, type Model } from 'mongoose';

import { env } from '../../../config/index.js';
import type { ContextFactory, ContextOptions, DbContext, EntityEntry } from '../../../core/contracts/db-context.js';
import { EntityState } from '../../../core/entities/entity-state.js';
import { ApplicationError, contextDisposedError } from '../../../core/errors/application-error.js';
import { ChangeTracker, type PendingEntry } from '../../../core/tracking/change-tracker.js';
import { logger } from '../../logger/logger.js';
import { MongoEntitySet } from './mongo-entity-set.js';

export interface MongoContextSettings {
  /** Conexión usada para abrir transacciones. Por defecto, la conexión global de Mongoose. */
  connection?: Connection;
  /** Ejecuta cada `saveChanges()` dentro de una transacción (requiere replica set). */
  transactional?: boolean;
}

const toDocument = (entity: object): Document => {
  if (!(entity instanceof Document)) {
    throw new ApplicationError('Sólo se pueden rastrear documentos de Mongoose', {
      code: 'ENTITY_NOT_DOCUMENT',
      metadata: { received: entity.constructor?.name }
    });
  }

  return entity;
};

const markAllModified = (document: Document): void => {
  document.schema.eachPath((path) => {
    if (path !== '_id' && path !== '__v') {
      document.markModified(path);
    }
  });
};

/**
 * Unidad de trabajo sobre MongoDB. Rastrea documentos de Mongoose con su operación
 * pendiente y los escribe en `saveChanges()`.
 */
export class MongoDbContext implements DbContext {
  public readonly options: Readonly<ContextOptions>;

  private readonly tracker = new ChangeTracker();

  private readonly connection: Connection;

  private readonly transactional: boolean;

  private isDisposed = false;

  constructor(options: ContextOptions, settings: MongoContextSettings = {}) {
    this.options = Object.freeze({ ...options });
    this.connection = settings.connection ?? mongoose.connection;
    this.transactional = settings.transactional ?? false;

    logger.debug({ ...this.options, transactional: this.transactional }, 'Contexto de MongoDB creado');
  }

  public get disposed(): boolean {
    return this.isDisposed;
  }

  public set<TRaw>(model: Model<TRaw>): MongoEntitySet<TRaw> {
    this.assertActive();
    return new MongoEntitySet(model, this);
  }

  public entry<TEntity extends object>(entity: TEntity): EntityEntry<TEntity> {
    this.assertActive();
    toDocument(entity);
    return this.tracker.entry(entity);
  }

  /**
   * Registra un documento recién cargado. No altera documentos ya rastreados.
   */
  public track(document: object): void {
    this.assertActive();
    this.tracker.track(toDocument(document));
  }

  public findTracked<TEntity extends object>(
    predicate: (entity: object, state: EntityState) => entity is TEntity
  ): TEntity | undefined {
    this.assertActive();
    return this.tracker.find(predicate);
  }

  public async saveChanges(): Promise<number> {
    this.assertActive();

    if (this.options.autoDetectChanges) {
      this.tracker.detectChanges((entity) => toDocument(entity).isModified());
    }

    const pending = this.tracker.pending();
    if (pending.length === 0) {
      return 0;
    }

    const written: object[] = [];

    try {
      if (this.transactional) {
        await this.persistInTransaction(pending);
      } else {
        await this.persist(pending, written);
      }
    } catch (error) {
      // Sin transacción las escrituras previas al fallo ya están en la base de datos.
      this.tracker.acceptChanges(written);
      logger.error(
        { err: error, pending: pending.length, written: written.length },
        'Error al guardar los cambios del contexto'
      );
      throw error;
    }

    this.tracker.acceptChanges();
    logger.debug({ saved: pending.length }, 'Cambios del contexto guardados');

    return pending.length;
  }

  public async dispose(): Promise<void> {
    if (this.isDisposed) {
      return;
    }

    const discarded = this.tracker.pending().length;
    if (discarded > 0) {
      logger.debug({ discarded }, 'Se descartan cambios sin guardar al liberar el contexto');
    }

    this.tracker.clear();
    this.isDisposed = true;
  }

  private async persistInTransaction(pending: PendingEntry[]): Promise<void> {
    const session = await this.connection.startSession();

    try {
      // Un aborto deshace todo: no se anota ninguna escritura.
      await session.withTransaction(() => this.persist(pending, [], session));
    } finally {
      await session.endSession();
    }
  }

  /**
   * Escribe las entradas en orden y anota en `written` cada entidad ya persistida.
   */
  private async persist(pending: PendingEntry[], written: object[], session?: ClientSession): Promise<void> {
    const options = session ? { session } : {};

    for (const { entity, state } of pending) {
      const document = toDocument(entity);

      switch (state) {
        case EntityState.Added:
          document.isNew = true;
          await document.save(options);
          break;
        case EntityState.Modified:
          document.isNew = false;
          markAllModified(document);
          await document.save(options);
          break;
        case EntityState.Deleted:
          await document.deleteOne(options);
          break;
        default:
          continue;
      }

      written.push(entity);
    }
  }

  private assertActive(): void {
    if (this.isDisposed) {
      throw contextDisposedError();
    }
  }
}

/**
 * Fábrica de contextos de MongoDB para los repositorios. Por defecto las transacciones
 * siguen `MONGO_TRANSACTIONS`.
 */
export const createMongoContextFactory = (settings: MongoContextSettings = {}): ContextFactory<MongoDbContext> =>
  (options) =>
    new MongoDbContext(options, {
      connection: settings.connection,
      transactional: settings.transactional ?? env.MONGO_TRANSACTIONS
    });
