import { Document, type Model, type Schema, type Types } from 'mongoose';

import type { EntitySet } from '../../../core/contracts/db-context.js';
import { EntityState } from '../../../core/entities/entity-state.js';
import type { MongoDbContext } from './mongo-db-context.js';

export type MongoKey = Types.ObjectId | string;

/**
 * Documento hidratado de un modelo.
 */
export type MongoEntity<TRaw> = ReturnType<Model<TRaw>['hydrate']>;

const declaresRef = (value: unknown): boolean =>
  typeof value === 'object' && value !== null && 'ref' in value && value.ref !== undefined;

const declaresRefArray = (value: unknown): boolean =>
  typeof value === 'object' &&
  value !== null &&
  'type' in value &&
  Array.isArray(value.type) &&
  value.type.some(declaresRef);

/**
 * Rutas del esquema que referencian otro modelo, directamente o como array de referencias.
 */
export const referencePaths = (schema: Schema): string[] => {
  const paths: string[] = [];

  schema.eachPath((path, schemaType) => {
    const options: unknown = schemaType.options;
    if (declaresRef(options) || declaresRefArray(options)) {
      paths.push(path);
    }
  });

  return paths;
};

/**
 * Colección de un modelo de Mongoose vista desde un `MongoDbContext`. Los documentos
 * que devuelve quedan rastreados por el contexto como `unchanged`.
 */
export class MongoEntitySet<TRaw> {
  constructor(
    private readonly model: Model<TRaw>,
    private readonly context: MongoDbContext
  ) {}

  public async find(key: MongoKey): Promise<MongoEntity<TRaw> | null> {
    const tracked = this.context.findTracked(
      (entity): entity is MongoEntity<TRaw> =>
        entity instanceof Document && entity.constructor === this.model && String(entity._id) === String(key)
    );

    if (tracked) {
      // Borrado pendiente: ya no existe para este contexto.
      return this.context.entry(tracked).state === EntityState.Deleted ? null : tracked;
    }

    const document = await this.model.findById(key).setOptions(this.queryOptions()).exec();
    if (document) {
      this.context.track(document);
    }

    return document;
  }

  /**
   * Consulta perezosa sobre toda la colección; se puede seguir componiendo antes de
   * ejecutarla con `exec()`.
   */
  public query() {
    return this.model
      .find()
      .setOptions(this.queryOptions())
      .transform((documents) => {
        documents.forEach((document) => this.context.track(document));
        return documents;
      });
  }

  private queryOptions(): { populate?: string[] } {
    if (!this.context.options.lazyLoading) {
      return {};
    }

    const paths = referencePaths(this.model.schema);
    return paths.length > 0 ? { populate: paths } : {};
  }
}

export type MongoQuery<TRaw> = ReturnType<MongoEntitySet<TRaw>['query']>;

export type MongoSet<TRaw> = EntitySet<MongoEntity<TRaw>, MongoKey, MongoQuery<TRaw>>;
