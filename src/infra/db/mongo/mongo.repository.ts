import type { Model } from 'mongoose';

import type { ContextFactory } from '../../../core/contracts/db-context.js';
import type { RepositoryOptions } from '../../../core/repositories/base-context.repository.js';
import { BaseRepository } from '../../../core/repositories/base.repository.js';
import { createMongoContextFactory, type MongoDbContext } from './mongo-db-context.js';
import type { MongoEntity, MongoKey, MongoQuery, MongoSet } from './mongo-entity-set.js';

export interface MongoRepositoryOptions extends RepositoryOptions {
  contextFactory?: ContextFactory<MongoDbContext>;
}

/**
 * Repositorio genérico para los documentos de un modelo de Mongoose.
 *
 * @example
 * ```ts
 * const products = new MongoRepository(ProductModel);
 * const cheap = await products.getAll((query) => query.where('price').lt(10).sort({ name: 1 }));
 * ```
 */
export class MongoRepository<TRaw, TKey extends MongoKey = MongoKey> extends BaseRepository<
  MongoDbContext,
  MongoEntity<TRaw>,
  TKey,
  MongoQuery<TRaw>
> {
  constructor(
    protected readonly model: Model<TRaw>,
    options: MongoRepositoryOptions = {}
  ) {
    super(options.contextFactory ?? createMongoContextFactory(), options);
  }

  protected entitySet(context: MongoDbContext): MongoSet<TRaw> {
    return context.set(this.model);
  }
}
