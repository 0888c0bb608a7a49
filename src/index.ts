export type {
  ContextFactory,
  ContextOptions,
  DbContext,
  EntityEntry,
  EntityQuery,
  EntitySet
} from './core/contracts/db-context.js';
export { isDbContext } from './core/contracts/db-context.js';
export { EntityState } from './core/entities/entity-state.js';
export { ApplicationError } from './core/errors/application-error.js';
export { ChangeTracker, type PendingEntry } from './core/tracking/change-tracker.js';
export { BaseContextRepository, type RepositoryOptions } from './core/repositories/base-context.repository.js';
export { BaseRepository, type ParamQueryFilter, type QueryFilter } from './core/repositories/base.repository.js';
export { connectMongo, disconnectMongo, mongoConnectOptions } from './infra/db/mongo/connection.js';
export {
  MongoDbContext,
  createMongoContextFactory,
  type MongoContextSettings
} from './infra/db/mongo/mongo-db-context.js';
export {
  MongoEntitySet,
  referencePaths,
  type MongoEntity,
  type MongoKey,
  type MongoQuery,
  type MongoSet
} from './infra/db/mongo/mongo-entity-set.js';
export { MongoRepository, type MongoRepositoryOptions } from './infra/db/mongo/mongo.repository.js';
export { logger } from './infra/logger/logger.js';
