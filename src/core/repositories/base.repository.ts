import type { ContextFactory, DbContext, EntityQuery, EntitySet } from '../contracts/db-context.js';
import { isDbContext } from '../contracts/db-context.js';
import { EntityState } from '../entities/entity-state.js';
import { BaseContextRepository, type RepositoryOptions } from './base-context.repository.js';

/**
 * Filtra u ordena la vista de una colección antes de materializarla.
 */
export type QueryFilter<TQuery> = (query: TQuery) => TQuery;

export type ParamQueryFilter<TQuery, TParam> = (query: TQuery, param: TParam) => TQuery;

type GetAllArgs<TContext, TQuery, TParam> =
  | [context: TContext]
  | [filter?: QueryFilter<TQuery> | null]
  | [filter: ParamQueryFilter<TQuery, TParam> | null | undefined, param: TParam];

/**
 * Repositorio genérico para una entidad identificada por una clave.
 *
 * Cada operación existe en dos formas:
 * - con un contexto aportado por quien llama: sólo rastrea la operación, sin guardar
 *   ni liberar el contexto;
 * - sin contexto: crea uno, ejecuta la operación, guarda (en las mutaciones) y lo
 *   libera siempre, también cuando algo falla.
 *
 * Los errores del contexto se propagan sin modificar.
 *
 * @example
 * ```ts
 * class ProductRepository extends BaseRepository<MongoDbContext, ProductDocument, string, ProductQuery> {
 *   protected entitySet(context: MongoDbContext) {
 *     return context.set(ProductModel);
 *   }
 * }
 * ```
 */
export abstract class BaseRepository<
  TContext extends DbContext,
  TEntity extends object,
  TKey,
  TQuery extends EntityQuery<TEntity>
> extends BaseContextRepository<TContext> {
  protected constructor(contextFactory: ContextFactory<TContext>, options: RepositoryOptions = {}) {
    super(contextFactory, options);
  }

  /**
   * Colección que gestiona este repositorio dentro del contexto indicado.
   */
  protected abstract entitySet(context: TContext): EntitySet<TEntity, TKey, TQuery>;

  /**
   * Busca la entidad con la clave indicada.
   * @returns La entidad, o `null` si no existe
   */
  public get(key: TKey, context?: TContext): Promise<TEntity | null> {
    if (context !== undefined) {
      return this.entitySet(context).find(key);
    }

    return this.withContext((ownContext) => this.get(key, ownContext));
  }

  /**
   * Con un contexto devuelve la vista perezosa de todas las entidades. Sin él,
   * aplica el filtro (si lo hay) y materializa el resultado.
   */
  public getAll(context: TContext): TQuery;
  public getAll(filter?: QueryFilter<TQuery> | null): Promise<TEntity[]>;
  public getAll<TParam>(
    filter: ParamQueryFilter<TQuery, TParam> | null | undefined,
    param: TParam
  ): Promise<TEntity[]>;
  public getAll<TParam>(...args: GetAllArgs<TContext, TQuery, TParam>): TQuery | Promise<TEntity[]> {
    if (args.length === 2) {
      const [filter, param] = args;
      return this.materialize(filter ? (query) => filter(query, param) : undefined);
    }

    const [contextOrFilter] = args;
    if (this.isContext(contextOrFilter)) {
      return this.entitySet(contextOrFilter).query();
    }

    return this.materialize(contextOrFilter ?? undefined);
  }

  public add(entity: TEntity, context: TContext): TEntity;
  public add(entity: TEntity): Promise<TEntity>;
  public add(entity: TEntity, context?: TContext): TEntity | Promise<TEntity> {
    if (context !== undefined) {
      return this.setState(entity, context, EntityState.Added);
    }

    return this.commit((ownContext) => this.add(entity, ownContext));
  }

  public update(entity: TEntity, context: TContext): TEntity;
  public update(entity: TEntity): Promise<TEntity>;
  public update(entity: TEntity, context?: TContext): TEntity | Promise<TEntity> {
    if (context !== undefined) {
      return this.setState(entity, context, EntityState.Modified);
    }

    return this.commit((ownContext) => this.update(entity, ownContext));
  }

  public delete(entity: TEntity, context: TContext): void;
  public delete(entity: TEntity): Promise<void>;
  public delete(entity: TEntity, context?: TContext): void | Promise<void> {
    if (context !== undefined) {
      this.setState(entity, context, EntityState.Deleted);
      return;
    }

    return this.commit((ownContext) => this.delete(entity, ownContext));
  }

  /**
   * Ejecuta `work` con un contexto propio y lo libera en cualquier salida.
   */
  protected async withContext<TResult>(work: (context: TContext) => Promise<TResult> | TResult): Promise<TResult> {
    const context = this.createContext();

    try {
      return await work(context);
    } finally {
      await context.dispose();
    }
  }

  protected isContext(value: unknown): value is TContext {
    return isDbContext(value);
  }

  private commit<TResult>(work: (context: TContext) => TResult): Promise<TResult> {
    return this.withContext(async (context) => {
      const result = work(context);
      await context.saveChanges();
      return result;
    });
  }

  private materialize(filter?: QueryFilter<TQuery>): Promise<TEntity[]> {
    return this.withContext((context) => {
      const query = this.getAll(context);
      return (filter ? filter(query) : query).exec();
    });
  }

  private setState(entity: TEntity, context: TContext, state: EntityState): TEntity {
    const entry = context.entry(entity);
    entry.state = state;
    return entry.entity;
  }
}
