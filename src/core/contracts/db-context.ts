import type { EntityState } from '../entities/entity-state.js';

/**
 * Ajustes fijos con los que se configura cada contexto creado por un repositorio.
 */
export interface ContextOptions {
  /** Detecta automáticamente las entidades rastreadas modificadas antes de guardar. */
  autoDetectChanges: boolean;
  /** Carga automáticamente los objetos relacionados de las entidades consultadas. */
  lazyLoading: boolean;
}

/**
 * Fábrica explícita de contextos. Debe devolver un contexto nuevo en cada llamada.
 */
export type ContextFactory<TContext extends DbContext> = (options: Readonly<ContextOptions>) => TContext;

export interface EntityEntry<TEntity extends object> {
  readonly entity: TEntity;
  state: EntityState;
}

/**
 * Vista perezosa sobre una colección. Sólo se exige poder materializarla.
 */
export interface EntityQuery<TEntity> {
  exec(): Promise<TEntity[]>;
}

/**
 * Vista tipada de una colección dentro de un contexto concreto.
 */
export interface EntitySet<TEntity, TKey, TQuery extends EntityQuery<TEntity>> {
  /**
   * Busca la entidad con la clave indicada, primero entre las rastreadas por el
   * contexto y después en el almacenamiento.
   */
  find(key: TKey): Promise<TEntity | null>;
  query(): TQuery;
}

/**
 * Unidad de trabajo sobre el almacenamiento: rastrea entidades con su operación
 * pendiente y las persiste en `saveChanges()`. No es segura para uso concurrente.
 */
export interface DbContext {
  readonly options: Readonly<ContextOptions>;
  readonly disposed: boolean;
  entry<TEntity extends object>(entity: TEntity): EntityEntry<TEntity>;
  /**
   * Persiste las operaciones pendientes y devuelve cuántas entidades se escribieron.
   */
  saveChanges(): Promise<number>;
  /**
   * Libera el contexto. Los cambios no guardados se descartan.
   */
  dispose(): Promise<void>;
}

export const isDbContext = (value: unknown): value is DbContext =>
  typeof value === 'object' &&
  value !== null &&
  'saveChanges' in value &&
  'dispose' in value &&
  'entry' in value;
