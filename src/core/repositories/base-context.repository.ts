import type { ContextFactory, ContextOptions, DbContext } from '../contracts/db-context.js';

export interface RepositoryOptions {
  autoDetectChanges?: boolean;
  lazyLoading?: boolean;
}

/**
 * Repositorio sin entidad concreta: envuelve la creación de contextos configurados.
 * Quien llama a `createContext()` es responsable de liberar el contexto
 * (`try`/`finally` con `dispose()`).
 */
export abstract class BaseContextRepository<TContext extends DbContext> {
  private readonly settings: Readonly<ContextOptions>;

  protected constructor(
    private readonly contextFactory: ContextFactory<TContext>,
    options: RepositoryOptions = {}
  ) {
    this.settings = Object.freeze({
      autoDetectChanges: options.autoDetectChanges ?? false,
      lazyLoading: options.lazyLoading ?? false
    });
  }

  protected get autoDetectChangesEnabled(): boolean {
    return this.settings.autoDetectChanges;
  }

  protected get lazyLoadingEnabled(): boolean {
    return this.settings.lazyLoading;
  }

  public createContext(): TContext {
    return this.contextFactory(this.settings);
  }
}
