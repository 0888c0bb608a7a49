import type { EntityEntry } from '../contracts/db-context.js';
import { EntityState, PENDING_STATES } from '../entities/entity-state.js';

export interface PendingEntry {
  readonly entity: object;
  readonly state: EntityState;
}

class TrackedEntry<TEntity extends object> implements EntityEntry<TEntity> {
  constructor(
    public readonly entity: TEntity,
    private readonly tracker: ChangeTracker
  ) {}

  public get state(): EntityState {
    return this.tracker.stateOf(this.entity);
  }

  public set state(state: EntityState) {
    this.tracker.setState(this.entity, state);
  }
}

/**
 * Registro de entidades rastreadas por identidad. Cada contexto posee el suyo y lo
 * descarta al liberarse.
 */
export class ChangeTracker {
  private readonly states = new Map<object, EntityState>();

  public entry<TEntity extends object>(entity: TEntity): EntityEntry<TEntity> {
    return new TrackedEntry(entity, this);
  }

  public stateOf(entity: object): EntityState {
    return this.states.get(entity) ?? EntityState.Detached;
  }

  public setState(entity: object, state: EntityState): void {
    const current = this.stateOf(entity);

    // Borrar algo que nunca se insertó equivale a olvidarlo.
    if (state === EntityState.Detached || (state === EntityState.Deleted && current === EntityState.Added)) {
      this.states.delete(entity);
      return;
    }

    this.states.set(entity, state);
  }

  /**
   * Empieza a rastrear una entidad cargada desde el almacenamiento. No altera el
   * estado de una entidad ya rastreada.
   */
  public track(entity: object): void {
    if (!this.states.has(entity)) {
      this.states.set(entity, EntityState.Unchanged);
    }
  }

  public find<TEntity extends object>(
    predicate: (entity: object, state: EntityState) => entity is TEntity
  ): TEntity | undefined {
    for (const [entity, state] of this.states) {
      if (predicate(entity, state)) {
        return entity;
      }
    }

    return undefined;
  }

  public pending(): PendingEntry[] {
    return Array.from(this.states, ([entity, state]) => ({ entity, state })).filter((entry) =>
      PENDING_STATES.includes(entry.state)
    );
  }

  public hasChanges(): boolean {
    return this.pending().length > 0;
  }

  /**
   * Marca como modificadas las entidades sin cambios que el predicado considera sucias.
   * @returns Número de entidades promovidas a `modified`
   */
  public detectChanges(isDirty: (entity: object) => boolean): number {
    let detected = 0;

    for (const [entity, state] of this.states) {
      if (state === EntityState.Unchanged && isDirty(entity)) {
        this.states.set(entity, EntityState.Modified);
        detected += 1;
      }
    }

    return detected;
  }

  /**
   * Da por escritas las entidades indicadas (por defecto, todas): las borradas dejan
   * de rastrearse y el resto pasa a `unchanged`.
   */
  public acceptChanges(entities: readonly object[] = Array.from(this.states.keys())): void {
    for (const entity of entities) {
      const state = this.states.get(entity);
      if (state === EntityState.Deleted) {
        this.states.delete(entity);
      } else if (state !== undefined && state !== EntityState.Unchanged) {
        this.states.set(entity, EntityState.Unchanged);
      }
    }
  }

  public clear(): void {
    this.states.clear();
  }

  public get size(): number {
    return this.states.size;
  }
}
