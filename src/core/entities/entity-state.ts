/**
 * Operación pendiente asociada a una entidad rastreada por un contexto. Determina
 * qué hará el próximo `saveChanges()` con esa entidad.
 */
export enum EntityState {
  Detached = 'detached',
  Unchanged = 'unchanged',
  Added = 'added',
  Modified = 'modified',
  Deleted = 'deleted'
}

export const PENDING_STATES: readonly EntityState[] = [
  EntityState.Added,
  EntityState.Modified,
  EntityState.Deleted
];
