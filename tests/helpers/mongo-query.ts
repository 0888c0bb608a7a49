import mongoose from 'mongoose';

const restorers: Array<() => void> = [];

/**
 * Sustituye el paso interno de `exec()` que lee la colección en las consultas
 * `find`. El resto de `exec()` (middleware y `transform`) sigue ejecutándose.
 */
export const stubCollectionRead = (documents: object[]): void => {
  const original: unknown = Reflect.get(mongoose.Query.prototype, '_find');
  Reflect.set(mongoose.Query.prototype, '_find', async () => documents);
  restorers.push(() => Reflect.set(mongoose.Query.prototype, '_find', original));
};

export const restoreCollectionReads = (): void => {
  restorers.splice(0).reverse().forEach((restore) => restore());
};
