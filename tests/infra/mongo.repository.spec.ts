import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import mongoose from 'mongoose';

import type { ContextOptions } from '@core/contracts/db-context.js';
import { EntityState } from '@core/entities/entity-state.js';
import { MongoDbContext } from '@infra/db/mongo/mongo-db-context.js';
import type { MongoQuery } from '@infra/db/mongo/mongo-entity-set.js';
import { MongoRepository } from '@infra/db/mongo/mongo.repository.js';
import { ItemModel, hydrateItem, type Item } from '@tests/fixtures/item.model.js';
import { restoreCollectionReads, stubCollectionRead } from '@tests/helpers/mongo-query.js';

describe('MongoRepository', () => {
  let contexts: MongoDbContext[];

  const contextFactory = (options: ContextOptions): MongoDbContext => {
    const context = new MongoDbContext(options);
    contexts.push(context);
    return context;
  };

  const createRepository = (options: { autoDetectChanges?: boolean; lazyLoading?: boolean } = {}) =>
    new MongoRepository(ItemModel, { ...options, contextFactory });

  beforeEach(() => {
    contexts = [];
  });

  afterEach(() => {
    restoreCollectionReads();
  });

  describe('get', () => {
    it('debe buscar por _id y liberar el contexto', async () => {
      const stored = hydrateItem({ name: 'Mesa' });
      const exec = jest.spyOn(mongoose.Query.prototype, 'exec').mockResolvedValue(stored);

      const item = await createRepository().get(stored._id);

      expect(item).toBe(stored);
      expect(exec).toHaveBeenCalledTimes(1);
      expect(contexts).toHaveLength(1);
      expect(contexts[0]?.disposed).toBe(true);
    });

    it('debe aceptar el _id como cadena', async () => {
      jest.spyOn(mongoose.Query.prototype, 'exec').mockResolvedValue(null);
      const findById = jest.spyOn(ItemModel, 'findById');
      const id = new mongoose.Types.ObjectId().toHexString();

      await expect(createRepository().get(id)).resolves.toBeNull();
      expect(findById).toHaveBeenCalledWith(id);
    });
  });

  describe('getAll', () => {
    it('debe aplicar el filtro a la consulta antes de ejecutarla', async () => {
      const stored = [hydrateItem({ name: 'Vela', price: 4 })];
      jest.spyOn(mongoose.Query.prototype, 'exec').mockResolvedValue(stored);
      let captured: MongoQuery<Item> | undefined;

      const items = await createRepository().getAll((query) => {
        captured = query.where('price').lt(10).sort({ name: 1 });
        return captured;
      });

      expect(items).toBe(stored);
      expect(captured?.getFilter()).toEqual({ price: { $lt: 10 } });
      expect(captured?.getOptions().sort).toEqual({ name: 1 });
      expect(contexts[0]?.disposed).toBe(true);
    });

    it('debe pasar el parámetro adicional al filtro', async () => {
      jest.spyOn(mongoose.Query.prototype, 'exec').mockResolvedValue([]);
      let captured: MongoQuery<Item> | undefined;

      await createRepository().getAll((query, name: string) => {
        captured = query.where({ name });
        return captured;
      }, 'Vela');

      expect(captured?.getFilter()).toEqual({ name: 'Vela' });
    });

    it('con carga perezosa debe poblar las referencias del modelo', async () => {
      jest.spyOn(mongoose.Query.prototype, 'exec').mockResolvedValue([]);
      let captured: MongoQuery<Item> | undefined;

      await createRepository({ lazyLoading: true }).getAll((query) => {
        captured = query;
        return query;
      });

      expect(captured?.getPopulatedPaths()).toEqual(['category', 'tags']);
    });

    it('con un contexto aportado debe devolver la consulta sin ejecutarla', async () => {
      const exec = jest.spyOn(mongoose.Query.prototype, 'exec');
      const repository = createRepository();
      const context = repository.createContext();

      const view = repository.getAll(context);

      expect(view.getFilter()).toEqual({});
      expect(exec).not.toHaveBeenCalled();
      expect(context.disposed).toBe(false);
      await context.dispose();
    });
  });

  describe('getAll sobre un contexto aportado', () => {
    it('debe rastrear los documentos al ejecutar la vista', async () => {
      const stored = hydrateItem({ name: 'Cesta', price: 8 });
      stubCollectionRead([stored]);
      const repository = createRepository();
      const context = repository.createContext();

      const items = await repository.getAll(context).where('price').lt(10).exec();

      expect(items).toEqual([stored]);
      expect(context.entry(stored).state).toBe(EntityState.Unchanged);
      await context.dispose();
    });

    it('debe permitir actualizar en el mismo contexto lo que devolvió la vista', async () => {
      const stored = hydrateItem({ name: 'Cesta', price: 8 });
      stubCollectionRead([stored]);
      const save = jest.spyOn(stored, 'save').mockResolvedValue(stored);
      const repository = createRepository({ autoDetectChanges: true });
      const context = repository.createContext();

      const [item] = await repository.getAll(context).exec();
      if (item) {
        item.price = 9;
      }

      await expect(context.saveChanges()).resolves.toBe(1);
      expect(save).toHaveBeenCalledTimes(1);
      await context.dispose();
    });
  });

  describe('mutaciones', () => {
    it('add debe insertar el documento con un único commit', async () => {
      const item = new ItemModel({ name: 'Flexo', price: 15 });
      const save = jest.spyOn(item, 'save').mockResolvedValue(item);

      await expect(createRepository().add(item)).resolves.toBe(item);

      expect(save).toHaveBeenCalledTimes(1);
      expect(contexts).toHaveLength(1);
      expect(contexts[0]?.disposed).toBe(true);
    });

    it('update debe guardar el documento marcado como modificado', async () => {
      const item = hydrateItem({ price: 30 });
      const save = jest.spyOn(item, 'save').mockResolvedValue(item);

      await expect(createRepository().update(item)).resolves.toBe(item);

      expect(save).toHaveBeenCalledTimes(1);
      expect(item.isModified('price')).toBe(true);
    });

    it('delete debe borrar el documento', async () => {
      const item = hydrateItem();
      const exec = jest.spyOn(mongoose.Query.prototype, 'exec').mockResolvedValue({ acknowledged: true, deletedCount: 1 });

      await expect(createRepository().delete(item)).resolves.toBeUndefined();

      expect(exec).toHaveBeenCalledTimes(1);
      expect(contexts[0]?.disposed).toBe(true);
    });

    it('debe liberar el contexto y propagar el error si falla la escritura', async () => {
      const item = new ItemModel({ name: 'Flexo', price: 15 });
      const failure = new Error('E11000 duplicate key error');
      jest.spyOn(item, 'save').mockRejectedValue(failure);

      await expect(createRepository().add(item)).rejects.toBe(failure);
      expect(contexts[0]?.disposed).toBe(true);
    });

    it('con un contexto aportado no debe escribir hasta saveChanges', async () => {
      const item = new ItemModel({ name: 'Flexo', price: 15 });
      const save = jest.spyOn(item, 'save').mockResolvedValue(item);
      const repository = createRepository();
      const context = repository.createContext();

      repository.add(item, context);

      expect(context.entry(item).state).toBe(EntityState.Added);
      expect(save).not.toHaveBeenCalled();

      await expect(context.saveChanges()).resolves.toBe(1);
      expect(save).toHaveBeenCalledTimes(1);
      await context.dispose();
    });
  });

  it('debe usar la fábrica de MongoDB por defecto', () => {
    const context = new MongoRepository(ItemModel, { lazyLoading: true }).createContext();

    expect(context).toBeInstanceOf(MongoDbContext);
    expect(context.options).toEqual({ autoDetectChanges: false, lazyLoading: true });
  });
});
