import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { EmbeddingModel, createLazyLoader } from '../embedding-model.js';
import { EmbeddingService } from '../embedding.js';
import { l2Norm } from '../vector.js';
import { HashingEmbeddingModel } from './fakes.js';

describe('createLazyLoader', () => {
  it('loads once for concurrent first callers', async () => {
    const model = new HashingEmbeddingModel();
    const load = vi.fn(async () => model);
    const getModel = createLazyLoader(load);

    const [first, second] = await Promise.all([getModel(), getModel()]);
    const third = await getModel();

    expect(load).toHaveBeenCalledTimes(1);
    expect(first).toBe(model);
    expect(second).toBe(model);
    expect(third).toBe(model);
  });

  it('retries after a failed load', async () => {
    const model = new HashingEmbeddingModel();
    const load = vi
      .fn<() => Promise<EmbeddingModel>>()
      .mockRejectedValueOnce(new Error('model server down'))
      .mockResolvedValueOnce(model);
    const getModel = createLazyLoader(load);

    await expect(getModel()).rejects.toThrow('model server down');
    await expect(getModel()).resolves.toBe(model);
    expect(load).toHaveBeenCalledTimes(2);
  });
});

describe('EmbeddingService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns unit-length vectors', async () => {
    const service = new EmbeddingService({ loadModel: async () => new HashingEmbeddingModel(8), dimension: 8 });

    const vectors = await service.embedBatch(['def main(): pass', 'class Foo {}', 'x']);

    expect(vectors).toHaveLength(3);
    for (const vector of vectors) {
      expect(vector).toHaveLength(8);
      expect(l2Norm(vector)).toBeCloseTo(1, 10);
    }
  });

  it('splits input into batches and keeps input order', async () => {
    const model = new HashingEmbeddingModel(8);
    const service = new EmbeddingService({ loadModel: async () => model, dimension: 8, batchSize: 2 });
    const texts = ['a', 'b', 'c', 'd', 'e'];

    const vectors = await service.embedBatch(texts);

    expect(model.calls).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
    // 'a' is code point 97, bucket 97 % 8 = 1; 'e' is 101, bucket 5.
    expect(vectors[0]).toEqual([0, 1, 0, 0, 0, 0, 0, 0]);
    expect(vectors[4]).toEqual([0, 0, 0, 0, 0, 1, 0, 0]);
  });

  it('embeds a single text like the batch path does', async () => {
    const service = new EmbeddingService({ loadModel: async () => new HashingEmbeddingModel(4), dimension: 4 });

    const single = await service.embed('abcd');
    const [batched] = await service.embedBatch(['abcd']);

    expect(single).toEqual(batched);
    expect(single).toEqual([0.5, 0.5, 0.5, 0.5]);
  });

  it('does not load the model for an empty batch', async () => {
    const loadModel = vi.fn(async () => new HashingEmbeddingModel());
    const service = new EmbeddingService({ loadModel, dimension: 8 });

    await expect(service.embedBatch([])).resolves.toEqual([]);
    expect(loadModel).not.toHaveBeenCalled();
  });

  it('rejects vectors of the wrong dimension', async () => {
    const service = new EmbeddingService({ loadModel: async () => new HashingEmbeddingModel(4), dimension: 8 });

    await expect(service.embed('abc')).rejects.toThrow('Embedding dimension mismatch: expected 8, received 4');
  });
});
