import { FileFormat } from '../../ingestion/types/ingestion.types';
import {
  InvalidSearchParameterError,
  VectorDimensionMismatchError,
  VectorStoreError,
} from '../vector-store.errors';
import { QdrantVectorStore, SOURCE_FILE_KEY } from './qdrant-vector.store';

const metadata = {
  sourceFile: '/docs/policy.md',
  fileName: 'policy.md',
  fileType: '.md',
  format: FileFormat.MARKDOWN,
  chunkIndex: 0,
  startOffset: 0,
  endOffset: 18,
};

function createClient() {
  return {
    collectionExists: jest.fn().mockResolvedValue({ exists: false }),
    getCollection: jest.fn(),
    createCollection: jest.fn().mockResolvedValue(true),
    createPayloadIndex: jest.fn().mockResolvedValue({}),
    upsert: jest.fn().mockResolvedValue({}),
    search: jest.fn().mockResolvedValue([]),
    delete: jest.fn().mockResolvedValue({}),
    count: jest.fn().mockResolvedValue({ count: 0 }),
  };
}

describe('QdrantVectorStore', () => {
  let client: ReturnType<typeof createClient>;
  let store: QdrantVectorStore;

  beforeEach(() => {
    client = createClient();
    store = new QdrantVectorStore(client, 'documents', 'http://qdrant.test:6333');
  });

  describe('without a collection', () => {
    beforeEach(async () => {
      await store.initialize();
    });

    it('reports an empty index without querying', async () => {
      expect(await store.count()).toBe(0);
      expect(await store.similaritySearchWithScore([0.1, 0.2], 2)).toEqual([]);
      expect(client.count).not.toHaveBeenCalled();
      expect(client.search).not.toHaveBeenCalled();
    });

    it('creates the collection from the first batch and upserts durably', async () => {
      await store.add([
        {
          chunk: { id: 'chunk-1', content: 'Vacation is 20 days', metadata },
          vector: [0.1, 0.2, 0.3],
        },
      ]);

      expect(client.createCollection).toHaveBeenCalledWith('documents', {
        vectors: { size: 3, distance: 'Cosine' },
      });
      expect(client.createPayloadIndex).toHaveBeenCalledWith('documents', {
        field_name: SOURCE_FILE_KEY,
        field_schema: 'keyword',
        wait: true,
      });
      expect(client.upsert).toHaveBeenCalledWith('documents', {
        wait: true,
        points: [
          {
            id: 'chunk-1',
            vector: [0.1, 0.2, 0.3],
            payload: { content: 'Vacation is 20 days', metadata },
          },
        ],
      });
      expect(store.describe()).toEqual({
        type: 'qdrant',
        location: 'http://qdrant.test:6333/collections/documents',
        dimension: 3,
      });
    });

    it('still adds when the payload index cannot be created', async () => {
      client.createPayloadIndex.mockRejectedValue(new Error('index exists'));

      await expect(
        store.add([
          { chunk: { id: 'chunk-1', content: 'text', metadata }, vector: [1, 0] },
        ]),
      ).resolves.toBe(1);
      expect(client.upsert).toHaveBeenCalledTimes(1);
    });

    it('creates the collection once for concurrent first batches', async () => {
      const results = await Promise.allSettled([
        store.add([
          { chunk: { id: 'chunk-1', content: 'one', metadata }, vector: [1, 0] },
        ]),
        store.add([
          { chunk: { id: 'chunk-2', content: 'two', metadata }, vector: [0, 1] },
        ]),
      ]);

      expect(results.map((r) => r.status)).toEqual(['fulfilled', 'fulfilled']);
      expect(client.createCollection).toHaveBeenCalledTimes(1);
      expect(client.upsert).toHaveBeenCalledTimes(2);
    });

    it('retries creation after a failed attempt', async () => {
      client.createCollection
        .mockRejectedValueOnce(new Error('connection reset'))
        .mockResolvedValueOnce(true);
      const batch = [
        { chunk: { id: 'chunk-1', content: 'one', metadata }, vector: [1, 0] },
      ];

      await expect(store.add(batch)).rejects.toThrow('connection reset');
      await expect(store.add(batch)).resolves.toBe(1);
      expect(client.createCollection).toHaveBeenCalledTimes(2);
    });
  });

  describe('with an existing collection', () => {
    beforeEach(async () => {
      client.collectionExists.mockResolvedValue({ exists: true });
      client.getCollection.mockResolvedValue({
        config: { params: { vectors: { size: 2, distance: 'Cosine' } } },
      });
      await store.initialize();
    });

    it('maps scored points to chunks', async () => {
      client.search.mockResolvedValue([
        {
          id: 'chunk-1',
          version: 1,
          score: 0.92,
          payload: { content: 'Vacation is 20 days', metadata },
        },
      ]);

      const results = await store.similaritySearchWithScore([0.6, 0.8], 4);

      expect(client.search).toHaveBeenCalledWith('documents', {
        vector: [0.6, 0.8],
        limit: 4,
        with_payload: true,
      });
      expect(results).toEqual([
        {
          chunk: { id: 'chunk-1', content: 'Vacation is 20 days', metadata },
          score: 0.92,
        },
      ]);
    });

    it('rejects points with an invalid payload', async () => {
      client.search.mockResolvedValue([
        { id: 7, version: 1, score: 0.5, payload: { text: 'legacy' } },
      ]);

      await expect(
        store.similaritySearchWithScore([0.6, 0.8], 1),
      ).rejects.toThrow(VectorStoreError);
    });

    it('rejects vectors of another dimension', async () => {
      await expect(
        store.add([
          { chunk: { id: 'chunk-1', content: 'text', metadata }, vector: [1, 0, 0] },
        ]),
      ).rejects.toThrow(VectorDimensionMismatchError);
      expect(client.upsert).not.toHaveBeenCalled();
      expect(client.createCollection).not.toHaveBeenCalled();
    });

    it('rejects a non-positive k', async () => {
      await expect(store.similaritySearchWithScore([0.6, 0.8], 0)).rejects.toThrow(
        InvalidSearchParameterError,
      );
    });

    it('deletes by source file filter', async () => {
      client.count.mockResolvedValue({ count: 2 });
      const filter = {
        must: [{ key: SOURCE_FILE_KEY, match: { value: '/docs/policy.md' } }],
      };

      const result = await store.deleteBySource('/docs/policy.md');

      expect(result).toEqual({ supported: true, deletedCount: 2 });
      expect(client.count).toHaveBeenCalledWith('documents', {
        filter,
        exact: true,
      });
      expect(client.delete).toHaveBeenCalledWith('documents', {
        wait: true,
        filter,
      });
    });

    it('counts points exactly', async () => {
      client.count.mockResolvedValue({ count: 12 });

      expect(await store.count()).toBe(12);
    });
  });
});
