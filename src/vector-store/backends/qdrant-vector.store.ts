/**
 * Qdrant Vector Store
 * One point per chunk with `{ content, metadata }` as payload. The collection
 * is created with the first batch's dimension and Cosine distance.
 */

import { Logger } from '@nestjs/common';
import type { QdrantClient } from '@qdrant/js-client-rest';
import { chunkPayloadSchema } from '../chunk.schema';
import { BaseVectorStore } from '../base-vector.store';
import {
  VectorDimensionMismatchError,
  VectorStoreError,
} from '../vector-store.errors';
import type {
  DeleteResult,
  EmbeddedChunk,
  ScoredChunk,
  VectorStoreDescription,
} from '../vector-store.types';
import { errorMessage } from '../../shared/utils/errors';

export const SOURCE_FILE_KEY = 'metadata.sourceFile';

export type QdrantVectorClient = Pick<
  QdrantClient,
  | 'collectionExists'
  | 'getCollection'
  | 'createCollection'
  | 'createPayloadIndex'
  | 'upsert'
  | 'search'
  | 'delete'
  | 'count'
>;

export class QdrantVectorStore extends BaseVectorStore {
  private readonly logger = new Logger(QdrantVectorStore.name);
  private collectionExists = false;
  private dimension: number | null = null;
  private collectionCreation: Promise<void> | null = null;

  constructor(
    private readonly client: QdrantVectorClient,
    private readonly collectionName: string,
    private readonly url: string,
  ) {
    super();
  }

  async initialize(): Promise<void> {
    const { exists } = await this.client.collectionExists(this.collectionName);
    this.collectionExists = exists;

    if (!exists) {
      this.logger.log(
        `Collection "${this.collectionName}" will be created on first add`,
      );
      return;
    }

    const info = await this.client.getCollection(this.collectionName);
    const vectors = info.config.params.vectors;
    if (vectors && 'size' in vectors && typeof vectors.size === 'number') {
      this.dimension = vectors.size;
    }

    this.logger.log(
      `Using collection "${this.collectionName}" (${this.dimension ?? 'unknown'}D)`,
    );
  }

  async add(records: EmbeddedChunk[]): Promise<number> {
    if (records.length === 0) {
      return 0;
    }

    const dimension = this.dimension ?? records[0].vector.length;
    for (const record of records) {
      if (record.vector.length !== dimension) {
        throw new VectorDimensionMismatchError(dimension, record.vector.length);
      }
    }

    await this.ensureCollection(dimension);

    await this.client.upsert(this.collectionName, {
      wait: true,
      points: records.map(({ chunk, vector }) => ({
        id: chunk.id,
        vector,
        payload: { content: chunk.content, metadata: chunk.metadata },
      })),
    });

    this.logger.log(
      `Upserted ${records.length} points to "${this.collectionName}"`,
    );
    return records.length;
  }

  async similaritySearchWithScore(
    vector: number[],
    k: number,
  ): Promise<ScoredChunk[]> {
    this.validateK(k);

    if (!this.collectionExists) {
      return [];
    }
    if (this.dimension !== null && vector.length !== this.dimension) {
      throw new VectorDimensionMismatchError(this.dimension, vector.length);
    }

    const results = await this.client.search(this.collectionName, {
      vector,
      limit: k,
      with_payload: true,
    });

    return results.map((result) => {
      const parsed = chunkPayloadSchema.safeParse(result.payload);
      if (!parsed.success) {
        throw new VectorStoreError(
          `Point ${String(result.id)} has an invalid payload: ${parsed.error.message}`,
        );
      }

      return {
        chunk: {
          id: String(result.id),
          content: parsed.data.content,
          metadata: parsed.data.metadata,
        },
        score: result.score,
      };
    });
  }

  async deleteBySource(sourceFile: string): Promise<DeleteResult> {
    if (!this.collectionExists) {
      return { supported: true, deletedCount: 0 };
    }

    const filter = {
      must: [{ key: SOURCE_FILE_KEY, match: { value: sourceFile } }],
    };

    const { count } = await this.client.count(this.collectionName, {
      filter,
      exact: true,
    });

    if (count > 0) {
      await this.client.delete(this.collectionName, { wait: true, filter });
    }

    this.logger.log(`Deleted ${count} points for ${sourceFile}`);
    return { supported: true, deletedCount: count };
  }

  async count(): Promise<number> {
    if (!this.collectionExists) {
      return 0;
    }

    const { count } = await this.client.count(this.collectionName, {
      exact: true,
    });
    return count;
  }

  describe(): VectorStoreDescription {
    return {
      type: 'qdrant',
      location: `${this.url}/collections/${this.collectionName}`,
      dimension: this.dimension,
    };
  }

  private async ensureCollection(dimension: number): Promise<void> {
    if (this.collectionExists) {
      if (this.dimension === null) {
        this.dimension = dimension;
      }
      return;
    }

    // Concurrent first writes share one creation
    if (!this.collectionCreation) {
      this.collectionCreation = this.createCollection(dimension).catch(
        (error: unknown) => {
          this.collectionCreation = null;
          throw error;
        },
      );
    }
    await this.collectionCreation;

    if (this.dimension !== null && this.dimension !== dimension) {
      throw new VectorDimensionMismatchError(this.dimension, dimension);
    }
  }

  private async createCollection(dimension: number): Promise<void> {
    this.logger.log(
      `Creating collection "${this.collectionName}" (${dimension}D, Cosine)`,
    );

    await this.client.createCollection(this.collectionName, {
      vectors: { size: dimension, distance: 'Cosine' },
    });
    this.collectionExists = true;
    this.dimension = dimension;

    try {
      await this.client.createPayloadIndex(this.collectionName, {
        field_name: SOURCE_FILE_KEY,
        field_schema: 'keyword',
        wait: true,
      });
    } catch (error) {
      // Deletes still work without the index, only slower
      this.logger.warn(
        `Could not create payload index on ${SOURCE_FILE_KEY}: ${errorMessage(error)}`,
      );
    }
  }
}
