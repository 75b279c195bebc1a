/**
 * Local Vector Store
 * Records live in memory and are persisted to `<directory>/index.json`.
 * Writes run one at a time and are committed with temp file, fsync, rename;
 * searches read the last committed snapshot. Records are copied in and out,
 * so callers never hold a reference into the index.
 */

import { Logger } from '@nestjs/common';
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { chunkMetadataSchema } from '../chunk.schema';
import { BaseVectorStore } from '../base-vector.store';
import { cosineSimilarity } from '../similarity';
import {
  VectorDimensionMismatchError,
  VectorStorePersistenceError,
} from '../vector-store.errors';
import type {
  DeleteResult,
  EmbeddedChunk,
  ScoredChunk,
  VectorStoreDescription,
} from '../vector-store.types';
import {
  asError,
  errorMessage,
  isMissingPathError,
} from '../../shared/utils/errors';

export const INDEX_FILE_NAME = 'index.json';

const storedRecordSchema = z.object({
  id: z.string(),
  content: z.string(),
  metadata: chunkMetadataSchema,
  vector: z.array(z.number()),
});

const indexFileSchema = z.object({
  version: z.literal(1),
  dimension: z.number().int().positive().nullable(),
  records: z.array(storedRecordSchema),
});

type StoredRecord = z.infer<typeof storedRecordSchema>;
type IndexFile = z.infer<typeof indexFileSchema>;

interface Snapshot {
  readonly dimension: number | null;
  readonly records: readonly StoredRecord[];
}

export class LocalVectorStore extends BaseVectorStore {
  private readonly logger = new Logger(LocalVectorStore.name);
  private readonly indexPath: string;
  private snapshot: Snapshot = { dimension: null, records: [] };
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(private readonly directory: string) {
    super();
    this.indexPath = path.join(directory, INDEX_FILE_NAME);
  }

  async initialize(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.indexPath, 'utf-8');
    } catch (error) {
      if (isMissingPathError(error)) {
        this.logger.log(`No index at ${this.indexPath}, starting empty`);
        return;
      }
      throw new VectorStorePersistenceError(
        this.indexPath,
        'Failed to read vector index',
        asError(error),
      );
    }

    let parsed: IndexFile;
    try {
      parsed = indexFileSchema.parse(JSON.parse(raw));
    } catch (error) {
      throw new VectorStorePersistenceError(
        this.indexPath,
        `Vector index is invalid: ${errorMessage(error)}`,
        asError(error),
      );
    }

    const { dimension, records } = parsed;
    if (dimension === null && records.length > 0) {
      throw new VectorStorePersistenceError(
        this.indexPath,
        'Vector index holds records without a dimension',
      );
    }
    const mismatched = records.find(
      (record) => record.vector.length !== dimension,
    );
    if (mismatched && dimension !== null) {
      throw new VectorDimensionMismatchError(
        dimension,
        mismatched.vector.length,
      );
    }

    this.snapshot = { dimension: parsed.dimension, records: parsed.records };
    this.logger.log(
      `Loaded ${parsed.records.length} records from ${this.indexPath}`,
    );
  }

  async add(records: EmbeddedChunk[]): Promise<number> {
    if (records.length === 0) {
      return 0;
    }

    return this.exclusive(async () => {
      const dimension = this.snapshot.dimension ?? records[0].vector.length;
      for (const record of records) {
        if (record.vector.length !== dimension) {
          throw new VectorDimensionMismatchError(
            dimension,
            record.vector.length,
          );
        }
      }

      const next: Snapshot = {
        dimension,
        records: [
          ...this.snapshot.records,
          ...records.map(({ chunk, vector }) => ({
            id: chunk.id,
            content: chunk.content,
            metadata: { ...chunk.metadata },
            vector: [...vector],
          })),
        ],
      };

      await this.persist(next);
      this.snapshot = next;

      this.logger.log(
        `Added ${records.length} records (total: ${next.records.length})`,
      );
      return records.length;
    });
  }

  async similaritySearchWithScore(
    vector: number[],
    k: number,
  ): Promise<ScoredChunk[]> {
    this.validateK(k);

    const { dimension, records } = this.snapshot;
    if (records.length === 0) {
      return [];
    }
    if (dimension !== null && vector.length !== dimension) {
      throw new VectorDimensionMismatchError(dimension, vector.length);
    }

    const scored = records.map((record, position) => ({
      record,
      position,
      score: cosineSimilarity(vector, record.vector),
    }));

    // Ties keep insertion order
    scored.sort((a, b) => b.score - a.score || a.position - b.position);

    return scored.slice(0, k).map(({ record, score }) => ({
      chunk: {
        id: record.id,
        content: record.content,
        metadata: { ...record.metadata },
      },
      score,
    }));
  }

  async deleteBySource(sourceFile: string): Promise<DeleteResult> {
    return this.exclusive(async () => {
      const remaining = this.snapshot.records.filter(
        (record) => record.metadata.sourceFile !== sourceFile,
      );
      const deletedCount = this.snapshot.records.length - remaining.length;

      if (deletedCount > 0) {
        const next: Snapshot = {
          dimension: this.snapshot.dimension,
          records: remaining,
        };
        await this.persist(next);
        this.snapshot = next;
      }

      this.logger.log(`Deleted ${deletedCount} records for ${sourceFile}`);
      return { supported: true, deletedCount };
    });
  }

  async count(): Promise<number> {
    return this.snapshot.records.length;
  }

  describe(): VectorStoreDescription {
    return {
      type: 'local',
      location: this.indexPath,
      dimension: this.snapshot.dimension,
    };
  }

  /**
   * Run a write after every earlier write has settled
   */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(task);
    // Failures reach the caller through `run`; the queue only orders writes
    this.writeQueue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async persist(snapshot: Snapshot): Promise<void> {
    const content: IndexFile = {
      version: 1,
      dimension: snapshot.dimension,
      records: [...snapshot.records],
    };
    const tempPath = `${this.indexPath}.${process.pid}.${Date.now()}.tmp`;

    try {
      await fs.mkdir(this.directory, { recursive: true });

      const handle = await fs.open(tempPath, 'w');
      try {
        await handle.writeFile(JSON.stringify(content), 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }

      await fs.rename(tempPath, this.indexPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new VectorStorePersistenceError(
        this.indexPath,
        'Failed to persist vector index',
        asError(error),
      );
    }
  }
}
