import type {
  DocumentStats,
  LoadFailure,
} from '../ingestion/types/ingestion.types';

/**
 * Readiness of the shared index. Only moves forward.
 */
export enum IndexState {
  UNINITIALIZED = 'UNINITIALIZED',
  READY = 'READY',
}

export type OperationStatus = 'success' | 'warning' | 'error';

export interface LoadDocumentsResult {
  status: OperationStatus;
  message: string;
  stats?: DocumentStats;
  failures: LoadFailure[];
}

export interface AddDocumentResult {
  status: OperationStatus;
  message: string;
  chunkCount: number;
}

export interface RemoveDocumentResult {
  status: OperationStatus;
  message: string;
  deletedCount: number;
}
