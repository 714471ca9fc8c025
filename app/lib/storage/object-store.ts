/**
 * Object store capability used by the task step functions.
 *
 * Implementations report whole-call failures by throwing `StoreError`;
 * per-key outcomes of a batch delete come back in the result instead.
 */

export interface StoredObject {
  key: string;
  size: number;
}

export interface ListObjectsOptions {
  prefix?: string;
  continuationToken?: string | null;
  maxKeys?: number;
}

export interface ObjectPage {
  objects: StoredObject[];
  nextContinuationToken: string | null;
}

export interface BatchDeleteError {
  key: string;
  code: string;
  message: string;
}

export interface BatchDeleteResult {
  deleted: string[];
  errors: BatchDeleteError[];
}

export interface ObjectStore {
  listObjects(bucket: string, options?: ListObjectsOptions): Promise<ObjectPage>;
  deleteObject(bucket: string, key: string): Promise<void>;
  deleteObjects(bucket: string, keys: string[]): Promise<BatchDeleteResult>;
  headObject(bucket: string, key: string): Promise<{ size: number }>;
  deleteBucket(bucket: string): Promise<void>;
}

/** Largest batch a single DeleteObjects call accepts */
export const MAX_DELETE_BATCH = 1000;
