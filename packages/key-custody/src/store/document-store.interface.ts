import type { Observable } from 'rxjs';

/** Plain JSON-like document body. */
export type DocumentData = Record<string, unknown>;

/** Field value that removes the field in `update` and batch updates. */
export const FIELD_DELETE = Symbol('sealnote.fieldDelete');

export type DocumentSnapshot = {
  /** Last path segment */
  id: string;
  /** Full slash-separated path */
  path: string;
  /** null when the document does not exist */
  data: DocumentData | null;
};

export type QueryFilter = {
  field: string;
  equals: string | number | boolean;
};

export type BatchOperation =
  | { type: 'set'; path: string; data: DocumentData; merge?: boolean }
  | { type: 'update'; path: string; data: DocumentData }
  | { type: 'delete'; path: string };

/**
 * Remote document database holding device and recovery records.
 *
 * Paths alternate collection/document segments (`users/{uid}/devices/{id}`).
 * Implementations throw `E2eeError` with CONNECTIVITY_FAILURE for transport
 * problems so callers can tell them apart from missing documents.
 */
export interface DocumentStore {
  get(path: string): Promise<DocumentSnapshot>;

  /** Create or replace. `merge` keeps fields not present in `data`. */
  set(path: string, data: DocumentData, options?: { merge?: boolean }): Promise<void>;

  /** Patch an existing document; FIELD_DELETE removes a field. Rejects with NOT_FOUND when missing. */
  update(path: string, data: DocumentData): Promise<void>;

  delete(path: string): Promise<void>;

  /** Documents directly under a collection whose fields equal every filter. */
  query(collectionPath: string, filters?: QueryFilter[]): Promise<DocumentSnapshot[]>;

  /** Apply all operations atomically. */
  batch(operations: BatchOperation[]): Promise<void>;

  deleteCollection(collectionPath: string): Promise<void>;

  /** Emits the current snapshot, then one per change. Unsubscribe to stop. */
  watchDocument(path: string): Observable<DocumentSnapshot>;

  /** Emits the current result set, then one per change to the collection. */
  watchQuery(collectionPath: string, filters?: QueryFilter[]): Observable<DocumentSnapshot[]>;
}

export const DOCUMENT_STORE = 'DOCUMENT_STORE';
