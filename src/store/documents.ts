import path from 'node:path';

import { InvalidStatusTransitionError, NotFoundError } from '../errors';
import type { DocumentRecord, DocumentStatus } from '../types';
import { isPlainObject, JsonFileCollection } from './jsonFile';

const STATUSES: readonly DocumentStatus[] = ['queued', 'processing', 'completed', 'failed'];

const ALLOWED_TRANSITIONS: Record<DocumentStatus, readonly DocumentStatus[]> = {
  queued: ['processing'],
  processing: ['completed', 'failed'],
  completed: [],
  failed: [],
};

const isDocumentRecord = (value: unknown): value is DocumentRecord => {
  if (!isPlainObject(value)) {
    return false;
  }

  const { status } = value;

  return (
    typeof value.id === 'string' &&
    typeof value.filename === 'string' &&
    typeof value.filePath === 'string' &&
    typeof value.uploadedBy === 'string' &&
    STATUSES.some((candidate) => candidate === status)
  );
};

export type NewDocument = {
  id: string;
  filename: string;
  filePath: string;
  uploadedBy: string;
  courseName?: string | null;
};

export type StatusUpdate =
  | { status: 'processing' }
  | { status: 'completed'; chunksCreated: number }
  | { status: 'failed'; errorMessage: string };

export type DocumentQuery = {
  uploadedBy?: string;
  status?: DocumentStatus;
};

export class DocumentStore {
  private readonly collection: JsonFileCollection<DocumentRecord>;

  constructor(dataDir: string, private readonly now: () => Date = () => new Date()) {
    this.collection = new JsonFileCollection(path.join(dataDir, 'documents.json'), isDocumentRecord);
  }

  create({ id, filename, filePath, uploadedBy, courseName }: NewDocument): DocumentRecord {
    const timestamp = this.now().toISOString();

    return this.collection.insert({
      id,
      filename,
      filePath,
      uploadedBy,
      courseName: courseName ?? null,
      status: 'queued',
      chunksCreated: null,
      errorMessage: null,
      createdAt: timestamp,
      updatedAt: timestamp,
    });
  }

  get(id: string): DocumentRecord | undefined {
    return this.collection.get(id);
  }

  require(id: string): DocumentRecord {
    const record = this.collection.get(id);
    if (!record) {
      throw new NotFoundError(`Document ${id} not found.`);
    }
    return record;
  }

  /** Newest first. */
  list({ uploadedBy, status }: DocumentQuery = {}): DocumentRecord[] {
    return this.collection
      .values()
      .filter((record) => (uploadedBy === undefined || record.uploadedBy === uploadedBy))
      .filter((record) => (status === undefined || record.status === status))
      .sort((left, right) => right.createdAt.localeCompare(left.createdAt));
  }

  /** Completed and failed are terminal: a document in either state only accepts deletion. */
  updateStatus(id: string, update: StatusUpdate): DocumentRecord {
    const existing = this.require(id);

    if (!ALLOWED_TRANSITIONS[existing.status].includes(update.status)) {
      throw new InvalidStatusTransitionError(id, existing.status, update.status);
    }

    return this.collection.replace({
      ...existing,
      status: update.status,
      chunksCreated: update.status === 'completed' ? update.chunksCreated : existing.chunksCreated,
      errorMessage: update.status === 'failed' ? update.errorMessage : existing.errorMessage,
      updatedAt: this.now().toISOString(),
    });
  }

  delete(id: string): boolean {
    return this.collection.remove(id);
  }

  count(): number {
    return this.collection.size();
  }
}
