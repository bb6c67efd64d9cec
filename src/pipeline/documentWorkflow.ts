import { v4 as uuidv4 } from 'uuid';

import { describeError, InvalidStatusTransitionError } from '../errors';
import type { DocumentStore } from '../store/documents';
import type { EventLog } from '../store/events';
import type { UploadStore } from '../store/uploads';
import type { DocumentRecord } from '../types';
import type { IngestionCoordinator } from './ingestDocument';

export type DocumentWorkflowDeps = {
  documents: DocumentStore;
  uploads: UploadStore;
  events: EventLog;
  coordinator: IngestionCoordinator;
};

export type UploadInput = {
  bytes: Uint8Array;
  filename: string;
  courseName: string;
  ownerId: string;
};

/**
 * Runs ingestion for a queued document and records the outcome. Ingestion errors end
 * up on the record as `failed` plus the error text; the returned record tells the
 * caller which way it went.
 */
export const processDocument = async (
  { documents, events, coordinator }: DocumentWorkflowDeps,
  documentId: string,
): Promise<DocumentRecord> => {
  const record = documents.updateStatus(documentId, { status: 'processing' });

  try {
    const result = await coordinator.ingest(record.filePath, record.id, record.filename, record.uploadedBy);
    const completed = documents.updateStatus(record.id, {
      status: 'completed',
      chunksCreated: result.chunksCreated,
    });

    events.log(record.uploadedBy, 'document_processed', {
      document_id: record.id,
      chunks_created: result.chunksCreated,
    });

    return completed;
  } catch (error) {
    const errorMessage = describeError(error);
    console.error(`[ingest] ${record.filename} (${record.id}) failed: ${errorMessage}`);

    const failed = documents.updateStatus(record.id, { status: 'failed', errorMessage });
    events.log(record.uploadedBy, 'document_failed', {
      document_id: record.id,
      error: errorMessage,
    });

    return failed;
  }
};

export const uploadDocument = async (deps: DocumentWorkflowDeps, input: UploadInput): Promise<DocumentRecord> => {
  const id = uuidv4();
  const filePath = await deps.uploads.save(id, input.filename, input.bytes);

  deps.documents.create({
    id,
    filename: input.filename,
    filePath,
    uploadedBy: input.ownerId,
    courseName: input.courseName,
  });

  return processDocument(deps, id);
};

/**
 * Vectors go first, then the record, then the stored file. A document that is still
 * being ingested cannot be deleted.
 */
export const deleteDocument = async (
  { documents, uploads, events, coordinator }: DocumentWorkflowDeps,
  documentId: string,
  actorId?: string,
): Promise<DocumentRecord> => {
  const record = documents.require(documentId);

  if (record.status === 'processing' || coordinator.isIngesting(record.id)) {
    throw new InvalidStatusTransitionError(record.id, record.status, 'deleted');
  }

  await coordinator.removeDocument(record.id);
  documents.delete(record.id);
  await uploads.remove(record.filePath);

  events.log(actorId ?? record.uploadedBy, 'document_deleted', { document_id: record.id });
  console.info(`[documents] Deleted ${record.filename} (${record.id}).`);

  return record;
};
