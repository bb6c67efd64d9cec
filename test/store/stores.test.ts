import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { InvalidStatusTransitionError, NotFoundError } from '../../src/errors';
import { GeneratedContentStore } from '../../src/store/content';
import { DocumentStore } from '../../src/store/documents';
import { EventLog } from '../../src/store/events';
import { safeFileName, UploadStore } from '../../src/store/uploads';
import { synthesizeQuestions } from '../../src/pipeline/resolveQuestions';
import { makeTempDir } from '../support/fakes';

const clock = (): (() => Date) => {
  let tick = 0;
  return () => new Date(Date.UTC(2024, 0, 1, 9, 0, tick++));
};

const newDocument = (id: string, uploadedBy = 'prof-1') => ({
  id,
  filename: `${id}.pdf`,
  filePath: `/uploads/${id}.pdf`,
  uploadedBy,
  courseName: 'Biology 101',
});

describe('DocumentStore', () => {
  let dataDir: string;
  let store: DocumentStore;

  beforeEach(() => {
    dataDir = makeTempDir();
    store = new DocumentStore(dataDir, clock());
  });

  it('creates queued records', () => {
    expect(store.create(newDocument('doc-1'))).toEqual({
      id: 'doc-1',
      filename: 'doc-1.pdf',
      filePath: '/uploads/doc-1.pdf',
      uploadedBy: 'prof-1',
      courseName: 'Biology 101',
      status: 'queued',
      chunksCreated: null,
      errorMessage: null,
      createdAt: '2024-01-01T09:00:00.000Z',
      updatedAt: '2024-01-01T09:00:00.000Z',
    });
  });

  it('walks a document through processing to completed', () => {
    store.create(newDocument('doc-1'));
    store.updateStatus('doc-1', { status: 'processing' });
    const completed = store.updateStatus('doc-1', { status: 'completed', chunksCreated: 4 });

    expect(completed).toMatchObject({ status: 'completed', chunksCreated: 4, errorMessage: null });
    expect(completed.updatedAt).toBe('2024-01-01T09:00:02.000Z');
  });

  it('records the error of a failed document', () => {
    store.create(newDocument('doc-1'));
    store.updateStatus('doc-1', { status: 'processing' });

    expect(store.updateStatus('doc-1', { status: 'failed', errorMessage: 'No readable text found in doc-1.pdf.' })).toMatchObject({
      status: 'failed',
      chunksCreated: null,
      errorMessage: 'No readable text found in doc-1.pdf.',
    });
  });

  it('refuses transitions outside the lifecycle', () => {
    store.create(newDocument('doc-1'));

    expect(() => store.updateStatus('doc-1', { status: 'completed', chunksCreated: 1 })).toThrow(
      new InvalidStatusTransitionError('doc-1', 'queued', 'completed'),
    );

    store.updateStatus('doc-1', { status: 'processing' });
    store.updateStatus('doc-1', { status: 'completed', chunksCreated: 1 });

    expect(() => store.updateStatus('doc-1', { status: 'processing' })).toThrow(InvalidStatusTransitionError);
    expect(store.require('doc-1').status).toBe('completed');
  });

  it('lists newest first with filters', () => {
    store.create(newDocument('doc-1'));
    store.create(newDocument('doc-2', 'prof-2'));
    store.create(newDocument('doc-3'));
    store.updateStatus('doc-3', { status: 'processing' });

    expect(store.list().map((record) => record.id)).toEqual(['doc-3', 'doc-2', 'doc-1']);
    expect(store.list({ uploadedBy: 'prof-1' }).map((record) => record.id)).toEqual(['doc-3', 'doc-1']);
    expect(store.list({ status: 'queued' }).map((record) => record.id)).toEqual(['doc-2', 'doc-1']);
  });

  it('reloads records from disk', () => {
    const created = store.create(newDocument('doc-1'));

    expect(new DocumentStore(dataDir).get('doc-1')).toEqual(created);
  });

  it('skips malformed records on load', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const valid = store.create(newDocument('doc-1'));
    fs.writeFileSync(path.join(dataDir, 'documents.json'), JSON.stringify([valid, { id: 'doc-2' }]));

    const reloaded = new DocumentStore(dataDir);

    expect(reloaded.count()).toBe(1);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it('keeps the previous state when a write fails', () => {
    store.create(newDocument('doc-1'));
    fs.rmSync(dataDir, { recursive: true, force: true });

    expect(() => store.updateStatus('doc-1', { status: 'processing' })).toThrow(/ENOENT/);
    expect(store.require('doc-1').status).toBe('queued');
    expect(() => store.create(newDocument('doc-2'))).toThrow(/ENOENT/);
    expect(store.get('doc-2')).toBeUndefined();
  });

  it('throws NotFoundError for unknown ids', () => {
    expect(() => store.require('missing')).toThrow(new NotFoundError('Document missing not found.'));
    expect(store.delete('missing')).toBe(false);
  });
});

describe('GeneratedContentStore', () => {
  it('stores frozen records with their origin', () => {
    const dataDir = makeTempDir();
    const store = new GeneratedContentStore(dataDir, clock());

    const record = store.store({
      contentType: 'viva',
      facultyId: 'prof-1',
      documentIds: ['doc-1'],
      resolved: { origin: 'synthesized', questions: synthesizeQuestions(2, 'viva') },
    });

    expect(Object.isFrozen(record)).toBe(true);
    expect(record).toMatchObject({ contentType: 'viva', origin: 'synthesized', createdAt: '2024-01-01T09:00:00.000Z' });
    expect(record.questions).toHaveLength(2);
    expect(new GeneratedContentStore(dataDir).get(record.id)).toEqual(record);
  });

  it('lists by faculty and rejects unknown ids', () => {
    const store = new GeneratedContentStore(makeTempDir(), clock());
    store.store({ contentType: 'mcq', facultyId: 'prof-1', documentIds: ['a'], resolved: { origin: 'parsed', questions: [1] } });
    store.store({ contentType: 'mcq', facultyId: 'prof-2', documentIds: ['a'], resolved: { origin: 'parsed', questions: [2] } });

    expect(store.listByFaculty('prof-1').map((record) => record.questions)).toEqual([[1]]);
    expect(store.count()).toBe(2);
    expect(() => store.get('missing')).toThrow(NotFoundError);
  });
});

describe('EventLog', () => {
  it('filters events by user and type', () => {
    const dataDir = makeTempDir();
    const events = new EventLog(dataDir, clock());
    events.log('student-1', 'chat_interaction', { mode: 'qa' });
    events.log('prof-1', 'content_generated', { content_type: 'mcq', num_items: 5, origin: 'parsed' });
    events.log('student-1', 'chat_interaction', { mode: 'notes' });

    expect(events.list({ userId: 'student-1' }).map((event) => event.data.mode)).toEqual(['qa', 'notes']);
    expect(new EventLog(dataDir).list({ eventType: 'content_generated' })).toHaveLength(1);
  });
});

describe('UploadStore', () => {
  it.each([
    ['Week 1 Notes (final).pdf', 'Week_1_Notes_final_.pdf'],
    ['../../etc/passwd', 'passwd'],
    ['.hidden.pdf', 'hidden.pdf'],
    ['...', 'upload.pdf'],
  ])('turns %s into %s', (input, expected) => {
    expect(safeFileName(input)).toBe(expected);
  });

  it('saves bytes under the document id and removes them idempotently', async () => {
    const uploadsDir = path.join(makeTempDir(), 'uploads');
    const uploads = new UploadStore(uploadsDir);

    const filePath = await uploads.save('doc-1', 'lecture.pdf', Buffer.from('%PDF-1.4'));

    expect(filePath).toBe(path.join(uploadsDir, 'doc-1_lecture.pdf'));
    expect(fs.readFileSync(filePath, 'utf-8')).toBe('%PDF-1.4');

    await uploads.remove(filePath);
    await expect(uploads.remove(filePath)).resolves.toBeUndefined();
    expect(fs.existsSync(filePath)).toBe(false);
  });
});

afterEach(() => {
  vi.restoreAllMocks();
});
