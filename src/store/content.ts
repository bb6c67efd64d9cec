import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';

import { NotFoundError } from '../errors';
import type { ContentType, GeneratedContentRecord, ResolvedQuestions } from '../types';
import { isPlainObject, JsonFileCollection } from './jsonFile';

const CONTENT_TYPES: readonly ContentType[] = ['assignment', 'mcq', 'viva'];

const isGeneratedContent = (value: unknown): value is GeneratedContentRecord => {
  if (!isPlainObject(value)) {
    return false;
  }

  const { contentType } = value;

  return (
    typeof value.id === 'string' &&
    typeof value.facultyId === 'string' &&
    CONTENT_TYPES.some((type) => type === contentType) &&
    Array.isArray(value.documentIds) &&
    Array.isArray(value.questions)
  );
};

export type NewGeneratedContent = {
  contentType: ContentType;
  facultyId: string;
  documentIds: string[];
  resolved: ResolvedQuestions;
};

/** Append-only: records are written once and never updated. */
export class GeneratedContentStore {
  private readonly collection: JsonFileCollection<GeneratedContentRecord>;

  constructor(dataDir: string, private readonly now: () => Date = () => new Date()) {
    this.collection = new JsonFileCollection(path.join(dataDir, 'generated-content.json'), isGeneratedContent);
  }

  store({ contentType, facultyId, documentIds, resolved }: NewGeneratedContent): GeneratedContentRecord {
    const record: GeneratedContentRecord = {
      id: uuidv4(),
      contentType,
      facultyId,
      documentIds: [...documentIds],
      questions: resolved.questions,
      origin: resolved.origin,
      createdAt: this.now().toISOString(),
    };

    return this.collection.insert(Object.freeze(record));
  }

  get(id: string): GeneratedContentRecord {
    const record = this.collection.get(id);
    if (!record) {
      throw new NotFoundError(`Generated content ${id} not found.`);
    }
    return record;
  }

  listByFaculty(facultyId: string): GeneratedContentRecord[] {
    return this.collection
      .values()
      .filter((record) => record.facultyId === facultyId)
      .sort((left, right) => right.createdAt.localeCompare(left.createdAt));
  }

  count(): number {
    return this.collection.size();
  }
}
