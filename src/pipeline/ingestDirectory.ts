import fs from 'node:fs/promises';
import path from 'node:path';

import type { DocumentRecord } from '../types';
import { uploadDocument } from './documentWorkflow';
import type { DocumentWorkflowDeps } from './documentWorkflow';

export type DirectoryIngestOptions = {
  dir: string;
  ownerId: string;
  courseName: string;
};

export const listPdfFiles = async (dir: string): Promise<string[]> => {
  const entries = await fs.readdir(dir, { withFileTypes: true });

  return entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.pdf'))
    .map((entry) => path.join(dir, entry.name))
    .sort();
};

/** Uploads every PDF in `dir` one at a time; a failed document does not stop the rest. */
export const ingestDirectory = async (
  deps: DocumentWorkflowDeps,
  { dir, ownerId, courseName }: DirectoryIngestOptions,
): Promise<DocumentRecord[]> => {
  const pdfPaths = await listPdfFiles(dir);
  const records: DocumentRecord[] = [];

  if (!pdfPaths.length) {
    console.warn(`[ingest] No PDF files found in ${dir}.`);
    return records;
  }

  for (const pdfPath of pdfPaths) {
    const record = await uploadDocument(deps, {
      bytes: await fs.readFile(pdfPath),
      filename: path.basename(pdfPath),
      courseName,
      ownerId,
    });
    records.push(record);
  }

  return records;
};
