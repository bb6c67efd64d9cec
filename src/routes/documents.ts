import path from 'node:path';
import { Router } from 'express';
import multer from 'multer';
import { z } from 'zod';

import { asyncHandler } from '../middlewares/errorHandler';
import { deleteDocument, uploadDocument } from '../pipeline/documentWorkflow';
import type { Services } from '../services';
import type { DocumentRecord } from '../types';
import { parseOrReject } from './validation';

const MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

const uploadSchema = z.object({
  course_name: z.string().trim().min(1, 'course_name is required'),
  uploaded_by: z.string().trim().min(1, 'uploaded_by is required'),
});

const listSchema = z.object({
  uploaded_by: z.string().min(1).optional(),
  status: z.enum(['queued', 'processing', 'completed', 'failed']).optional(),
});

const deleteSchema = z.object({
  deleted_by: z.string().min(1).optional(),
});

export const toDocumentResponse = (record: DocumentRecord) => ({
  id: record.id,
  filename: record.filename,
  course_name: record.courseName,
  uploaded_by: record.uploadedBy,
  status: record.status,
  chunks_created: record.chunksCreated,
  error_message: record.errorMessage,
  created_at: record.createdAt,
  updated_at: record.updatedAt,
});

const isPdf = (file: Express.Multer.File): boolean =>
  file.mimetype === 'application/pdf' || path.extname(file.originalname).toLowerCase() === '.pdf';

export const createDocumentsRouter = (services: Services): Router => {
  const router = Router();
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: MAX_UPLOAD_BYTES, files: 1 } });

  router.post(
    '/',
    upload.single('file'),
    asyncHandler(async (req, res) => {
      const body = parseOrReject(uploadSchema, req.body, res);
      if (!body) {
        return;
      }

      const file = req.file;
      if (!file) {
        res.status(400).json({ errors: [{ path: 'file', message: 'A PDF file is required.' }] });
        return;
      }

      if (!isPdf(file)) {
        res.status(400).json({ errors: [{ path: 'file', message: 'Only PDF files are accepted.' }] });
        return;
      }

      const record = await uploadDocument(services, {
        bytes: file.buffer,
        filename: file.originalname,
        courseName: body.course_name,
        ownerId: body.uploaded_by,
      });

      res.status(record.status === 'completed' ? 201 : 422).json(toDocumentResponse(record));
    }),
  );

  router.get('/', (req, res) => {
    const query = parseOrReject(listSchema, req.query, res);
    if (!query) {
      return;
    }

    const records = services.documents.list({ uploadedBy: query.uploaded_by, status: query.status });
    res.json({ documents: records.map(toDocumentResponse) });
  });

  router.get('/:id', (req, res) => {
    res.json(toDocumentResponse(services.documents.require(req.params.id)));
  });

  router.delete(
    '/:id',
    asyncHandler(async (req, res) => {
      const query = parseOrReject(deleteSchema, req.query, res);
      if (!query) {
        return;
      }

      const record = await deleteDocument(services, req.params.id, query.deleted_by);
      res.json({ id: record.id, deleted: true });
    }),
  );

  return router;
};
