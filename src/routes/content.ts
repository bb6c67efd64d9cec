import { Router } from 'express';
import { z } from 'zod';

import { asyncHandler } from '../middlewares/errorHandler';
import { generateAssessment } from '../pipeline/assessments';
import type { Services } from '../services';
import type { GeneratedContentRecord } from '../types';
import { parseOrReject } from './validation';

const generateSchema = z.object({
  content_type: z.enum(['assignment', 'mcq', 'viva']),
  document_ids: z.array(z.string().trim().min(1)).min(1, 'select at least one document'),
  num_questions: z.coerce.number().int().min(1).max(20).default(5),
  difficulty: z.enum(['easy', 'medium', 'hard']).default('medium'),
  faculty_id: z.string().trim().min(1, 'faculty_id is required'),
});

const listSchema = z.object({
  faculty_id: z.string().trim().min(1, 'faculty_id is required'),
});

export const toContentResponse = (record: GeneratedContentRecord) => ({
  id: record.id,
  content_type: record.contentType,
  faculty_id: record.facultyId,
  document_ids: record.documentIds,
  origin: record.origin,
  questions: record.questions,
  created_at: record.createdAt,
});

export const createContentRouter = (services: Services): Router => {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const body = parseOrReject(generateSchema, req.body, res);
      if (!body) {
        return;
      }

      const record = await generateAssessment(services, {
        contentType: body.content_type,
        documentIds: body.document_ids,
        numQuestions: body.num_questions,
        difficulty: body.difficulty,
        facultyId: body.faculty_id,
      });

      res.status(201).json(toContentResponse(record));
    }),
  );

  router.get('/', (req, res) => {
    const query = parseOrReject(listSchema, req.query, res);
    if (!query) {
      return;
    }

    res.json({ content: services.content.listByFaculty(query.faculty_id).map(toContentResponse) });
  });

  router.get('/:id', (req, res) => {
    res.json(toContentResponse(services.content.get(req.params.id)));
  });

  return router;
};
