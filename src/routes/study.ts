import { Router } from 'express';
import { z } from 'zod';

import { asyncHandler } from '../middlewares/errorHandler';
import { askStudyAssistant } from '../pipeline/studyAssistant';
import type { Services } from '../services';
import { parseOrReject } from './validation';

const askSchema = z.object({
  mode: z.enum(['qa', 'notes', 'practice']).default('qa'),
  query: z.string().trim().min(1, 'query is required').max(4000),
  user_id: z.string().trim().min(1, 'user_id is required'),
});

export const createStudyRouter = (services: Services): Router => {
  const router = Router();

  router.post(
    '/ask',
    asyncHandler(async (req, res) => {
      const body = parseOrReject(askSchema, req.body, res);
      if (!body) {
        return;
      }

      const result = await askStudyAssistant(services, {
        mode: body.mode,
        query: body.query,
        userId: body.user_id,
      });

      res.json(result);
    }),
  );

  return router;
};
