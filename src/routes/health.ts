import { Router } from 'express';

import { asyncHandler } from '../middlewares/errorHandler';
import { describeError } from '../errors';
import type { Services } from '../services';

export const createHealthRouter = (services: Services): Router => {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      let index: { status: 'operational'; chunks: number } | { status: 'unavailable'; error: string };

      try {
        index = { status: 'operational', chunks: await services.index.count() };
      } catch (error) {
        index = { status: 'unavailable', error: describeError(error) };
      }

      res.status(index.status === 'operational' ? 200 : 503).json({
        index,
        store: {
          documents: services.documents.count(),
          content: services.content.count(),
        },
      });
    }),
  );

  return router;
};
