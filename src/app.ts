import express, { type Express } from 'express';

import { errorHandler, notFoundHandler } from './middlewares/errorHandler';
import { createContentRouter } from './routes/content';
import { createDocumentsRouter } from './routes/documents';
import { createHealthRouter } from './routes/health';
import { createStudyRouter } from './routes/study';
import type { Services } from './services';

export const createApp = (services: Services): Express => {
  const app = express();
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));

  app.use('/health', createHealthRouter(services));
  app.use('/documents', createDocumentsRouter(services));
  app.use('/study', createStudyRouter(services));
  app.use('/content', createContentRouter(services));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
