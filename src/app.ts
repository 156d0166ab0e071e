import cors from 'cors';
import express from 'express';
import { getConfig } from './config/config';
import { errorHandler, notFound } from './middleware/error-handler';
import createRoutes from './routes/index';
import { InferenceService } from './services/InferenceService';

export const createApp = (service: InferenceService) => {
  const { corsOrigin } = getConfig();
  const app = express();

  app.use(cors({ origin: corsOrigin }));
  app.use('/', createRoutes(service));
  app.use(notFound);
  app.use(errorHandler);

  return app;
};

export default createApp;
