// src/index.ts
import dotenv from 'dotenv';
dotenv.config(); // Load environment variables from .env file

import cookieParser from 'cookie-parser';
import express from 'express';
import mainRouter from './api';
import { getConfig } from './config';
import { errorHandler } from './middleware/errorHandler';
import logger from './utils/logger';

export const createApp = () => {
  logger.info('Gigboard auth service initializing (createApp)...');
  logger.info(`NODE_ENV: ${process.env.NODE_ENV}`);

  const app = express();

  app.use(express.json());
  app.use(cookieParser());

  app.get('/', (req, res) => {
    res.send('Gigboard Auth API Running');
  });

  app.use('/api', mainRouter);

  // Must be registered after the routes
  app.use(errorHandler);

  return app;
};

// This part is for running the actual server, not for tests
if (require.main === module) {
  const { port } = getConfig();
  const appInstance = createApp();
  appInstance.listen(port, () => {
    logger.info(`Gigboard auth API listening on port ${port}`);
  });
}
