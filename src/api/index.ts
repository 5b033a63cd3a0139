// src/api/index.ts
import { Router } from 'express';
import authRoutes from './authRoutes';
import logger from '../utils/logger';

const mainRouter = Router();

// Mount authentication routes
mainRouter.use('/auth', authRoutes);
logger.info('Auth routes mounted under /auth');

export default mainRouter;
