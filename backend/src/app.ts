import express, { type Application } from 'express';
import cors from 'cors';
import { serverConfig } from './config/services';
import type { InterviewServices } from './config/container';
import { InterviewController } from './controllers/interviewController';
import { errorHandler } from './middlewares/errorHandler';
import { createInterviewRouter } from './routes/interviewRoutes';

export const createApp = (services: InterviewServices): Application => {
  const app = express();

  // Middleware
  app.use(cors({
    origin: serverConfig.frontendUrl,
    credentials: true,
  }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API Routes
  app.use('/api/interview', createInterviewRouter(new InterviewController(services)));

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
};
