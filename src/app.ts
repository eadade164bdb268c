// src/app.ts
import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { JobControllerDeps, createJobController } from './controllers/job.controller';
import { PortfolioControllerDeps, createPortfolioController } from './controllers/portfolio.controller';
import { createJobRouter } from './routes/job.routes';
import { createPortfolioRouter } from './routes/portfolio.routes';
import { createUploadMiddleware } from './middleware/upload.middleware';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';

export interface AppDeps extends JobControllerDeps, PortfolioControllerDeps {
  maxUploadMb: number;
}

export function createApp(deps: AppDeps): Application {
  const app: Application = express();

  // Middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Routes
  app.use('/jobs', createJobRouter(createJobController(deps), createUploadMiddleware(deps.maxUploadMb)));
  app.use('/portfolios', createPortfolioRouter(createPortfolioController(deps)));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
