// src/app.ts
import express, { Express, NextFunction, Request, Response } from 'express';
import { config } from './config';
import createRouter from './routes';
import { SchedulingService } from './services/schedulingService';

export interface AppOptions {
  schedulingService?: SchedulingService;
  jwtSecret?: string;
  accessKey?: string;
}

export function createApp(options: AppOptions = {}): Express {
  const app = express();
  const schedulingService = options.schedulingService ?? new SchedulingService();

  app.use(express.json());

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.use('/api', createRouter(schedulingService, {
    jwtSecret: options.jwtSecret ?? config.jwtSecret,
    accessKey: options.accessKey ?? config.accessKey
  }));

  // Malformed JSON bodies and anything a handler let through
  app.use((error: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    console.error('[app] Unhandled error:', error);
    res.status(500).json({ error: error.message });
  });

  return app;
}
