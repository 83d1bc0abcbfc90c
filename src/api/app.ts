import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { ISoundRepository } from '../domain/repositories/ISoundRepository';
import { IConfigRepository } from '../domain/repositories/IConfigRepository';
import { SchedulerStatusSource } from '../application/services/CommandService';
import { ILogger } from '../domain/common/ILogger';
import { AppError } from '../domain/common/Errors';
import { createSoundRoutes } from './soundRoutes';
import { createConfigRoutes } from './configRoutes';
import { createStatusRoutes } from './statusRoutes';

export interface AppDependencies {
  soundRepo: ISoundRepository;
  configRepo: IConfigRepository;
  scheduler: SchedulerStatusSource;
  logger: ILogger;
  /** Mount point, '' for the root */
  rootPath: string;
  maxSoundBytes: number;
}

// Errors raised by the body parsers carry an HTTP status
function httpStatusOf(err: Error): number | undefined {
  if ('status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

/**
 * Build the Express application for the web interface.
 */
export function createApp(deps: AppDependencies): express.Express {
  const { soundRepo, configRepo, scheduler, logger } = deps;
  const app = express();
  const api = express.Router();

  app.use(cors());
  app.use(express.json());

  api.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: Date.now(),
      uptime: process.uptime()
    });
  });

  api.use('/api', createSoundRoutes(soundRepo, { maxSoundBytes: deps.maxSoundBytes }));
  api.use('/api', createConfigRoutes(configRepo));
  api.use('/api', createStatusRoutes(scheduler, soundRepo));

  app.use(deps.rootPath || '/', api);

  // Global error handling middleware
  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    if (err instanceof AppError) {
      return res.status(err.statusCode).json(err.toJSON());
    }

    const status = httpStatusOf(err);
    if (status !== undefined && status >= 400 && status < 500) {
      logger.warn(`Rejected request: ${err.message}`, { path: req.path, status });
      return res.status(status).json({
        error: true,
        statusCode: status,
        code: status === 413 ? 'PAYLOAD_TOO_LARGE' : 'BAD_REQUEST',
        message: err.message
      });
    }

    logger.error('Server error:', err);
    res.status(500).json({
      error: true,
      message: err.message,
      code: 'INTERNAL_ERROR'
    });
  });

  return app;
}
