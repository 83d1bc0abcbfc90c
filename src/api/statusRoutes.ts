import express, { Request, Response } from 'express';
import { ISoundRepository } from '../domain/repositories/ISoundRepository';
import { SchedulerStatusSource } from '../application/services/CommandService';
import { handleError } from './validation';

/**
 * Create scheduler status routes.
 */
export function createStatusRoutes(scheduler: SchedulerStatusSource, soundRepo: ISoundRepository) {
  const router = express.Router();

  router.get('/status', async (req: Request, res: Response) => {
    try {
      const soundCount = await soundRepo.count();
      res.json({ ...scheduler.getStatus(), soundCount });
    } catch (err) {
      handleError(err, res);
    }
  });

  return router;
}
