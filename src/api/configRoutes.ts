import express, { Request, Response } from 'express';
import { IConfigRepository } from '../domain/repositories/IConfigRepository';
import {
  handleError,
  parseInput,
  setIntervalSchema,
  setNotifyChannelSchema,
  setVolumeSchema
} from './validation';

/**
 * Create configuration routes.
 */
export function createConfigRoutes(configRepo: IConfigRepository) {
  const router = express.Router();

  // Current configuration
  router.get('/config', async (req: Request, res: Response) => {
    try {
      res.json(await configRepo.getAll());
    } catch (err) {
      handleError(err, res);
    }
  });

  router.put('/config/interval', async (req: Request, res: Response) => {
    try {
      const { seconds } = parseInput(setIntervalSchema, req.body, 'request body');
      res.json(await configRepo.setInterval(seconds, 'web'));
    } catch (err) {
      handleError(err, res);
    }
  });

  router.put('/config/volume', async (req: Request, res: Response) => {
    try {
      const { percent } = parseInput(setVolumeSchema, req.body, 'request body');
      res.json(await configRepo.setVolume(percent, 'web'));
    } catch (err) {
      handleError(err, res);
    }
  });

  router.put('/config/notify-channel', async (req: Request, res: Response) => {
    try {
      const { channelId } = parseInput(setNotifyChannelSchema, req.body, 'request body');
      res.json(await configRepo.setNotifyChannel(channelId, 'web'));
    } catch (err) {
      handleError(err, res);
    }
  });

  return router;
}
