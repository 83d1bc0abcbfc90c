import express, { Request, Response } from 'express';
import { ISoundRepository } from '../domain/repositories/ISoundRepository';
import { Sound } from '../types';
import { ValidationError } from '../domain/common/Errors';
import {
  handleError,
  idParamSchema,
  nameParamSchema,
  parseInput,
  renameSoundSchema,
  uploadSoundQuerySchema,
  validateParams
} from './validation';

export interface SoundRouteOptions {
  maxSoundBytes: number;
}

const UPLOAD_CONTENT_TYPES = ['audio/mpeg', 'application/octet-stream'];

function withMp3Extension(name: string): string {
  const trimmed = name.trim();
  return trimmed.toLowerCase().endsWith('.mp3') ? trimmed : `${trimmed}.mp3`;
}

function sendSound(res: Response, sound: Sound): void {
  res.type('audio/mpeg');
  res.setHeader('Content-Disposition', `attachment; filename="${encodeURIComponent(sound.name)}"`);
  res.send(sound.payload);
}

/**
 * Create sound library routes. Every mutation is tagged with the `web` source.
 */
export function createSoundRoutes(soundRepo: ISoundRepository, options: SoundRouteOptions) {
  const router = express.Router();

  // List sounds
  router.get('/sounds', async (req: Request, res: Response) => {
    try {
      const sounds = await soundRepo.list();
      res.json(sounds);
    } catch (err) {
      handleError(err, res);
    }
  });

  // Upload a sound: raw bytes in the body, file name in the query string
  router.post(
    '/sounds',
    express.raw({ type: UPLOAD_CONTENT_TYPES, limit: options.maxSoundBytes }),
    async (req: Request, res: Response) => {
      try {
        const { name } = parseInput(uploadSoundQuerySchema, req.query, 'query parameters');
        const body: unknown = req.body;
        if (!Buffer.isBuffer(body)) {
          throw new ValidationError(`Content-Type must be one of: ${UPLOAD_CONTENT_TYPES.join(', ')}`);
        }

        const sound = await soundRepo.create(name, body, 'web');
        res.status(201).json(sound);
      } catch (err) {
        handleError(err, res);
      }
    }
  );

  // Get sound metadata
  router.get('/sounds/:id', validateParams(idParamSchema), async (req: Request, res: Response) => {
    try {
      const sound = await soundRepo.get(Number(req.params.id));
      res.json({ id: sound.id, name: sound.name, size: sound.payload.length, createdAt: sound.createdAt });
    } catch (err) {
      handleError(err, res);
    }
  });

  // Download sound bytes
  router.get('/sounds/:id/download', validateParams(idParamSchema), async (req: Request, res: Response) => {
    try {
      sendSound(res, await soundRepo.get(Number(req.params.id)));
    } catch (err) {
      handleError(err, res);
    }
  });

  // Download by file name, matched case-insensitively
  router.get('/download/:name', validateParams(nameParamSchema), async (req: Request, res: Response) => {
    try {
      sendSound(res, await soundRepo.getByName(req.params.name));
    } catch (err) {
      handleError(err, res);
    }
  });

  // Rename sound
  router.patch('/sounds/:id', validateParams(idParamSchema), async (req: Request, res: Response) => {
    try {
      const { name } = parseInput(renameSoundSchema, req.body, 'request body');
      const sound = await soundRepo.rename(Number(req.params.id), withMp3Extension(name), 'web');
      res.json(sound);
    } catch (err) {
      handleError(err, res);
    }
  });

  // Delete sound
  router.delete('/sounds/:id', validateParams(idParamSchema), async (req: Request, res: Response) => {
    try {
      await soundRepo.delete(Number(req.params.id), 'web');
      res.status(204).end();
    } catch (err) {
      handleError(err, res);
    }
  });

  return router;
}
