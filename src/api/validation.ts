import { z } from 'zod';
import { Request, Response, NextFunction } from 'express';
import { AppError, ValidationError, errorMessage } from '../domain/common/Errors';
import { SOUND_NAME_MAX_LENGTH } from '../types';

// --- Reusable patterns ---

// Sound ids are positive integers
const numericId = z.string().regex(/^[1-9]\d*$/, 'ID must be a positive integer');

const soundName = z.string().min(1).max(SOUND_NAME_MAX_LENGTH);

const channelId = z.string().regex(/^\d+$/, 'Channel id must contain digits only');

// --- Param schemas ---

export const idParamSchema = z.object({
  id: numericId,
});

export const nameParamSchema = z.object({
  name: soundName,
});

// --- Sound schemas ---

export const uploadSoundQuerySchema = z.object({
  name: soundName.refine(name => name.toLowerCase().endsWith('.mp3'), 'Only .mp3 files are allowed'),
}).strict();

export const renameSoundSchema = z.object({
  name: soundName,
}).strict();

// --- Config schemas ---

export const setIntervalSchema = z.object({
  seconds: z.number(),
}).strict();

export const setVolumeSchema = z.object({
  percent: z.number(),
}).strict();

export const setNotifyChannelSchema = z.object({
  channelId: channelId.nullable(),
}).strict();

function formatIssues(error: z.ZodError) {
  return error.issues.map(i => ({
    path: i.path.join('.'),
    message: i.message,
  }));
}

/**
 * Parse request input inside a handler.
 * @throws {ValidationError} with the zod issues as details
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid ${what}`, formatIssues(result.error));
  }
  return result.data;
}

/**
 * Validate request params against a Zod schema.
 */
export function validateParams(schema: z.ZodTypeAny) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.params);
    if (!result.success) {
      return res.status(400).json({
        error: true,
        code: 'VALIDATION_ERROR',
        message: 'Invalid URL parameters',
        details: formatIssues(result.error),
      });
    }
    next();
  };
}

/**
 * Map an error to a JSON response.
 */
export function handleError(err: unknown, res: Response) {
  if (err instanceof AppError) {
    return res.status(err.statusCode).json(err.toJSON());
  }
  return res.status(500).json({
    error: true,
    message: errorMessage(err),
    code: 'INTERNAL_ERROR'
  });
}
