import { ValidationError } from './Errors';
import {
  ConfigValues,
  INTERVAL_BOUNDS,
  NumericBounds,
  SOUND_NAME_MAX_LENGTH,
  VOLUME_BOUNDS
} from '../../types';

const CHANNEL_ID_PATTERN = /^\d+$/;

export function assertBoundedInteger(label: string, value: number, bounds: NumericBounds): void {
  if (!Number.isInteger(value) || value < bounds.min || value > bounds.max) {
    throw new ValidationError(
      `${label} must be an integer between ${bounds.min} and ${bounds.max}`,
      { value }
    );
  }
}

export function assertChannelId(value: string | null): void {
  if (value !== null && !CHANNEL_ID_PATTERN.test(value)) {
    throw new ValidationError('Channel id must contain digits only', { value });
  }
}

export function assertConfigValues(values: ConfigValues): void {
  assertBoundedInteger('Interval', values.interval, INTERVAL_BOUNDS);
  assertBoundedInteger('Volume', values.volume, VOLUME_BOUNDS);
  assertChannelId(values.notifyChannel);
}

/**
 * Trim a sound name and reject anything that cannot double as a file name.
 */
export function normalizeSoundName(name: string): string {
  const trimmed = name.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('Sound name must not be empty');
  }
  if (trimmed.length > SOUND_NAME_MAX_LENGTH) {
    throw new ValidationError(`Sound name must be at most ${SOUND_NAME_MAX_LENGTH} characters`, { name: trimmed });
  }
  if (/[\\/]/.test(trimmed) || trimmed.includes('..')) {
    throw new ValidationError('Sound name must not contain path separators or ".."', { name: trimmed });
  }

  return trimmed;
}
