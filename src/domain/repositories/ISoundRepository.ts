import { EventSource, Sound, SoundSummary } from '../../types';

/**
 * Random number source in [0, 1).
 */
export type RandomSource = () => number;

/**
 * Repository interface for the sound library.
 * Every successful mutation publishes exactly one event, after it commits.
 */
export interface ISoundRepository {
  /**
   * Add a sound to the library.
   * @param source - Entry point that triggered the upload
   * @returns Summary of the stored sound with its generated id
   * @throws {ValidationError} if the name is invalid, taken (case-insensitively) or the payload is empty
   */
  create(name: string, payload: Buffer, source: EventSource): Promise<SoundSummary>;

  /**
   * Change the name of a sound. Id and payload are kept.
   * @throws {NotFoundError} if sound not found
   * @throws {ValidationError} if the new name is invalid or used by another sound
   */
  rename(id: number, newName: string, source: EventSource): Promise<SoundSummary>;

  /**
   * Remove a sound from the library.
   * @returns Summary of the removed sound
   * @throws {NotFoundError} if sound not found
   */
  delete(id: number, source: EventSource): Promise<SoundSummary>;

  /**
   * @throws {NotFoundError} if sound not found
   */
  get(id: number): Promise<Sound>;

  /**
   * Case-insensitive lookup.
   * @throws {NotFoundError} if no sound has that name
   */
  getByName(name: string): Promise<Sound>;

  /**
   * Summaries ordered by name, case-insensitively.
   */
  list(): Promise<SoundSummary[]>;

  count(): Promise<number>;

  /**
   * Uniformly chosen sound, or null when the library is empty.
   */
  randomPick(): Promise<Sound | null>;
}
