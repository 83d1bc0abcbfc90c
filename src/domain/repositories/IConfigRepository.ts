import { ConfigChange, ConfigValues, EventSource } from '../../types';

/**
 * Repository interface for the persisted configuration table.
 * Setters validate before touching storage and publish after commit,
 * also when the new value equals the old one.
 */
export interface IConfigRepository {
  getInterval(): Promise<number>;

  /**
   * @param seconds - Integer in [30, 3600]
   * @throws {ValidationError} if out of range or not an integer
   */
  setInterval(seconds: number, source: EventSource): Promise<ConfigChange<number>>;

  getVolume(): Promise<number>;

  /**
   * @param percent - Integer in [0, 100]
   * @throws {ValidationError} if out of range or not an integer
   */
  setVolume(percent: number, source: EventSource): Promise<ConfigChange<number>>;

  getNotifyChannel(): Promise<string | null>;

  /**
   * @param channelId - Digits-only channel id, or null to disable notifications
   * @throws {ValidationError} if the id is not digits only
   */
  setNotifyChannel(channelId: string | null, source: EventSource): Promise<ConfigChange<string | null>>;

  getAll(): Promise<ConfigValues>;
}
