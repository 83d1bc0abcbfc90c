import { ConfigChange, ConfigKey, ConfigValues, EventSource, INTERVAL_BOUNDS, VOLUME_BOUNDS } from '../../types';
import { IConfigRepository } from '../../domain/repositories/IConfigRepository';
import { IStorageGateway } from '../../domain/storage/IStorageGateway';
import { IEventBus } from '../../domain/events/IEventBus';
import { createEvent } from '../../domain/events/DomainEvents';
import { ILogger } from '../../domain/common/ILogger';
import { assertBoundedInteger, assertChannelId } from '../../domain/common/Invariants';

/**
 * Configuration repository on top of the storage gateway.
 */
export class StorageConfigRepository implements IConfigRepository {
  constructor(
    private storage: IStorageGateway,
    private eventBus: IEventBus,
    private logger: ILogger
  ) {}

  async getInterval(): Promise<number> {
    return this.storage.read(tx => tx.getConfig().interval);
  }

  async setInterval(seconds: number, source: EventSource): Promise<ConfigChange<number>> {
    assertBoundedInteger('Interval', seconds, INTERVAL_BOUNDS);

    const change = await this.update('interval', seconds);
    this.eventBus.publish(createEvent('config:interval_changed', change, source));
    this.logger.info(`Interval changed: ${change.oldValue}s -> ${change.newValue}s`, { source });
    return change;
  }

  async getVolume(): Promise<number> {
    return this.storage.read(tx => tx.getConfig().volume);
  }

  async setVolume(percent: number, source: EventSource): Promise<ConfigChange<number>> {
    assertBoundedInteger('Volume', percent, VOLUME_BOUNDS);

    const change = await this.update('volume', percent);
    this.eventBus.publish(createEvent('config:volume_changed', change, source));
    this.logger.info(`Volume changed: ${change.oldValue}% -> ${change.newValue}%`, { source });
    return change;
  }

  async getNotifyChannel(): Promise<string | null> {
    return this.storage.read(tx => tx.getConfig().notifyChannel);
  }

  async setNotifyChannel(channelId: string | null, source: EventSource): Promise<ConfigChange<string | null>> {
    assertChannelId(channelId);

    const change = await this.update('notifyChannel', channelId);
    this.eventBus.publish(createEvent('config:notify_channel_changed', change, source));
    this.logger.info(`Notification channel changed: ${change.oldValue ?? 'none'} -> ${change.newValue ?? 'none'}`, { source });
    return change;
  }

  async getAll(): Promise<ConfigValues> {
    return this.storage.read(tx => tx.getConfig());
  }

  private update<K extends ConfigKey>(key: K, value: ConfigValues[K]): Promise<ConfigChange<ConfigValues[K]>> {
    return this.storage.write(tx => {
      const oldValue = tx.getConfig()[key];
      tx.setConfig(key, value);
      return { oldValue, newValue: value };
    });
  }
}
