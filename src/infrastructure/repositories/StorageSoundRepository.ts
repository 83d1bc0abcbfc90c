import { EventSource, Sound, SoundSummary } from '../../types';
import { ISoundRepository, RandomSource } from '../../domain/repositories/ISoundRepository';
import { IStorageGateway } from '../../domain/storage/IStorageGateway';
import { IEventBus } from '../../domain/events/IEventBus';
import { createEvent } from '../../domain/events/DomainEvents';
import { ILogger } from '../../domain/common/ILogger';
import { NotFoundError, ValidationError } from '../../domain/common/Errors';
import { normalizeSoundName } from '../../domain/common/Invariants';

function toSummary(sound: Sound): SoundSummary {
  return {
    id: sound.id,
    name: sound.name,
    size: sound.payload.length,
    createdAt: sound.createdAt
  };
}

// Callers get their own buffer; stored payloads never change
function copySound(sound: Sound): Sound {
  return { ...sound, payload: Buffer.from(sound.payload) };
}

function compareNames(a: SoundSummary, b: SoundSummary): number {
  const left = a.name.toLowerCase();
  const right = b.name.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return a.id - b.id;
}

/**
 * Sound repository on top of the storage gateway.
 * Events are published only once the gateway has committed the write.
 */
export class StorageSoundRepository implements ISoundRepository {
  constructor(
    private storage: IStorageGateway,
    private eventBus: IEventBus,
    private logger: ILogger,
    private random: RandomSource = Math.random
  ) {}

  async create(name: string, payload: Buffer, source: EventSource): Promise<SoundSummary> {
    const normalized = normalizeSoundName(name);
    if (payload.length === 0) {
      throw new ValidationError('Sound payload must not be empty');
    }

    const sound = await this.storage.write(tx => tx.insertSound(normalized, Buffer.from(payload)));

    this.eventBus.publish(createEvent('sound:uploaded', { id: sound.id, name: sound.name }, source));
    this.logger.info(`Sound uploaded: ${sound.name}`, { id: sound.id, size: sound.payload.length, source });
    return toSummary(sound);
  }

  async rename(id: number, newName: string, source: EventSource): Promise<SoundSummary> {
    const normalized = normalizeSoundName(newName);

    const { previous, renamed } = await this.storage.write(tx => {
      const previous = tx.getSound(id);
      if (!previous) {
        throw new NotFoundError('Sound', id);
      }
      return { previous, renamed: tx.renameSound(id, normalized) };
    });

    this.eventBus.publish(createEvent('sound:renamed', {
      id,
      oldName: previous.name,
      newName: renamed.name
    }, source));
    this.logger.info(`Sound renamed: ${previous.name} -> ${renamed.name}`, { id, source });
    return toSummary(renamed);
  }

  async delete(id: number, source: EventSource): Promise<SoundSummary> {
    const sound = await this.storage.write(tx => tx.deleteSound(id));

    this.eventBus.publish(createEvent('sound:deleted', { id: sound.id, name: sound.name }, source));
    this.logger.info(`Sound deleted: ${sound.name}`, { id, source });
    return toSummary(sound);
  }

  async get(id: number): Promise<Sound> {
    const sound = await this.storage.read(tx => tx.getSound(id));
    if (!sound) {
      throw new NotFoundError('Sound', id);
    }
    return copySound(sound);
  }

  async getByName(name: string): Promise<Sound> {
    const sound = await this.storage.read(tx => tx.findSoundByName(name.trim()));
    if (!sound) {
      throw new NotFoundError(`Sound '${name.trim()}'`);
    }
    return copySound(sound);
  }

  async list(): Promise<SoundSummary[]> {
    const summaries = await this.storage.read(tx => tx.listSounds().map(toSummary));
    return summaries.sort(compareNames);
  }

  async count(): Promise<number> {
    return this.storage.read(tx => tx.countSounds());
  }

  async randomPick(): Promise<Sound | null> {
    const sound = await this.storage.read(tx => {
      const sounds = tx.listSounds();
      if (sounds.length === 0) return null;
      const index = Math.min(Math.floor(this.random() * sounds.length), sounds.length - 1);
      return sounds[index];
    });
    return sound ? copySound(sound) : null;
  }
}
