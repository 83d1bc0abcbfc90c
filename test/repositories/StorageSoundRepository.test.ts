import { FileSystemStorageGateway } from '../../src/infrastructure/storage/FileSystemStorageGateway';
import { StorageSoundRepository } from '../../src/infrastructure/repositories/StorageSoundRepository';
import { InMemoryEventBus } from '../../src/infrastructure/events/InMemoryEventBus';
import { AnyDomainEvent, SOUND_EVENTS } from '../../src/domain/events/DomainEvents';
import { NotFoundError, ValidationError } from '../../src/domain/common/Errors';
import { TestDataDir, createMockLogger } from '../helpers';

describe('StorageSoundRepository', () => {
  let testDataDir: TestDataDir;
  let storage: FileSystemStorageGateway;
  let eventBus: InMemoryEventBus;
  let repo: StorageSoundRepository;
  let events: AnyDomainEvent[];
  let randomValue: number;

  beforeEach(async () => {
    const logger = createMockLogger();
    testDataDir = new TestDataDir();
    storage = new FileSystemStorageGateway(testDataDir.getPath(), { interval: 30, volume: 100, notifyChannel: null }, logger);
    await storage.initialize();

    eventBus = new InMemoryEventBus(logger);
    events = [];
    eventBus.subscribe(SOUND_EVENTS, event => {
      events.push(event);
    });

    randomValue = 0;
    repo = new StorageSoundRepository(storage, eventBus, logger, () => randomValue);
  });

  afterEach(async () => {
    await eventBus.shutdown();
    await storage.close();
    await testDataDir.cleanup();
  });

  describe('create', () => {
    it('should store the sound and publish sound:uploaded', async () => {
      const summary = await repo.create('  laugh.mp3 ', Buffer.from('audio'), 'web');
      await eventBus.whenIdle();

      expect(summary).toEqual({ id: 1, name: 'laugh.mp3', size: 5, createdAt: expect.any(Number) });
      expect(events).toHaveLength(1);
      expect(events[0].type).toBe('sound:uploaded');
      expect(events[0].payload).toEqual({ id: 1, name: 'laugh.mp3' });
      expect(events[0].source).toBe('web');
    });

    it('should reject a case-insensitive duplicate and keep one row', async () => {
      await repo.create('laugh.mp3', Buffer.from('a'), 'web');

      await expect(repo.create('Laugh.mp3', Buffer.from('b'), 'command')).rejects.toThrow(ValidationError);
      await eventBus.whenIdle();

      expect(await repo.count()).toBe(1);
      expect(events).toHaveLength(1);
    });

    it.each([
      ['', 'Sound name must not be empty'],
      ['../evil.mp3', 'Sound name must not contain path separators or ".."'],
      ['a/b.mp3', 'Sound name must not contain path separators or ".."'],
      [`${'x'.repeat(61)}.mp3`, 'Sound name must be at most 64 characters']
    ])('should reject the name %p', async (name, message) => {
      await expect(repo.create(name, Buffer.from('a'), 'web')).rejects.toThrow(message);
      expect(await repo.count()).toBe(0);
    });

    it('should reject an empty payload', async () => {
      await expect(repo.create('empty.mp3', Buffer.alloc(0), 'web')).rejects.toThrow('Sound payload must not be empty');
    });
  });

  describe('rename', () => {
    it('should change only the name and publish sound:renamed', async () => {
      const created = await repo.create('old.mp3', Buffer.from('payload'), 'web');

      const renamed = await repo.rename(created.id, 'new.mp3', 'command');
      await eventBus.whenIdle();

      expect(renamed.id).toBe(created.id);
      const stored = await repo.get(created.id);
      expect(stored.name).toBe('new.mp3');
      expect(stored.payload.toString()).toBe('payload');
      expect(stored.createdAt).toBe(created.createdAt);
      expect(events[1].type).toBe('sound:renamed');
      expect(events[1].payload).toEqual({ id: created.id, oldName: 'old.mp3', newName: 'new.mp3' });
      expect(events[1].source).toBe('command');
    });

    it('should reject a name used by another sound', async () => {
      await repo.create('a.mp3', Buffer.from('a'), 'web');
      const b = await repo.create('b.mp3', Buffer.from('b'), 'web');

      await expect(repo.rename(b.id, 'A.MP3', 'web')).rejects.toThrow("A sound named 'a.mp3' already exists");
    });

    it('should raise NotFoundError for an unknown id', async () => {
      await expect(repo.rename(99, 'x.mp3', 'web')).rejects.toThrow(NotFoundError);
    });
  });

  describe('delete', () => {
    it('should remove the row and publish exactly one sound:deleted', async () => {
      for (let i = 1; i <= 7; i++) {
        await repo.create(`sound-${i}.mp3`, Buffer.from(`${i}`), 'web');
      }
      await eventBus.whenIdle();
      events.length = 0;

      const deleted = await repo.delete(7, 'web');
      await eventBus.whenIdle();

      expect(deleted.name).toBe('sound-7.mp3');
      expect(events).toHaveLength(1);
      expect(events[0].type).toBe('sound:deleted');
      expect(events[0].payload).toEqual({ id: 7, name: 'sound-7.mp3' });
      expect(events[0].source).toBe('web');
      await expect(repo.get(7)).rejects.toThrow(NotFoundError);
      expect(await repo.count()).toBe(6);
    });

    it('should publish nothing when the id is unknown', async () => {
      await expect(repo.delete(7, 'web')).rejects.toThrow("Sound with id '7' not found");
      await eventBus.whenIdle();

      expect(events).toHaveLength(0);
    });
  });

  describe('queries', () => {
    it('should find sounds by name case-insensitively', async () => {
      await repo.create('Laugh.mp3', Buffer.from('a'), 'web');

      const sound = await repo.getByName('laugh.MP3');

      expect(sound.name).toBe('Laugh.mp3');
      await expect(repo.getByName('cry.mp3')).rejects.toThrow("Sound 'cry.mp3' not found");
    });

    it('should list sounds sorted by name ignoring case', async () => {
      await repo.create('b.mp3', Buffer.from('b'), 'web');
      await repo.create('C.mp3', Buffer.from('c'), 'web');
      await repo.create('a.mp3', Buffer.from('a'), 'web');

      const names = (await repo.list()).map(sound => sound.name);

      expect(names).toEqual(['a.mp3', 'b.mp3', 'C.mp3']);
    });

    it('should return copies of stored payloads', async () => {
      await repo.create('a.mp3', Buffer.from('abc'), 'web');

      const first = await repo.get(1);
      first.payload.fill(0);

      expect((await repo.get(1)).payload.toString()).toBe('abc');
    });
  });

  describe('randomPick', () => {
    it('should return null for an empty library', async () => {
      expect(await repo.randomPick()).toBeNull();
    });

    it('should pick by the random source over sounds in id order', async () => {
      await repo.create('a.mp3', Buffer.from('a'), 'web');
      await repo.create('b.mp3', Buffer.from('b'), 'web');
      await repo.create('c.mp3', Buffer.from('c'), 'web');

      randomValue = 0.5;
      expect((await repo.randomPick())?.name).toBe('b.mp3');

      randomValue = 0.9999;
      expect((await repo.randomPick())?.name).toBe('c.mp3');

      randomValue = 0;
      expect((await repo.randomPick())?.name).toBe('a.mp3');
    });
  });
});
