import {
  CommandInvocation,
  CommandService,
  COMMAND_DEFINITIONS,
  SchedulerStatusSource
} from '../../src/application/services/CommandService';
import { FileSystemStorageGateway } from '../../src/infrastructure/storage/FileSystemStorageGateway';
import { StorageConfigRepository } from '../../src/infrastructure/repositories/StorageConfigRepository';
import { StorageSoundRepository } from '../../src/infrastructure/repositories/StorageSoundRepository';
import { InMemoryEventBus } from '../../src/infrastructure/events/InMemoryEventBus';
import { AnyDomainEvent } from '../../src/domain/events/DomainEvents';
import { SchedulerStatus } from '../../src/types';
import { TestDataDir, createMockLogger } from '../helpers';

const NOW = 1_700_000_000_000;

function invocation(name: string, integerOptions: Record<string, number | undefined> = {}): CommandInvocation {
  return { name, userMention: '<@42>', integerOptions };
}

describe('CommandService', () => {
  let testDataDir: TestDataDir;
  let storage: FileSystemStorageGateway;
  let eventBus: InMemoryEventBus;
  let soundRepo: StorageSoundRepository;
  let configRepo: StorageConfigRepository;
  let status: SchedulerStatus;
  let events: AnyDomainEvent[];
  let service: CommandService;

  beforeEach(async () => {
    const logger = createMockLogger();
    testDataDir = new TestDataDir();
    storage = new FileSystemStorageGateway(testDataDir.getPath(), { interval: 30, volume: 100, notifyChannel: null }, logger);
    await storage.initialize();

    eventBus = new InMemoryEventBus(logger);
    events = [];
    eventBus.subscribe(['sound:uploaded', 'config:interval_changed', 'config:volume_changed'], event => {
      events.push(event);
    });

    soundRepo = new StorageSoundRepository(storage, eventBus, logger);
    configRepo = new StorageConfigRepository(storage, eventBus, logger);
    status = {
      lifecycle: 'running',
      state: 'idle',
      intervalSeconds: 30,
      nextTickAt: NOW + 12_300,
      lastOutcome: null,
      lastCycleAt: null,
      connectedChannelId: null
    };
    const scheduler: SchedulerStatusSource = { getStatus: () => status };
    service = new CommandService(soundRepo, configRepo, scheduler, logger, () => NOW);
  });

  afterEach(async () => {
    await eventBus.shutdown();
    await storage.close();
    await testDataDir.cleanup();
  });

  it('should define every command with integer bounds', () => {
    expect(COMMAND_DEFINITIONS.map(command => command.name)).toEqual([
      'ping', 'list', 'status', 'volume', 'interval', 'nextsound'
    ]);
    const interval = COMMAND_DEFINITIONS.find(command => command.name === 'interval');
    expect(interval?.options).toEqual([
      expect.objectContaining({ name: 'seconds', required: true, minValue: 30, maxValue: 3600 })
    ]);
  });

  it('should answer ping with a mention', async () => {
    const reply = await service.execute(invocation('ping'));

    expect(reply).toEqual({ content: '🔊 Pong! Audio Ambush is ready, <@42>!', ephemeral: false });
  });

  describe('list', () => {
    it('should hint at the web interface when the library is empty', async () => {
      const reply = await service.execute(invocation('list'));

      expect(reply).toEqual({
        content: '🔇 No sounds available. Upload some sounds via the web interface!',
        ephemeral: true
      });
    });

    it('should list sound names sorted', async () => {
      await soundRepo.create('b.mp3', Buffer.from('b'), 'web');
      await soundRepo.create('a.mp3', Buffer.from('a'), 'web');

      const reply = await service.execute(invocation('list'));

      expect(reply.content).toBe('🎵 **2** sounds available\n• `a.mp3`\n• `b.mp3`');
    });

    it('should show the first 45 names and count the rest', async () => {
      for (let i = 10; i < 60; i++) {
        await soundRepo.create(`s${i}.mp3`, Buffer.from('x'), 'web');
      }

      const lines = (await service.execute(invocation('list'))).content.split('\n');

      expect(lines[0]).toBe('🎵 **50** sounds available');
      expect(lines).toHaveLength(47);
      expect(lines[45]).toBe('• `s54.mp3`');
      expect(lines[46]).toBe('... and 5 more sounds');
    });
  });

  it('should report the soundboard status', async () => {
    await soundRepo.create('a.mp3', Buffer.from('a'), 'web');
    await configRepo.setVolume(70, 'web');
    status = { ...status, state: 'playing', connectedChannelId: '900' };

    const reply = await service.execute(invocation('status'));

    expect(reply.content).toBe([
      '📊 **Soundboard Status**',
      '🟢 Active (playing)',
      '🔊 Connected to <#900>',
      '⏱️ Interval: 30 seconds',
      '🔊 Volume: 70%',
      '🎵 Sounds: 1 available'
    ].join('\n'));
  });

  describe('volume', () => {
    it.each([
      [0, '🔇'],
      [20, '🔈'],
      [50, '🔉'],
      [80, '🔊']
    ])('should set the volume to %p with a matching emoji', async (level, emoji) => {
      const reply = await service.execute(invocation('volume', { level }));
      await eventBus.whenIdle();

      expect(reply).toEqual({ content: `${emoji} Volume changed from **100%** to **${level}%**`, ephemeral: false });
      expect(await configRepo.getVolume()).toBe(level);
      expect(events).toHaveLength(1);
      expect(events[0].source).toBe('command');
    });

    it('should reply with an ephemeral error for an out-of-range level', async () => {
      const reply = await service.execute(invocation('volume', { level: 150 }));

      expect(reply).toEqual({ content: '❌ Volume must be an integer between 0 and 100', ephemeral: true });
      expect(await configRepo.getVolume()).toBe(100);
    });

    it('should require the level option', async () => {
      const reply = await service.execute(invocation('volume'));

      expect(reply).toEqual({ content: "❌ Option 'level' is required", ephemeral: true });
    });
  });

  describe('interval', () => {
    it('should change the interval', async () => {
      const reply = await service.execute(invocation('interval', { seconds: 120 }));

      expect(reply.content).toBe('⏱️ Interval changed from **30** to **120** seconds');
      expect(await configRepo.getInterval()).toBe(120);
    });

    it('should reject an interval below the minimum', async () => {
      const reply = await service.execute(invocation('interval', { seconds: 5 }));

      expect(reply).toEqual({ content: '❌ Interval must be an integer between 30 and 3600', ephemeral: true });
    });
  });

  describe('nextsound', () => {
    it('should round the remaining time up to whole seconds', async () => {
      const reply = await service.execute(invocation('nextsound'));

      expect(reply.content).toBe('Next sound in 13 seconds.');
    });

    it('should say a sound can play now when no wait is armed', async () => {
      status = { ...status, nextTickAt: null };

      const reply = await service.execute(invocation('nextsound'));

      expect(reply.content).toBe('A sound can be played now!');
    });

    it('should say the soundboard is not running', async () => {
      status = { ...status, lifecycle: 'stopped', nextTickAt: null };

      const reply = await service.execute(invocation('nextsound'));

      expect(reply.content).toBe('⏸️ The soundboard is not running.');
    });
  });

  it('should reject unknown commands', async () => {
    const reply = await service.execute(invocation('dance'));

    expect(reply).toEqual({ content: '❌ Unknown command: dance', ephemeral: true });
  });
});
