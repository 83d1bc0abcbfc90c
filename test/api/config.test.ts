import request from 'supertest';
import express from 'express';
import { createApp } from '../../src/api/app';
import { FileSystemStorageGateway } from '../../src/infrastructure/storage/FileSystemStorageGateway';
import { StorageConfigRepository } from '../../src/infrastructure/repositories/StorageConfigRepository';
import { StorageSoundRepository } from '../../src/infrastructure/repositories/StorageSoundRepository';
import { InMemoryEventBus } from '../../src/infrastructure/events/InMemoryEventBus';
import { AnyDomainEvent, CONFIG_EVENTS } from '../../src/domain/events/DomainEvents';
import { SchedulerStatus } from '../../src/types';
import { TestDataDir, createMockLogger } from '../helpers';

describe('Config API', () => {
  let app: express.Express;
  let testDataDir: TestDataDir;
  let storage: FileSystemStorageGateway;
  let eventBus: InMemoryEventBus;
  let configRepo: StorageConfigRepository;
  let soundRepo: StorageSoundRepository;
  let events: AnyDomainEvent[];

  const status: SchedulerStatus = {
    lifecycle: 'running',
    state: 'idle',
    intervalSeconds: 30,
    nextTickAt: 1_000_000,
    lastOutcome: 'no_members',
    lastCycleAt: 970_000,
    connectedChannelId: null
  };

  beforeEach(async () => {
    const logger = createMockLogger();
    testDataDir = new TestDataDir();
    storage = new FileSystemStorageGateway(testDataDir.getPath(), { interval: 30, volume: 100, notifyChannel: null }, logger);
    await storage.initialize();

    eventBus = new InMemoryEventBus(logger);
    events = [];
    eventBus.subscribe(CONFIG_EVENTS, event => {
      events.push(event);
    });

    configRepo = new StorageConfigRepository(storage, eventBus, logger);
    soundRepo = new StorageSoundRepository(storage, eventBus, logger);
    app = createApp({
      soundRepo,
      configRepo,
      scheduler: { getStatus: () => status },
      logger,
      rootPath: '/ambush',
      maxSoundBytes: 1024
    });
  });

  afterEach(async () => {
    await eventBus.shutdown();
    await storage.close();
    await testDataDir.cleanup();
  });

  it('should serve everything under the root path', async () => {
    expect((await request(app).get('/ambush/health')).status).toBe(200);
    expect((await request(app).get('/api/config')).status).toBe(404);
  });

  describe('GET /api/config', () => {
    it('should return the stored configuration', async () => {
      const res = await request(app).get('/ambush/api/config');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ interval: 30, volume: 100, notifyChannel: null });
    });
  });

  describe('PUT /api/config/interval', () => {
    it('should change the interval and publish one event', async () => {
      const res = await request(app).put('/ambush/api/config/interval').send({ seconds: 45 });
      await eventBus.whenIdle();

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ oldValue: 30, newValue: 45 });
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({
        type: 'config:interval_changed',
        payload: { oldValue: 30, newValue: 45 },
        source: 'web'
      });
    });

    it.each([29, 3601, 60.5])('should reject %p and keep the stored value', async (seconds) => {
      const res = await request(app).put('/ambush/api/config/interval').send({ seconds });

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Interval must be an integer between 30 and 3600');
      expect(await configRepo.getInterval()).toBe(30);
    });

    it('should reject a non-numeric value', async () => {
      const res = await request(app).put('/ambush/api/config/interval').send({ seconds: '45' });

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Invalid request body');
    });
  });

  describe('PUT /api/config/volume', () => {
    it('should change the volume', async () => {
      const res = await request(app).put('/ambush/api/config/volume').send({ percent: 35 });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ oldValue: 100, newValue: 35 });
      expect(await configRepo.getVolume()).toBe(35);
    });

    it('should reject a volume above 100', async () => {
      const res = await request(app).put('/ambush/api/config/volume').send({ percent: 101 });

      expect(res.status).toBe(400);
      expect(await configRepo.getVolume()).toBe(100);
    });
  });

  describe('PUT /api/config/notify-channel', () => {
    it('should set and clear the channel', async () => {
      const set = await request(app).put('/ambush/api/config/notify-channel').send({ channelId: '123' });
      const cleared = await request(app).put('/ambush/api/config/notify-channel').send({ channelId: null });

      expect(set.body).toEqual({ oldValue: null, newValue: '123' });
      expect(cleared.body).toEqual({ oldValue: '123', newValue: null });
    });

    it('should reject a channel id with letters', async () => {
      const res = await request(app).put('/ambush/api/config/notify-channel').send({ channelId: 'general' });

      expect(res.status).toBe(400);
      expect(res.body.details).toEqual([{ path: 'channelId', message: 'Channel id must contain digits only' }]);
    });
  });

  describe('GET /api/status', () => {
    it('should combine scheduler status and sound count', async () => {
      await soundRepo.create('a.mp3', Buffer.from('a'), 'web');

      const res = await request(app).get('/ambush/api/status');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ ...status, soundCount: 1 });
    });
  });
});
