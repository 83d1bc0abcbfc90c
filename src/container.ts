import { Config } from './infrastructure/config/Config';
import { ConsoleLogger } from './infrastructure/common/ConsoleLogger';
import { InMemoryEventBus } from './infrastructure/events/InMemoryEventBus';
import { FileSystemStorageGateway } from './infrastructure/storage/FileSystemStorageGateway';
import { StorageSoundRepository } from './infrastructure/repositories/StorageSoundRepository';
import { StorageConfigRepository } from './infrastructure/repositories/StorageConfigRepository';
import { DiscordBot } from './infrastructure/discord/DiscordBot';
import { DiscordVoiceGateway } from './infrastructure/discord/DiscordVoiceGateway';
import { DiscordMessagingSink } from './infrastructure/discord/DiscordMessagingSink';
import { PlaybackScheduler } from './application/services/PlaybackScheduler';
import { NotificationDispatcher } from './application/services/NotificationDispatcher';
import { CommandService } from './application/services/CommandService';
import { ILogger } from './domain/common/ILogger';
import { IEventBus } from './domain/events/IEventBus';
import { createEvent } from './domain/events/DomainEvents';
import { IStorageGateway } from './domain/storage/IStorageGateway';
import { ISoundRepository } from './domain/repositories/ISoundRepository';
import { IConfigRepository } from './domain/repositories/IConfigRepository';

/**
 * Dependency injection container.
 * Wires together all application components.
 */
export interface Container {
  // Configuration
  config: Config;

  // Infrastructure
  logger: ILogger;
  eventBus: IEventBus;
  storage: IStorageGateway;
  bot: DiscordBot;

  // Repositories
  soundRepo: ISoundRepository;
  configRepo: IConfigRepository;

  // Services
  scheduler: PlaybackScheduler;
  dispatcher: NotificationDispatcher;
  commandService: CommandService;

  // Lifecycle
  initialize(): Promise<void>;
  shutdown(reason?: string): Promise<void>;
}

/**
 * Create and wire up all dependencies.
 */
export async function createContainer(config: Config = Config.load()): Promise<Container> {
  // 1. Infrastructure - Core
  const logger = new ConsoleLogger(config.log.level, {}, config.log.format);
  const eventBus = new InMemoryEventBus(logger.child({ component: 'event-bus' }), {
    queueCapacity: config.eventQueueCapacity
  });
  const storage = new FileSystemStorageGateway(
    config.dataDir,
    { interval: config.defaultInterval, volume: config.defaultVolume, notifyChannel: config.notifyChannelId },
    logger.child({ component: 'storage' })
  );

  // 2. Repositories
  const soundRepo = new StorageSoundRepository(storage, eventBus, logger.child({ component: 'sounds' }));
  const configRepo = new StorageConfigRepository(storage, eventBus, logger.child({ component: 'config' }));

  // 3. Discord adapters
  const bot = new DiscordBot(config.discordToken, config.guildId, eventBus, logger.child({ component: 'discord' }));
  const voiceGateway = new DiscordVoiceGateway(bot.client, logger.child({ component: 'voice' }));
  const messagingSink = new DiscordMessagingSink(bot.client);

  // 4. Services
  const scheduler = new PlaybackScheduler(
    soundRepo,
    configRepo,
    voiceGateway,
    eventBus,
    logger.child({ component: 'scheduler' }),
    {
      guildId: config.guildId,
      playbackTimeoutMs: config.playbackTimeoutMs,
      idleDisconnectCycles: config.voiceIdleDisconnectCycles
    }
  );
  const dispatcher = new NotificationDispatcher(
    configRepo,
    messagingSink,
    eventBus,
    logger.child({ component: 'notifications' }),
    config.notify
  );
  const commandService = new CommandService(soundRepo, configRepo, scheduler, logger.child({ component: 'commands' }));

  let shuttingDown: Promise<void> | null = null;

  const container: Container = {
    config,
    logger,
    eventBus,
    storage,
    bot,
    soundRepo,
    configRepo,
    scheduler,
    dispatcher,
    commandService,

    async initialize() {
      logger.info('Initializing container...');

      // Storage failure is fatal at startup
      await storage.initialize();
      dispatcher.start();
      await bot.start(commandService);
      await scheduler.start();

      logger.info('Container initialized');
    },

    shutdown(reason = 'shutdown') {
      if (!shuttingDown) {
        shuttingDown = (async () => {
          logger.info(`Shutting down container (${reason})...`);

          eventBus.publish(createEvent('system:shutdown', { reason }, 'system'));
          await scheduler.stop();
          await dispatcher.stop();
          await eventBus.shutdown();
          await bot.stop();
          await storage.close();

          logger.info('Container shutdown complete');
        })();
      }
      return shuttingDown;
    }
  };

  return container;
}
