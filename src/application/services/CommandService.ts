import { INTERVAL_BOUNDS, SchedulerStatus, VOLUME_BOUNDS } from '../../types';
import { ISoundRepository } from '../../domain/repositories/ISoundRepository';
import { IConfigRepository } from '../../domain/repositories/IConfigRepository';
import { ILogger } from '../../domain/common/ILogger';
import { NotFoundError, ValidationError } from '../../domain/common/Errors';

export type CommandName = 'ping' | 'list' | 'status' | 'volume' | 'interval' | 'nextsound';

export interface CommandOptionDefinition {
  name: string;
  description: string;
  required: boolean;
  minValue: number;
  maxValue: number;
}

export interface CommandDefinition {
  name: CommandName;
  description: string;
  options: CommandOptionDefinition[];
}

/**
 * Slash command catalogue. Integer options only.
 */
export const COMMAND_DEFINITIONS: readonly CommandDefinition[] = [
  { name: 'ping', description: 'Ping the bot and get a response', options: [] },
  { name: 'list', description: 'Show all available sounds in the soundboard', options: [] },
  { name: 'status', description: "Show the soundboard's current status", options: [] },
  {
    name: 'volume',
    description: 'Set the soundboard playback volume',
    options: [{
      name: 'level',
      description: `Volume level (${VOLUME_BOUNDS.min}-${VOLUME_BOUNDS.max})`,
      required: true,
      minValue: VOLUME_BOUNDS.min,
      maxValue: VOLUME_BOUNDS.max
    }]
  },
  {
    name: 'interval',
    description: 'Set the number of seconds between sounds',
    options: [{
      name: 'seconds',
      description: `Seconds between sounds (${INTERVAL_BOUNDS.min}-${INTERVAL_BOUNDS.max})`,
      required: true,
      minValue: INTERVAL_BOUNDS.min,
      maxValue: INTERVAL_BOUNDS.max
    }]
  },
  { name: 'nextsound', description: 'Show time left until the next sound is played', options: [] }
];

export interface CommandInvocation {
  name: string;
  /** Mention of the invoking user, e.g. `<@123>` */
  userMention: string;
  integerOptions: Readonly<Record<string, number | undefined>>;
}

export interface CommandReply {
  content: string;
  ephemeral: boolean;
}

export interface SchedulerStatusSource {
  getStatus(): SchedulerStatus;
}

export const LIST_DISPLAY_LIMIT = 45;

function reply(content: string, ephemeral = false): CommandReply {
  return { content, ephemeral };
}

function volumeEmoji(level: number): string {
  if (level === 0) return '🔇';
  if (level < 33) return '🔈';
  if (level < 66) return '🔉';
  return '🔊';
}

function requireInteger(invocation: CommandInvocation, option: string): number {
  const value = invocation.integerOptions[option];
  if (value === undefined) {
    throw new ValidationError(`Option '${option}' is required`);
  }
  return value;
}

/**
 * Chat command handler, independent of the chat transport.
 * Mutations are tagged with the `command` source.
 */
export class CommandService {
  constructor(
    private soundRepo: ISoundRepository,
    private configRepo: IConfigRepository,
    private scheduler: SchedulerStatusSource,
    private logger: ILogger,
    private now: () => number = Date.now
  ) {}

  /**
   * Validation and not-found failures become ephemeral replies; anything
   * else is rethrown for the transport to report.
   */
  async execute(invocation: CommandInvocation): Promise<CommandReply> {
    this.logger.debug(`Command received: /${invocation.name}`);

    try {
      return await this.run(invocation);
    } catch (err) {
      if (err instanceof ValidationError || err instanceof NotFoundError) {
        return reply(`❌ ${err.message}`, true);
      }
      throw err;
    }
  }

  private async run(invocation: CommandInvocation): Promise<CommandReply> {
    switch (invocation.name) {
      case 'ping':
        return reply(`🔊 Pong! Audio Ambush is ready, ${invocation.userMention}!`);
      case 'list':
        return this.list();
      case 'status':
        return this.status();
      case 'volume':
        return this.volume(requireInteger(invocation, 'level'));
      case 'interval':
        return this.interval(requireInteger(invocation, 'seconds'));
      case 'nextsound':
        return this.nextSound();
      default:
        return reply(`❌ Unknown command: ${invocation.name}`, true);
    }
  }

  private async list(): Promise<CommandReply> {
    const sounds = await this.soundRepo.list();
    if (sounds.length === 0) {
      return reply('🔇 No sounds available. Upload some sounds via the web interface!', true);
    }

    const lines = [
      `🎵 **${sounds.length}** sounds available`,
      ...sounds.slice(0, LIST_DISPLAY_LIMIT).map(sound => `• \`${sound.name}\``)
    ];
    if (sounds.length > LIST_DISPLAY_LIMIT) {
      lines.push(`... and ${sounds.length - LIST_DISPLAY_LIMIT} more sounds`);
    }
    return reply(lines.join('\n'));
  }

  private async status(): Promise<CommandReply> {
    const status = this.scheduler.getStatus();
    const [volume, soundCount] = await Promise.all([
      this.configRepo.getVolume(),
      this.soundRepo.count()
    ]);

    const lines = [
      '📊 **Soundboard Status**',
      status.lifecycle === 'running' ? `🟢 Active (${status.state})` : '🔴 Stopped',
      status.connectedChannelId ? `🔊 Connected to <#${status.connectedChannelId}>` : '🔇 Not connected',
      `⏱️ Interval: ${status.intervalSeconds} seconds`,
      `🔊 Volume: ${volume}%`,
      `🎵 Sounds: ${soundCount} available`
    ];
    return reply(lines.join('\n'));
  }

  private async volume(level: number): Promise<CommandReply> {
    const change = await this.configRepo.setVolume(level, 'command');
    return reply(`${volumeEmoji(change.newValue)} Volume changed from **${change.oldValue}%** to **${change.newValue}%**`);
  }

  private async interval(seconds: number): Promise<CommandReply> {
    const change = await this.configRepo.setInterval(seconds, 'command');
    return reply(`⏱️ Interval changed from **${change.oldValue}** to **${change.newValue}** seconds`);
  }

  private nextSound(): CommandReply {
    const status = this.scheduler.getStatus();
    if (status.lifecycle !== 'running') {
      return reply('⏸️ The soundboard is not running.');
    }
    if (status.nextTickAt === null || status.nextTickAt <= this.now()) {
      return reply('A sound can be played now!');
    }
    const seconds = Math.ceil((status.nextTickAt - this.now()) / 1000);
    return reply(`Next sound in ${seconds} seconds.`);
  }
}
