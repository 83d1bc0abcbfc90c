import * as path from 'path';
import * as os from 'os';
import dotenv from 'dotenv';
import { ConfigError } from '../../domain/common/Errors';
import { LogLevel } from '../../domain/common/ILogger';
import { LogFormat } from '../common/ConsoleLogger';
import { INTERVAL_BOUNDS, NumericBounds, VOLUME_BOUNDS } from '../../types';

/**
 * Logging configuration.
 */
export interface LogConfig {
  level: LogLevel;
  format: LogFormat;
}

/**
 * Notification delivery configuration.
 */
export interface NotifyConfig {
  maxAttempts: number;
  baseDelayMs: number;
}

type NodeEnv = 'development' | 'production' | 'test';

/**
 * Complete configuration options.
 */
export interface ConfigOptions {
  // Discord
  discordToken: string;
  guildId: string;
  notifyChannelId: string | null;

  // Storage
  dataDir: string;

  // Web server
  host: string;
  port: number;
  webRootPath: string;
  maxSoundBytes: number;

  // Seeds for the persisted configuration
  defaultInterval: number;
  defaultVolume: number;

  // Playback
  playbackTimeoutMs: number;
  voiceIdleDisconnectCycles: number;

  // Operational
  notify: NotifyConfig;
  eventQueueCapacity: number;
  log: LogConfig;

  // Environment
  nodeEnv: NodeEnv;
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];
const LOG_FORMATS: readonly LogFormat[] = ['json', 'pretty'];
const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];
const UNBOUNDED = Number.MAX_SAFE_INTEGER;

/**
 * Expand ~ to home directory in paths.
 */
function expandPath(p: string): string {
  if (p.startsWith('~')) {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some(candidate => candidate === value);
}

/**
 * Centralized configuration class.
 * Loads configuration from environment variables with sensible defaults.
 */
export class Config implements Readonly<ConfigOptions> {
  private readonly config: ConfigOptions;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
    this.config = this.loadFromEnvironment();
    this.validate();
  }

  /**
   * Read `.env` from the working directory into process.env, then load.
   */
  static load(): Config {
    dotenv.config();
    return new Config();
  }

  private loadFromEnvironment(): ConfigOptions {
    return {
      // Discord
      discordToken: this.string('DISCORD_BOT_TOKEN', ''),
      guildId: this.string('GUILD_ID', ''),
      notifyChannelId: this.env.NOTIFY_CHANNEL_ID?.trim() || null,

      // Storage
      dataDir: expandPath(this.string('DATA_DIR', '~/.audio-ambush/data')),

      // Web server
      host: this.string('HOST', '0.0.0.0'),
      port: this.integer('PORT', 8000, { min: 1, max: 65535 }),
      webRootPath: this.string('WEB_ROOT_PATH', '').replace(/\/+$/, ''),
      maxSoundBytes: this.integer('MAX_SOUND_BYTES', 1024 * 1024, { min: 1, max: UNBOUNDED }),

      // Persisted configuration seeds
      defaultInterval: this.integer('DEFAULT_INTERVAL', 30, INTERVAL_BOUNDS),
      defaultVolume: this.integer('DEFAULT_VOLUME', 100, VOLUME_BOUNDS),

      // Playback
      playbackTimeoutMs: this.integer('PLAYBACK_TIMEOUT_MS', 60_000, { min: 1, max: UNBOUNDED }),
      voiceIdleDisconnectCycles: this.integer('VOICE_IDLE_DISCONNECT_CYCLES', 0, { min: 0, max: UNBOUNDED }),

      // Operational
      notify: {
        maxAttempts: this.integer('NOTIFY_MAX_ATTEMPTS', 4, { min: 1, max: 20 }),
        baseDelayMs: this.integer('NOTIFY_BASE_DELAY_MS', 500, { min: 0, max: UNBOUNDED })
      },
      eventQueueCapacity: this.integer('EVENT_QUEUE_CAPACITY', 1000, { min: 1, max: UNBOUNDED }),
      log: {
        level: this.oneOf('LOG_LEVEL', LOG_LEVELS, 'info'),
        format: this.oneOf('LOG_FORMAT', LOG_FORMATS, 'pretty')
      },

      // Environment
      nodeEnv: this.oneOf('NODE_ENV', NODE_ENVS, 'development')
    };
  }

  private string(name: string, fallback: string): string {
    return this.env[name]?.trim() || fallback;
  }

  private integer(name: string, fallback: number, bounds: NumericBounds): number {
    const raw = this.env[name]?.trim();
    if (!raw) return fallback;

    const value = Number(raw);
    if (!Number.isInteger(value) || value < bounds.min || value > bounds.max) {
      const range = bounds.max === UNBOUNDED ? `>= ${bounds.min}` : `between ${bounds.min} and ${bounds.max}`;
      throw new ConfigError(`${name} must be an integer ${range}, got "${raw}"`);
    }
    return value;
  }

  private oneOf<T extends string>(name: string, values: readonly T[], fallback: T): T {
    const raw = this.env[name]?.trim();
    if (!raw) return fallback;

    if (!isOneOf(values, raw)) {
      throw new ConfigError(`${name} must be one of ${values.map(v => `"${v}"`).join(', ')}`);
    }
    return raw;
  }

  /**
   * Validate configuration values.
   * @throws {ConfigError} if configuration is invalid
   */
  validate(): void {
    if (!this.config.discordToken) {
      throw new ConfigError('DISCORD_BOT_TOKEN is required');
    }

    if (!/^\d+$/.test(this.config.guildId)) {
      throw new ConfigError('GUILD_ID is required and must contain digits only');
    }

    if (this.config.notifyChannelId !== null && !/^\d+$/.test(this.config.notifyChannelId)) {
      throw new ConfigError('NOTIFY_CHANNEL_ID must contain digits only');
    }

    if (this.config.webRootPath && !this.config.webRootPath.startsWith('/')) {
      throw new ConfigError('WEB_ROOT_PATH must be empty or start with "/"');
    }
  }

  // Readonly accessors
  get discordToken(): string { return this.config.discordToken; }
  get guildId(): string { return this.config.guildId; }
  get notifyChannelId(): string | null { return this.config.notifyChannelId; }
  get dataDir(): string { return this.config.dataDir; }
  get host(): string { return this.config.host; }
  get port(): number { return this.config.port; }
  get webRootPath(): string { return this.config.webRootPath; }
  get maxSoundBytes(): number { return this.config.maxSoundBytes; }
  get defaultInterval(): number { return this.config.defaultInterval; }
  get defaultVolume(): number { return this.config.defaultVolume; }
  get playbackTimeoutMs(): number { return this.config.playbackTimeoutMs; }
  get voiceIdleDisconnectCycles(): number { return this.config.voiceIdleDisconnectCycles; }
  get notify(): NotifyConfig { return this.config.notify; }
  get eventQueueCapacity(): number { return this.config.eventQueueCapacity; }
  get log(): LogConfig { return this.config.log; }
  get nodeEnv(): NodeEnv { return this.config.nodeEnv; }

  /**
   * Get a summary string for logging. The bot token is never included.
   */
  toString(): string {
    return [
      `Config:`,
      `  guildId: ${this.guildId}`,
      `  notifyChannelId: ${this.notifyChannelId ?? '(none)'}`,
      `  dataDir: ${this.dataDir}`,
      `  listen: ${this.host}:${this.port}${this.webRootPath || '/'}`,
      `  defaults: interval=${this.defaultInterval}s volume=${this.defaultVolume}%`,
      `  playbackTimeoutMs: ${this.playbackTimeoutMs}`,
      `  voiceIdleDisconnectCycles: ${this.voiceIdleDisconnectCycles}`,
      `  nodeEnv: ${this.nodeEnv}`
    ].join('\n');
  }
}
