import { Readable } from 'stream';
import { Client } from 'discord.js';
import {
  AudioPlayer,
  AudioPlayerError,
  AudioPlayerStatus,
  VoiceConnection,
  VoiceConnectionStatus,
  createAudioPlayer,
  createAudioResource,
  entersState,
  joinVoiceChannel
} from '@discordjs/voice';
import { VoiceChannelInfo } from '../../types';
import { IVoiceGateway, IVoiceSession, PlaybackOptions } from '../../domain/services/IVoiceGateway';
import { ILogger } from '../../domain/common/ILogger';
import { ConnectionError, toError } from '../../domain/common/Errors';

const READY_TIMEOUT_MS = 20_000;

/**
 * Wait for the connection to become ready, giving up after READY_TIMEOUT_MS
 * or when `signal` aborts.
 */
async function waitUntilReady(connection: VoiceConnection, signal?: AbortSignal): Promise<void> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), READY_TIMEOUT_MS);
  const onAbort = () => controller.abort();

  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  try {
    await entersState(connection, VoiceConnectionStatus.Ready, controller.signal);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
}

function destroyConnection(connection: VoiceConnection): void {
  if (connection.state.status !== VoiceConnectionStatus.Destroyed) {
    connection.destroy();
  }
}

function isLive(connection: VoiceConnection): boolean {
  const status = connection.state.status;
  return status !== VoiceConnectionStatus.Destroyed && status !== VoiceConnectionStatus.Disconnected;
}

/**
 * One voice connection with its own audio player.
 * Payloads are handed to @discordjs/voice as a stream; ffmpeg transcodes them.
 */
export class DiscordVoiceSession implements IVoiceSession {
  private readonly player: AudioPlayer;

  constructor(
    readonly guildId: string,
    private currentChannelId: string,
    private connection: VoiceConnection,
    private logger: ILogger,
    private onClosed: () => void
  ) {
    this.player = createAudioPlayer();
    this.connection.subscribe(this.player);
  }

  get channelId(): string {
    return this.currentChannelId;
  }

  isConnected(): boolean {
    return isLive(this.connection);
  }

  async move(channelId: string, signal?: AbortSignal): Promise<void> {
    if (!this.connection.rejoin({ channelId, selfDeaf: true, selfMute: false })) {
      throw new ConnectionError(`Voice connection cannot move to channel ${channelId}`);
    }

    try {
      await waitUntilReady(this.connection, signal);
    } catch (err) {
      throw new ConnectionError(`Failed to move to voice channel ${channelId}`, err);
    }
    this.currentChannelId = channelId;
  }

  play(payload: Buffer, options: PlaybackOptions): Promise<void> {
    const { volume, signal } = options;
    if (signal.aborted) return Promise.resolve();

    const resource = createAudioResource(Readable.from([payload]), { inlineVolume: true });
    resource.volume?.setVolume(volume / 100);

    return new Promise<void>((resolve, reject) => {
      const cleanup = () => {
        this.player.off(AudioPlayerStatus.Idle, onIdle);
        this.player.off('error', onError);
        signal.removeEventListener('abort', onAbort);
      };
      const onIdle = () => {
        cleanup();
        resolve();
      };
      const onError = (error: AudioPlayerError) => {
        cleanup();
        reject(error);
      };
      // Stopping moves the player to Idle, which settles the promise
      const onAbort = () => {
        this.player.stop(true);
      };

      this.player.on(AudioPlayerStatus.Idle, onIdle);
      this.player.on('error', onError);
      signal.addEventListener('abort', onAbort, { once: true });
      this.player.play(resource);
    });
  }

  async disconnect(): Promise<void> {
    this.release();
    this.onClosed();
    this.logger.info('Left voice channel', { guildId: this.guildId, channelId: this.currentChannelId });
  }

  /**
   * Stop the player and destroy the connection.
   */
  release(): void {
    this.player.stop(true);
    destroyConnection(this.connection);
  }
}

/**
 * Voice capability backed by a logged-in discord.js client.
 */
export class DiscordVoiceGateway implements IVoiceGateway {
  private sessions = new Map<string, DiscordVoiceSession>();

  constructor(
    private client: Client,
    private logger: ILogger
  ) {}

  async listVoiceChannels(guildId: string): Promise<VoiceChannelInfo[]> {
    const guild = await this.client.guilds.fetch(guildId);

    const channels: Array<VoiceChannelInfo & { position: number }> = [];
    for (const channel of guild.channels.cache.values()) {
      if (!channel.isVoiceBased()) continue;
      channels.push({
        id: channel.id,
        name: channel.name,
        memberCount: channel.members.filter(member => !member.user.bot).size,
        position: channel.rawPosition
      });
    }

    return channels
      .sort((a, b) => a.position - b.position)
      .map(({ id, name, memberCount }) => ({ id, name, memberCount }));
  }

  getSession(guildId: string): IVoiceSession | null {
    const session = this.sessions.get(guildId);
    if (session && !session.isConnected()) {
      // A dropped connection is still registered with @discordjs/voice until destroyed
      session.release();
      this.sessions.delete(guildId);
      this.logger.warn('Voice connection lost, session released', { guildId, channelId: session.channelId });
      return null;
    }
    return session ?? null;
  }

  async connect(guildId: string, channelId: string, signal?: AbortSignal): Promise<IVoiceSession> {
    let connection: VoiceConnection;
    try {
      const guild = await this.client.guilds.fetch(guildId);
      connection = joinVoiceChannel({
        guildId,
        channelId,
        adapterCreator: guild.voiceAdapterCreator,
        selfDeaf: true
      });
    } catch (err) {
      throw new ConnectionError(`Failed to join voice channel ${channelId}`, err);
    }

    try {
      await waitUntilReady(connection, signal);
    } catch (err) {
      destroyConnection(connection);
      const reason = signal?.aborted ? 'was cancelled' : 'did not become ready';
      throw new ConnectionError(`Voice connection to ${channelId} ${reason}`, err);
    }

    connection.on('error', (error) => {
      this.logger.error('Voice connection error:', toError(error), { guildId });
    });

    const session = new DiscordVoiceSession(
      guildId,
      channelId,
      connection,
      this.logger,
      () => this.sessions.delete(guildId)
    );
    this.sessions.set(guildId, session);
    this.logger.info('Joined voice channel', { guildId, channelId });
    return session;
  }
}
