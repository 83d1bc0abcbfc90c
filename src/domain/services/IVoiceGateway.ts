import { VoiceChannelInfo } from '../../types';

export interface PlaybackOptions {
  /** Percent, 0..100 */
  volume: number;
  /** Aborting stops playback and settles the play promise */
  signal: AbortSignal;
}

/**
 * Connection to one voice channel of one guild.
 */
export interface IVoiceSession {
  readonly guildId: string;
  readonly channelId: string;

  isConnected(): boolean;

  /**
   * Aborting `signal` gives up waiting for the move.
   * @throws {ConnectionError} if the move does not complete
   */
  move(channelId: string, signal?: AbortSignal): Promise<void>;

  /**
   * Resolves when playback finishes or is aborted.
   */
  play(payload: Buffer, options: PlaybackOptions): Promise<void>;

  disconnect(): Promise<void>;
}

/**
 * Voice capability of the chat platform. Owns the sessions; at most one per guild.
 */
export interface IVoiceGateway {
  /**
   * Voice channels of the guild with their non-bot member counts, in display order.
   */
  listVoiceChannels(guildId: string): Promise<VoiceChannelInfo[]>;

  getSession(guildId: string): IVoiceSession | null;

  /**
   * Aborting `signal` gives up the join and releases the half-open connection.
   * @throws {ConnectionError} if the channel cannot be joined
   */
  connect(guildId: string, channelId: string, signal?: AbortSignal): Promise<IVoiceSession>;
}
