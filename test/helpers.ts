import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { VoiceChannelInfo } from '../src/types';
import { IVoiceGateway, IVoiceSession, PlaybackOptions } from '../src/domain/services/IVoiceGateway';
import { IMessagingSink } from '../src/domain/services/IMessagingSink';
import { ConnectionError, DeliveryError } from '../src/domain/common/Errors';

/**
 * Test helper utilities
 */

let dirCounter = 0;

export class TestDataDir {
  private testDir: string;

  constructor() {
    // Use a unique test directory for each test
    this.testDir = path.join(os.tmpdir(), `audio-ambush-test-${process.pid}-${Date.now()}-${dirCounter++}`);
  }

  getPath(): string {
    return this.testDir;
  }

  async cleanup(): Promise<void> {
    await fs.rm(this.testDir, { recursive: true, force: true });
  }
}

/**
 * Wait for a condition to be true
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  timeout: number = 5000,
  interval: number = 20
): Promise<void> {
  const startTime = Date.now();

  while (Date.now() - startTime < timeout) {
    if (await condition()) {
      return;
    }
    await new Promise(resolve => setTimeout(resolve, interval));
  }

  throw new Error(`Timeout waiting for condition after ${timeout}ms`);
}

/**
 * Wait for a specific time
 */
export async function wait(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Logger whose methods are jest mocks. `child` returns the same logger.
 */
export function createMockLogger() {
  const logger = {
    error: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    debug: jest.fn(),
    child: jest.fn()
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

export type MockLogger = ReturnType<typeof createMockLogger>;

/**
 * Promise with its settle functions exposed.
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(reason: unknown): void;
}

export function createDeferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Settle with `promise`, or reject with a ConnectionError once `signal` aborts.
 */
export function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new ConnectionError('Voice connection was cancelled'));
    if (signal.aborted) return onAbort();
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(resolve, reject);
  });
}

export interface PlayRecord {
  payload: Buffer;
  volume: number;
  signal: AbortSignal;
}

/**
 * In-memory voice session. Playback finishes immediately unless
 * `playImpl` is replaced.
 */
export class FakeVoiceSession implements IVoiceSession {
  connected = true;
  readonly plays: PlayRecord[] = [];
  readonly moves: string[] = [];
  /** While set, moves wait for it */
  pendingMove: Promise<void> | null = null;
  playImpl: (record: PlayRecord) => Promise<void> = () => Promise.resolve();

  constructor(
    readonly guildId: string,
    public channelId: string
  ) {}

  isConnected(): boolean {
    return this.connected;
  }

  async move(channelId: string, signal?: AbortSignal): Promise<void> {
    this.moves.push(channelId);
    if (this.pendingMove) {
      await untilAborted(this.pendingMove, signal);
    }
    this.channelId = channelId;
  }

  play(payload: Buffer, options: PlaybackOptions): Promise<void> {
    const record: PlayRecord = { payload, volume: options.volume, signal: options.signal };
    this.plays.push(record);
    return this.playImpl(record);
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }
}

/**
 * In-memory voice gateway over a fixed channel list.
 */
export class FakeVoiceGateway implements IVoiceGateway {
  channels: VoiceChannelInfo[] = [];
  session: FakeVoiceSession | null = null;
  readonly connects: string[] = [];
  readonly connectSignals: Array<AbortSignal | undefined> = [];
  failConnect = false;
  /** While set, connects wait for it */
  pendingConnect: Promise<void> | null = null;
  listCalls = 0;

  async listVoiceChannels(guildId: string): Promise<VoiceChannelInfo[]> {
    this.listCalls++;
    return this.channels.map(channel => ({ ...channel }));
  }

  getSession(guildId: string): IVoiceSession | null {
    return this.session && this.session.connected ? this.session : null;
  }

  requireSession(): FakeVoiceSession {
    if (!this.session) {
      throw new Error('No voice session has been opened');
    }
    return this.session;
  }

  async connect(guildId: string, channelId: string, signal?: AbortSignal): Promise<IVoiceSession> {
    this.connects.push(channelId);
    this.connectSignals.push(signal);
    if (this.pendingConnect) {
      await untilAborted(this.pendingConnect, signal);
    }
    if (this.failConnect) {
      throw new ConnectionError(`Failed to join voice channel ${channelId}`);
    }
    this.session = new FakeVoiceSession(guildId, channelId);
    return this.session;
  }
}

export interface SentMessage {
  channelId: string;
  text: string;
}

/**
 * Records sent messages. The first `failuresBeforeSuccess` sends fail.
 */
export class FakeMessagingSink implements IMessagingSink {
  readonly sent: SentMessage[] = [];
  attempts = 0;
  failuresBeforeSuccess = 0;
  /** While set, sends wait for it */
  pendingSend: Promise<void> | null = null;

  async send(channelId: string, text: string): Promise<void> {
    this.attempts++;
    if (this.pendingSend) {
      await this.pendingSend;
    }
    if (this.attempts <= this.failuresBeforeSuccess) {
      throw new DeliveryError(`Channel ${channelId} unavailable`);
    }
    this.sent.push({ channelId, text });
  }
}
