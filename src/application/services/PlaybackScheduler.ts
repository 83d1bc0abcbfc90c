import {
  CycleOutcome,
  INTERVAL_BOUNDS,
  SchedulerLifecycle,
  SchedulerState,
  SchedulerStatus,
  Sound,
  VoiceChannelInfo
} from '../../types';
import { ISoundRepository } from '../../domain/repositories/ISoundRepository';
import { IConfigRepository } from '../../domain/repositories/IConfigRepository';
import { IVoiceGateway, IVoiceSession } from '../../domain/services/IVoiceGateway';
import { IEventBus, Subscription } from '../../domain/events/IEventBus';
import { EventOf } from '../../domain/events/DomainEvents';
import { ILogger } from '../../domain/common/ILogger';
import { ConnectionError, toError } from '../../domain/common/Errors';

export interface PlaybackSchedulerOptions {
  guildId: string;
  /** Upper bound for one playback (default 60000) */
  playbackTimeoutMs?: number;
  /** Consecutive empty cycles before leaving voice; 0 stays connected (default 0) */
  idleDisconnectCycles?: number;
  onTransition?: (from: SchedulerState, to: SchedulerState) => void;
}

type SchedulerEvent = EventOf<'config:interval_changed' | 'system:shutdown'>;

/**
 * Channel with the strictly greatest member count; the first one wins ties.
 * Returns null when no channel has members.
 */
export function pickBusiestChannel(channels: readonly VoiceChannelInfo[]): VoiceChannelInfo | null {
  let best: VoiceChannelInfo | null = null;
  for (const channel of channels) {
    if (channel.memberCount > 0 && (!best || channel.memberCount > best.memberCount)) {
      best = channel;
    }
  }
  return best;
}

/**
 * Periodically joins the busiest voice channel and plays a random sound.
 *
 * States: idle -> selecting_channel -> connecting -> playing -> idle.
 * Every exit path of a cycle returns to idle and yields a CycleOutcome;
 * no error leaves `tick()`.
 *
 * The wait between cycles is a single timer tagged with a generation
 * number. Rearming bumps the generation, so a callback from a timer that
 * was replaced does nothing.
 */
export class PlaybackScheduler {
  private readonly guildId: string;
  private readonly playbackTimeoutMs: number;
  private readonly idleDisconnectCycles: number;
  private readonly onTransition?: (from: SchedulerState, to: SchedulerState) => void;

  private lifecycle: SchedulerLifecycle = 'created';
  private state: SchedulerState = 'idle';
  private intervalSeconds = INTERVAL_BOUNDS.min;
  private timer: NodeJS.Timeout | null = null;
  private generation = 0;
  private nextTickAt: number | null = null;
  private inFlight: Promise<CycleOutcome> | null = null;
  private cycleAbort: AbortController | null = null;
  private lastOutcome: CycleOutcome | null = null;
  private lastCycleAt: number | null = null;
  private emptyCycles = 0;
  private subscription: Subscription | null = null;
  private stopping: Promise<void> | null = null;

  constructor(
    private soundRepo: ISoundRepository,
    private configRepo: IConfigRepository,
    private voice: IVoiceGateway,
    private eventBus: IEventBus,
    private logger: ILogger,
    options: PlaybackSchedulerOptions
  ) {
    this.guildId = options.guildId;
    this.playbackTimeoutMs = options.playbackTimeoutMs ?? 60_000;
    this.idleDisconnectCycles = options.idleDisconnectCycles ?? 0;
    this.onTransition = options.onTransition;
  }

  async start(): Promise<void> {
    if (this.lifecycle !== 'created') return;

    const interval = await this.configRepo.getInterval();
    if (this.isStopped()) return;

    this.intervalSeconds = interval;
    this.subscription = this.eventBus.subscribe(
      ['config:interval_changed', 'system:shutdown'],
      event => this.handleEvent(event),
      'playback-scheduler'
    );
    this.lifecycle = 'running';
    this.arm();

    this.logger.info(`Playback scheduler started (every ${interval}s)`, { guildId: this.guildId });
  }

  /**
   * Run one cycle now. Returns `dropped` while another cycle is in flight.
   */
  async tick(): Promise<CycleOutcome> {
    if (this.isStopped()) return 'stopped';

    if (this.inFlight) {
      this.logger.warn('Tick dropped, previous playback cycle still running', { state: this.state });
      return 'dropped';
    }

    const cycle = this.runCycle();
    this.inFlight = cycle;
    try {
      return await cycle;
    } finally {
      this.inFlight = null;
      if (this.lifecycle === 'running') {
        this.arm();
      }
    }
  }

  getStatus(): SchedulerStatus {
    const session = this.voice.getSession(this.guildId);
    return {
      lifecycle: this.lifecycle,
      state: this.state,
      intervalSeconds: this.intervalSeconds,
      nextTickAt: this.nextTickAt,
      lastOutcome: this.lastOutcome,
      lastCycleAt: this.lastCycleAt,
      connectedChannelId: session && session.isConnected() ? session.channelId : null
    };
  }

  /**
   * Cancel the wait, abort the running cycle (join or playback), wait for
   * it to settle and leave voice.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    this.lifecycle = 'stopped';
    this.cancelTimer();
    this.cycleAbort?.abort();

    // Must not wait for the subscription to close: stop() may run inside its handler
    this.subscription?.unsubscribe();
    this.subscription = null;

    if (this.inFlight) {
      await this.inFlight;
    }

    await this.disconnect();
    this.logger.info('Playback scheduler stopped');
  }

  private isStopped(): boolean {
    return this.lifecycle === 'stopped';
  }

  private handleEvent(event: SchedulerEvent): Promise<void> | void {
    switch (event.type) {
      case 'config:interval_changed':
        this.intervalSeconds = event.payload.newValue;
        if (this.lifecycle === 'running') {
          this.arm();
          this.logger.info(`Interval changed to ${event.payload.newValue}s, timer rearmed`, { source: event.source });
        }
        return;
      case 'system:shutdown':
        return this.stop();
    }
  }

  private arm(): void {
    this.cancelTimer();
    const generation = ++this.generation;
    const delayMs = this.intervalSeconds * 1000;

    this.nextTickAt = Date.now() + delayMs;
    this.timer = setTimeout(() => this.onTimer(generation), delayMs);
  }

  private cancelTimer(): void {
    this.generation++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextTickAt = null;
  }

  private onTimer(generation: number): void {
    if (generation !== this.generation || this.lifecycle !== 'running') return;

    this.timer = null;
    this.nextTickAt = null;
    // tick() settles every cycle itself and never rejects
    void this.tick();
  }

  private transition(to: SchedulerState): void {
    const from = this.state;
    if (from === to) return;

    this.state = to;
    this.logger.debug(`State ${from} -> ${to}`);
    this.onTransition?.(from, to);
  }

  private async runCycle(): Promise<CycleOutcome> {
    const controller = new AbortController();
    this.cycleAbort = controller;

    let outcome: CycleOutcome;
    try {
      outcome = await this.cycle(controller);
    } catch (err) {
      this.logger.error('Playback cycle failed:', toError(err));
      outcome = 'failed';
    } finally {
      this.cycleAbort = null;
      this.transition('idle');
    }

    this.lastOutcome = outcome;
    this.lastCycleAt = Date.now();
    this.logger.debug(`Cycle finished: ${outcome}`);
    return outcome;
  }

  private async cycle(controller: AbortController): Promise<CycleOutcome> {
    this.transition('selecting_channel');
    const channels = await this.voice.listVoiceChannels(this.guildId);
    const target = pickBusiestChannel(channels);

    if (!target) {
      this.logger.debug('No populated voice channel, skipping cycle', { channels: channels.length });
      await this.recordEmptyCycle();
      return 'no_members';
    }
    this.emptyCycles = 0;
    if (this.isStopped()) return 'stopped';

    this.transition('connecting');
    let session: IVoiceSession;
    try {
      session = await this.ensureSession(target, controller.signal);
    } catch (err) {
      if (this.isStopped()) return 'stopped';
      const error = err instanceof ConnectionError
        ? err
        : new ConnectionError(`Failed to join voice channel '${target.name}'`, err);
      this.logger.error('Voice connection failed:', error, { channelId: target.id });
      return 'connection_failed';
    }
    if (this.isStopped()) return 'stopped';

    const volume = await this.configRepo.getVolume();
    const sound = await this.soundRepo.randomPick();
    if (!sound) {
      this.logger.info('Sound library is empty, skipping playback');
      return 'empty_library';
    }

    this.transition('playing');
    return this.play(session, sound, volume, controller);
  }

  private async ensureSession(target: VoiceChannelInfo, signal: AbortSignal): Promise<IVoiceSession> {
    const existing = this.voice.getSession(this.guildId);

    if (existing && existing.isConnected()) {
      if (existing.channelId !== target.id) {
        this.logger.info(`Moving to voice channel '${target.name}'`, { members: target.memberCount });
        await existing.move(target.id, signal);
      }
      return existing;
    }

    this.logger.info(`Joining voice channel '${target.name}'`, { members: target.memberCount });
    return this.voice.connect(this.guildId, target.id, signal);
  }

  private async play(
    session: IVoiceSession,
    sound: Sound,
    volume: number,
    controller: AbortController
  ): Promise<CycleOutcome> {
    let timer: NodeJS.Timeout | undefined;

    const playing = session.play(sound.payload, { volume, signal: controller.signal }).then(
      (): CycleOutcome => (controller.signal.aborted && this.isStopped() ? 'stopped' : 'played'),
      (err: unknown): CycleOutcome => {
        this.logger.error(`Playback of '${sound.name}' failed:`, toError(err));
        return 'failed';
      }
    );
    const timeout = new Promise<CycleOutcome>(resolve => {
      timer = setTimeout(() => resolve('timed_out'), this.playbackTimeoutMs);
    });

    this.logger.info(`Playing '${sound.name}'`, { id: sound.id, volume, channelId: session.channelId });
    try {
      const outcome = await Promise.race([playing, timeout]);
      if (outcome === 'timed_out') {
        controller.abort();
        this.logger.warn(`Playback of '${sound.name}' exceeded ${this.playbackTimeoutMs}ms, aborted`);
      }
      return outcome;
    } finally {
      clearTimeout(timer);
    }
  }

  private async recordEmptyCycle(): Promise<void> {
    this.emptyCycles++;
    if (this.idleDisconnectCycles === 0 || this.emptyCycles < this.idleDisconnectCycles) return;

    this.emptyCycles = 0;
    const session = this.voice.getSession(this.guildId);
    if (session && session.isConnected()) {
      this.logger.info(`No listeners for ${this.idleDisconnectCycles} cycles, leaving voice`);
      await this.disconnect();
    }
  }

  private async disconnect(): Promise<void> {
    const session = this.voice.getSession(this.guildId);
    if (!session) return;

    try {
      await session.disconnect();
    } catch (err) {
      this.logger.warn('Failed to disconnect voice session', { error: toError(err).message });
    }
  }
}
