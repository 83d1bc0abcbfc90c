import { setTimeout as delay } from 'timers/promises';
import { IConfigRepository } from '../../domain/repositories/IConfigRepository';
import { IMessagingSink } from '../../domain/services/IMessagingSink';
import { IEventBus, Subscription } from '../../domain/events/IEventBus';
import { EventOf, MUTATION_EVENTS, MutationEventName } from '../../domain/events/DomainEvents';
import { ILogger } from '../../domain/common/ILogger';
import { DeliveryError, toError } from '../../domain/common/Errors';

export type NotifiableEvent = EventOf<MutationEventName>;

export interface NotificationDispatcherOptions {
  /** Total delivery attempts per message (default 4) */
  maxAttempts?: number;
  /** Delay before the first retry (default 500) */
  baseDelayMs?: number;
  /** Cap for the exponential delay (default 8000) */
  maxDelayMs?: number;
  /** Backoff wait; must reject once `signal` aborts */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

function defaultSleep(ms: number, signal: AbortSignal): Promise<void> {
  return delay(ms, undefined, { signal });
}

/**
 * Human-readable message for a mutation event.
 */
export function formatNotification(event: NotifiableEvent): string {
  const via = `(via ${event.source})`;

  switch (event.type) {
    case 'sound:uploaded':
      return `📥 Sound uploaded: **${event.payload.name}** ${via}`;
    case 'sound:deleted':
      return `🗑️ Sound deleted: **${event.payload.name}** ${via}`;
    case 'sound:renamed':
      return `✏️ Sound renamed: **${event.payload.oldName}** → **${event.payload.newName}** ${via}`;
    case 'config:interval_changed':
      return `⏱️ Playback interval changed from **${event.payload.oldValue}** to **${event.payload.newValue}** seconds ${via}`;
    case 'config:volume_changed':
      return `🔊 Volume changed from **${event.payload.oldValue}%** to **${event.payload.newValue}%** ${via}`;
    case 'config:notify_channel_changed':
      return event.payload.newValue
        ? `📢 Notifications will be posted to <#${event.payload.newValue}> ${via}`
        : `📢 Notifications disabled ${via}`;
  }
}

/**
 * Posts library and configuration changes to the notification channel.
 * The channel is looked up for every message, so a change takes effect
 * from the next event on.
 */
export class NotificationDispatcher {
  private subscription: Subscription | null = null;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private abort = new AbortController();

  constructor(
    private configRepo: IConfigRepository,
    private sink: IMessagingSink,
    private eventBus: IEventBus,
    private logger: ILogger,
    options: NotificationDispatcherOptions = {}
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 4);
    this.baseDelayMs = options.baseDelayMs ?? 500;
    this.maxDelayMs = options.maxDelayMs ?? 8000;
    this.sleep = options.sleep ?? defaultSleep;
  }

  start(): void {
    if (this.subscription) return;

    if (this.abort.signal.aborted) {
      this.abort = new AbortController();
    }
    this.subscription = this.eventBus.subscribe(
      MUTATION_EVENTS,
      event => this.dispatch(event),
      'notification-dispatcher'
    );
    this.logger.info(`Notification dispatcher listening for ${MUTATION_EVENTS.length} events`);
  }

  /**
   * Unsubscribe, cut short any send or backoff wait in progress and drop
   * messages still queued.
   */
  async stop(): Promise<void> {
    const subscription = this.subscription;
    if (!subscription) return;

    this.subscription = null;
    this.abort.abort();
    subscription.unsubscribe();
    await subscription.closed;
  }

  async dispatch(event: NotifiableEvent): Promise<void> {
    const signal = this.abort.signal;
    if (signal.aborted) {
      this.logger.warn(`Notification dispatcher stopped, dropping ${event.type}`);
      return;
    }

    const channelId = await this.configRepo.getNotifyChannel();
    if (!channelId) {
      this.logger.debug(`No notification channel configured, skipping ${event.type}`);
      return;
    }

    await this.deliver(channelId, formatNotification(event), event.type, signal);
  }

  private async deliver(
    channelId: string,
    text: string,
    eventType: MutationEventName,
    signal: AbortSignal
  ): Promise<void> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        if (!(await this.sendUnlessStopped(channelId, text, signal))) {
          this.logger.warn(`Notification dispatcher stopped while delivering ${eventType}`, { attempts: attempt });
        }
        return;
      } catch (err) {
        if (attempt === this.maxAttempts) {
          const error = new DeliveryError(`Notification dropped after ${attempt} attempts`, {
            event: eventType,
            channelId,
            cause: toError(err).message
          });
          this.logger.error(error.message, error, { event: eventType });
          return;
        }

        const delayMs = Math.min(this.baseDelayMs * Math.pow(2, attempt - 1), this.maxDelayMs);
        this.logger.warn(`Notification failed (attempt ${attempt}/${this.maxAttempts}), retrying in ${delayMs}ms`, {
          event: eventType,
          error: toError(err).message
        });

        try {
          await this.sleep(delayMs, signal);
        } catch (sleepErr) {
          if (!signal.aborted) throw sleepErr;
        }
        if (signal.aborted) {
          this.logger.warn(`Notification dispatcher stopped, dropping ${eventType}`, { attempts: attempt });
          return;
        }
      }
    }
  }

  /**
   * Resolves false as soon as `signal` aborts; the send itself is left to finish.
   */
  private sendUnlessStopped(channelId: string, text: string, signal: AbortSignal): Promise<boolean> {
    if (signal.aborted) return Promise.resolve(false);

    return new Promise<boolean>((resolve, reject) => {
      const onAbort = () => resolve(false);
      signal.addEventListener('abort', onAbort, { once: true });

      this.sink.send(channelId, text).then(
        () => {
          signal.removeEventListener('abort', onAbort);
          resolve(true);
        },
        (err: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(err);
        }
      );
    });
  }
}
