import { AnyDomainEvent, DomainEvent, EventName, EventOf } from '../../domain/events/DomainEvents';
import { EventHandler, IEventBus, Subscription } from '../../domain/events/IEventBus';
import { ILogger } from '../../domain/common/ILogger';
import { toError } from '../../domain/common/Errors';

export interface EventBusOptions {
  /** Maximum number of undelivered events per subscriber (default 1000) */
  queueCapacity?: number;
}

const DRAIN = Symbol('drain');
type QueueEntry = AnyDomainEvent | typeof DRAIN;

function isList<K>(value: K | readonly K[]): value is readonly K[] {
  return Array.isArray(value);
}

function isEventOf<K extends EventName>(event: DomainEvent, types: ReadonlySet<K>): event is EventOf<K> {
  const names: ReadonlySet<EventName> = types;
  return names.has(event.type);
}

/**
 * One subscriber: an ordered queue drained by a single worker loop.
 */
class SubscriberWorker {
  private queue: QueueEntry[] = [];
  private wake: (() => void) | null = null;
  private idleWaiters: Array<() => void> = [];
  private busy = false;
  private accepting = true;
  private exited = false;
  readonly done: Promise<void>;

  constructor(
    readonly id: string,
    readonly name: string,
    readonly types: ReadonlySet<EventName>,
    private readonly deliver: (event: AnyDomainEvent) => void | Promise<void>,
    private readonly capacity: number,
    private readonly logger: ILogger
  ) {
    this.done = this.run();
  }

  accepts(type: EventName): boolean {
    return this.accepting && this.types.has(type);
  }

  get isIdle(): boolean {
    return this.exited || (!this.busy && this.queue.length === 0);
  }

  enqueue(event: AnyDomainEvent): boolean {
    if (!this.accepting) return false;

    if (this.queue.length >= this.capacity) {
      this.logger.warn(`Subscriber queue full, dropping ${event.type}`, {
        subscriber: this.name,
        capacity: this.capacity
      });
      return false;
    }

    this.queue.push(event);
    this.signal();
    return true;
  }

  /**
   * Queue the drain sentinel. Events queued before it are still delivered.
   */
  close(): void {
    if (!this.accepting) return;
    this.accepting = false;
    this.queue.push(DRAIN);
    this.signal();
  }

  whenIdle(): Promise<void> {
    if (this.isIdle) {
      return Promise.resolve();
    }
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  private signal(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach(resolve => resolve());
  }

  private async next(): Promise<QueueEntry> {
    let entry = this.queue.shift();
    while (entry === undefined) {
      await new Promise<void>(resolve => {
        this.wake = resolve;
      });
      entry = this.queue.shift();
    }
    // Busy from dequeue until the handler returns
    this.busy = true;
    return entry;
  }

  private async run(): Promise<void> {
    for (;;) {
      const entry = await this.next();
      if (entry === DRAIN) break;

      try {
        await this.deliver(entry);
      } catch (err) {
        this.logger.error(`Error in event handler for ${entry.type}:`, toError(err), { subscriber: this.name });
      } finally {
        this.busy = false;
      }

      if (this.queue.length === 0) this.notifyIdle();
    }

    this.exited = true;
    this.notifyIdle();
    this.logger.debug(`Subscriber stopped: ${this.name}`);
  }
}

/**
 * In-memory event bus.
 * `publish` only enqueues; each subscription's worker runs its handler
 * off the publisher's call stack, one event at a time.
 */
export class InMemoryEventBus implements IEventBus {
  private workers: SubscriberWorker[] = [];
  private sequence = 0;
  private closed = false;
  private readonly queueCapacity: number;

  constructor(private logger: ILogger, options: EventBusOptions = {}) {
    this.queueCapacity = options.queueCapacity ?? 1000;
  }

  subscribe<K extends EventName>(types: K | readonly K[], handler: EventHandler<K>, name?: string): Subscription {
    const typeList: readonly K[] = isList(types) ? types : [types];
    const typeSet = new Set<K>(typeList);
    const id = `sub_${++this.sequence}`;
    const label = name ?? id;

    const worker = new SubscriberWorker(
      id,
      label,
      typeSet,
      (event) => {
        if (isEventOf(event, typeSet)) {
          return handler(event);
        }
      },
      this.queueCapacity,
      this.logger
    );

    if (this.closed) {
      this.logger.warn(`Subscription after shutdown ignored: ${label}`);
      worker.close();
    } else {
      this.workers.push(worker);
      this.logger.debug(`Handler registered for: ${typeList.join(', ')}`, { subscriber: label });
    }

    return {
      id,
      eventTypes: [...typeList],
      unsubscribe: () => {
        worker.close();
        this.workers = this.workers.filter(w => w !== worker);
        this.logger.debug(`Handler removed: ${label}`);
      },
      closed: worker.done
    };
  }

  publish(event: AnyDomainEvent): void {
    if (this.closed) {
      this.logger.warn(`Event published after shutdown ignored: ${event.type}`);
      return;
    }

    let delivered = 0;
    for (const worker of this.workers) {
      if (worker.accepts(event.type) && worker.enqueue(event)) {
        delivered++;
      }
    }

    this.logger.debug(`Event published: ${event.type}`, { source: event.source, subscribers: delivered });
  }

  async whenIdle(): Promise<void> {
    // Handlers may publish further events while we wait
    while (!this.workers.every(worker => worker.isIdle)) {
      await Promise.all(this.workers.map(worker => worker.whenIdle()));
    }
  }

  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const workers = this.workers;
    this.workers = [];
    this.logger.info(`Draining ${workers.length} event subscribers...`);

    workers.forEach(worker => worker.close());
    await Promise.all(workers.map(worker => worker.done));

    this.logger.info('Event bus stopped');
  }

  subscriberCount(type: EventName): number {
    return this.workers.filter(worker => worker.accepts(type)).length;
  }
}
