import { WebSocketServer, WebSocket, RawData } from 'ws';
import { z } from 'zod';
import { IEventBus, Subscription } from '../../domain/events/IEventBus';
import { ILogger } from '../../domain/common/ILogger';
import { AnyDomainEvent, EventName } from '../../domain/events/DomainEvents';

// Every event in the catalogue is forwarded
const BRIDGED_EVENTS: readonly EventName[] = [
  'sound:uploaded',
  'sound:renamed',
  'sound:deleted',
  'config:interval_changed',
  'config:volume_changed',
  'config:notify_channel_changed',
  'system:ready',
  'system:shutdown'
];

const clientMessageSchema = z.object({
  type: z.string()
}).passthrough();

/**
 * Bridges domain events to WebSocket clients.
 * Each event is sent as `{ type, payload, source, timestamp }`.
 */
export class WebSocketBridge {
  private subscription: Subscription;

  constructor(
    private wss: WebSocketServer,
    private eventBus: IEventBus,
    private logger: ILogger
  ) {
    this.setupConnectionHandlers();
    this.subscription = this.eventBus.subscribe(BRIDGED_EVENTS, event => this.broadcast(event), 'websocket-bridge');
    this.logger.info(`WebSocket bridge subscribed to ${BRIDGED_EVENTS.length} events`);
  }

  private setupConnectionHandlers(): void {
    this.wss.on('connection', (ws: WebSocket) => {
      ws.on('error', (error) => {
        this.logger.error('WebSocket client error:', error);
      });

      ws.on('message', (data: RawData) => {
        this.handleClientMessage(ws, data);
      });
    });
  }

  private handleClientMessage(ws: WebSocket, data: RawData): void {
    let raw: unknown;
    try {
      raw = JSON.parse(data.toString());
    } catch {
      this.logger.warn('Failed to parse WebSocket message');
      return;
    }

    const message = clientMessageSchema.safeParse(raw);
    if (!message.success) {
      this.logger.warn('Ignoring WebSocket message without a type');
      return;
    }

    if (message.data.type === 'ping') {
      ws.send(JSON.stringify({ type: 'pong', timestamp: Date.now() }));
      return;
    }

    this.logger.debug('Received WebSocket message', { type: message.data.type });
  }

  /**
   * Broadcast an event to every open client.
   */
  private broadcast(event: AnyDomainEvent): void {
    const message = JSON.stringify({
      type: event.type,
      payload: event.payload,
      source: event.source,
      timestamp: event.timestamp
    });

    this.wss.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(message);
      }
    });
  }

  getClientCount(): number {
    return this.wss.clients.size;
  }

  /**
   * Stop forwarding events.
   */
  close(): void {
    this.subscription.unsubscribe();
  }
}
