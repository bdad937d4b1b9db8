import IORedis, { type Redis } from 'ioredis';
import {
  describeError,
  isConnectionRefused,
  silentLogger,
  withTimeout,
  type JsonValue,
  type Logger
} from '@switchyard/shared';
import { normalizeEvent, parseEventMessage, type BusEvent, type BusEventInput, type EventIds } from './core';

export type EventBusMode = 'redis' | 'inline';

export type EventCallback = (event: BusEvent) => void | Promise<void>;

export type EventBusOptions = {
  mode?: EventBusMode;
  redisUrl?: string | null;
  createRedis?: (url: string) => Redis;
  logger?: Logger;
  healthTimeoutMs?: number;
};

export type EventBusHealth = {
  status: 'healthy' | 'degraded' | 'unhealthy';
  mode: EventBusMode;
  activeSubscriptions: number;
  latencyMs: number | null;
  error?: string;
};

function resolveMode(options: EventBusOptions): EventBusMode {
  if (options.mode) {
    return options.mode;
  }
  const url = options.redisUrl?.trim();
  return !url || url === 'inline' ? 'inline' : 'redis';
}

/**
 * Channel-per-event-name pub/sub. Delivery is best effort and at most once;
 * callbacks for one channel run one event at a time, in arrival order.
 */
export class EventBus {
  readonly mode: EventBusMode;
  private readonly logger: Logger;
  private readonly healthTimeoutMs: number;
  private readonly subscriptions = new Map<string, Set<EventCallback>>();
  private readonly dispatchQueues = new Map<string, Promise<void>>();
  private publisher: Redis | null = null;
  private subscriber: Redis | null = null;
  private unavailableReason: string | null = null;

  constructor(options: EventBusOptions = {}) {
    this.mode = resolveMode(options);
    this.logger = options.logger ?? silentLogger;
    this.healthTimeoutMs = options.healthTimeoutMs ?? 2_000;

    const url = options.redisUrl?.trim();
    if (this.mode === 'redis') {
      if (!url) {
        throw new Error('Set REDIS_URL to a redis:// connection string for the event bus');
      }
      const create = options.createRedis ?? ((target: string) => new IORedis(target, { maxRetriesPerRequest: 1 }));
      this.publisher = this.connect(create(url), 'publish');
      this.subscriber = this.connect(create(url), 'subscribe');
      this.subscriber.on('message', (channel: string, message: string) => {
        const event = parseEventMessage(message);
        if (!event) {
          this.logger.warn({ channel }, 'dropping malformed event message');
          return;
        }
        this.dispatch(channel, event);
      });
    }
  }

  /** Non-null once Redis was found unreachable; publish and subscribe then return false. */
  get degradedReason(): string | null {
    return this.unavailableReason;
  }

  async publish(input: BusEventInput): Promise<boolean> {
    let event: BusEvent;
    try {
      event = normalizeEvent(input);
    } catch (err) {
      this.logger.warn({ err, channel: input.name, source: input.source }, 'invalid event not published');
      return false;
    }
    const channel = event.name;

    if (this.unavailableReason) {
      this.logger.warn({ channel, eventId: event.id, reason: this.unavailableReason }, 'event not published');
      return false;
    }

    if (!this.publisher) {
      this.dispatch(channel, event);
      return true;
    }

    try {
      await this.publisher.publish(channel, JSON.stringify(event));
      return true;
    } catch (err) {
      if (isConnectionRefused(err)) {
        this.disableRedis('Redis unavailable');
      }
      this.logger.warn({ err, channel, eventId: event.id }, 'failed to publish event');
      return false;
    }
  }

  async emit(name: string, source: string, payload: JsonValue, ids: EventIds = {}): Promise<boolean> {
    return this.publish({ name, source, payload, ...ids });
  }

  async subscribe(channel: string, callback: EventCallback): Promise<boolean> {
    if (this.unavailableReason) {
      this.logger.warn({ channel, reason: this.unavailableReason }, 'subscription not registered');
      return false;
    }

    const existing = this.subscriptions.get(channel);
    if (existing) {
      existing.add(callback);
      return true;
    }

    this.subscriptions.set(channel, new Set([callback]));
    if (!this.subscriber) {
      return true;
    }

    try {
      await this.subscriber.subscribe(channel);
      return true;
    } catch (err) {
      this.subscriptions.delete(channel);
      if (isConnectionRefused(err)) {
        this.disableRedis('Redis unavailable');
      }
      this.logger.warn({ err, channel }, 'failed to subscribe to channel');
      return false;
    }
  }

  /** Removes one callback, or every callback for the channel when none is given. */
  async unsubscribe(channel: string, callback?: EventCallback): Promise<boolean> {
    const callbacks = this.subscriptions.get(channel);
    if (!callbacks) {
      return false;
    }

    let removed: boolean;
    if (callback) {
      removed = callbacks.delete(callback);
    } else {
      removed = callbacks.size > 0;
      callbacks.clear();
    }

    if (callbacks.size === 0) {
      this.subscriptions.delete(channel);
      if (this.subscriber && !this.unavailableReason) {
        try {
          await this.subscriber.unsubscribe(channel);
        } catch (err) {
          this.logger.warn({ err, channel }, 'failed to unsubscribe from channel');
        }
      }
    }
    return removed;
  }

  get activeSubscriptions(): number {
    return this.subscriptions.size;
  }

  /** Resolves once every event dispatched so far has reached its callbacks. */
  async drain(): Promise<void> {
    let pending = Array.from(this.dispatchQueues.values());
    while (pending.length > 0) {
      await Promise.all(pending);
      const next = Array.from(this.dispatchQueues.values());
      pending = next.filter((queue) => !pending.includes(queue));
    }
  }

  async healthCheck(): Promise<EventBusHealth> {
    const base = { mode: this.mode, activeSubscriptions: this.subscriptions.size };
    if (this.unavailableReason) {
      return { ...base, status: 'unhealthy', latencyMs: null, error: this.unavailableReason };
    }
    if (!this.publisher) {
      return { ...base, status: 'degraded', latencyMs: null };
    }
    const started = Date.now();
    try {
      await withTimeout(this.publisher.ping(), this.healthTimeoutMs, 'event bus ping timed out');
      return { ...base, status: 'healthy', latencyMs: Date.now() - started };
    } catch (err) {
      return { ...base, status: 'unhealthy', latencyMs: null, error: describeError(err) };
    }
  }

  async close(): Promise<void> {
    await this.drain();
    this.subscriptions.clear();
    const connections = [this.publisher, this.subscriber];
    this.publisher = null;
    this.subscriber = null;
    await Promise.all(connections.map((connection) => (connection ? this.closeConnection(connection) : undefined)));
  }

  private connect(redis: Redis, role: 'publish' | 'subscribe'): Redis {
    redis.on('error', (err: unknown) => {
      if (isConnectionRefused(err)) {
        this.disableRedis('Redis unavailable');
        return;
      }
      this.logger.error({ err, role }, 'event bus redis error');
    });
    return redis;
  }

  private disableRedis(reason: string): void {
    if (this.unavailableReason) {
      return;
    }
    this.unavailableReason = reason;
    this.logger.warn({ reason }, 'event bus degraded; events will be logged locally only');
    const connections = [this.publisher, this.subscriber];
    this.publisher = null;
    this.subscriber = null;
    for (const connection of connections) {
      if (connection) {
        this.closeConnection(connection).catch((err: unknown) => {
          this.logger.debug({ err }, 'failed to close event bus connection');
        });
      }
    }
  }

  private async closeConnection(connection: Redis): Promise<void> {
    connection.removeAllListeners();
    try {
      await connection.quit();
    } catch {
      connection.disconnect();
    }
  }

  private dispatch(channel: string, event: BusEvent): void {
    const previous = this.dispatchQueues.get(channel) ?? Promise.resolve();
    const next = previous.then(() => this.deliver(channel, event));
    this.dispatchQueues.set(channel, next);
    next
      .then(() => {
        if (this.dispatchQueues.get(channel) === next) {
          this.dispatchQueues.delete(channel);
        }
      })
      .catch((err: unknown) => {
        this.logger.error({ err, channel }, 'event dispatch failed');
      });
  }

  private async deliver(channel: string, event: BusEvent): Promise<void> {
    const callbacks = this.subscriptions.get(channel);
    if (!callbacks || callbacks.size === 0) {
      return;
    }
    for (const callback of Array.from(callbacks)) {
      try {
        await callback(event);
      } catch (err) {
        this.logger.error({ err, channel, eventId: event.id }, 'event subscriber failed');
      }
    }
  }
}

export function createEventBus(options: EventBusOptions = {}): EventBus {
  return new EventBus(options);
}

/** Callback that writes every received event to the log. */
export function createAuditListener(logger: Logger): EventCallback {
  return (event) => {
    logger.info(
      { event: event.name, eventId: event.id, source: event.source, correlationId: event.correlationId },
      'event received'
    );
  };
}
