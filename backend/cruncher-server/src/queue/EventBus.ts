/**
 * EventBus
 *
 * Typed publish/subscribe between the admission side, the workers and the
 * observability sink. Event names and payloads come from an event map, so a
 * subscriber for `job.completed` receives a `JobResultRecord` and nothing else.
 *
 * Design:
 * - Multiple subscribers per event type
 * - Async handler support with Promise.allSettled, so one failing subscriber
 *   never affects the publisher or the other subscribers
 * - Optional bounded event history
 *
 * Example usage:
 * ```typescript
 * const bus = new EventBus<JobEvents>({ maxHistorySize: 100 });
 * bus.subscribe("job.completed", (event) => logger.info(event.payload));
 * await bus.publish("job.completed", record);
 * ```
 */

export type EventMap = Record<string, unknown>;

export interface BusEvent<TEvents extends EventMap, K extends keyof TEvents = keyof TEvents> {
  type: K;
  payload: TEvents[K];
  timestamp: Date;
}

export type EventHandler<TEvents extends EventMap, K extends keyof TEvents> = (
  event: BusEvent<TEvents, K>
) => void | Promise<void>;

/**
 * Subscription handle returned from subscribe()
 */
export interface Subscription {
  id: string;
  eventType: string;
  unsubscribe: () => void;
}

/**
 * Result of a publish operation
 */
export interface PublishResult {
  handlerCount: number;
  successCount: number;
  errors: Error[];
}

interface SubscriptionRecord<TEvents extends EventMap, K extends keyof TEvents> {
  id: string;
  handler: EventHandler<TEvents, K>;
  once: boolean;
}

type SubscriptionTable<TEvents extends EventMap> = {
  [K in keyof TEvents]?: SubscriptionRecord<TEvents, K>[];
};

export class EventBus<TEvents extends EventMap> {
  private subscriptions: SubscriptionTable<TEvents> = {};

  private subscriptionCounter: number = 0;

  private history: BusEvent<TEvents>[] = [];

  /** Maximum history size (0 = disabled) */
  private readonly maxHistorySize: number;

  constructor(options: { maxHistorySize?: number } = {}) {
    this.maxHistorySize = options.maxHistorySize ?? 0;
  }

  private generateSubscriptionId(): string {
    return `sub-${Date.now()}-${(++this.subscriptionCounter).toString(16)}`;
  }

  subscribe<K extends keyof TEvents & string>(
    eventType: K,
    handler: EventHandler<TEvents, K>,
    options: { once?: boolean } = {}
  ): Subscription {
    const id = this.generateSubscriptionId();
    const subs: SubscriptionRecord<TEvents, K>[] = this.subscriptions[eventType] ?? [];
    subs.push({ id, handler, once: options.once ?? false });
    this.subscriptions[eventType] = subs;

    return {
      id,
      eventType,
      unsubscribe: () => {
        this.unsubscribe(eventType, id);
      },
    };
  }

  /**
   * Subscribe to an event type, automatically unsubscribing after first invocation.
   */
  once<K extends keyof TEvents & string>(eventType: K, handler: EventHandler<TEvents, K>): Subscription {
    return this.subscribe(eventType, handler, { once: true });
  }

  /**
   * @returns true if subscription was found and removed
   */
  unsubscribe<K extends keyof TEvents & string>(eventType: K, subscriptionId: string): boolean {
    const subs: SubscriptionRecord<TEvents, K>[] | undefined = this.subscriptions[eventType];
    if (!subs) {
      return false;
    }

    const index = subs.findIndex((s) => s.id === subscriptionId);
    if (index === -1) {
      return false;
    }

    subs.splice(index, 1);
    if (subs.length === 0) {
      delete this.subscriptions[eventType];
    }
    return true;
  }

  /**
   * Publish an event and wait for every handler to settle.
   * Handler failures are collected, never thrown.
   */
  async publish<K extends keyof TEvents & string>(eventType: K, payload: TEvents[K]): Promise<PublishResult> {
    const event: BusEvent<TEvents, K> = { type: eventType, payload, timestamp: new Date() };
    const handlers = this.takeHandlers(event);

    // Async IIFE so a handler that throws synchronously becomes a rejection
    const results = await Promise.allSettled(
      handlers.map((handler) =>
        (async () => {
          await handler(event);
        })()
      )
    );

    const errors: Error[] = [];
    for (const result of results) {
      if (result.status === "rejected") {
        errors.push(result.reason instanceof Error ? result.reason : new Error(String(result.reason)));
      }
    }

    return { handlerCount: handlers.length, successCount: handlers.length - errors.length, errors };
  }

  /**
   * Publish without waiting. Handlers run synchronously up to their first
   * await; rejections from async handlers are reported through `onError`.
   */
  publishSync<K extends keyof TEvents & string>(
    eventType: K,
    payload: TEvents[K],
    onError: (error: unknown) => void = () => undefined
  ): number {
    const event: BusEvent<TEvents, K> = { type: eventType, payload, timestamp: new Date() };
    const handlers = this.takeHandlers(event);

    for (const handler of handlers) {
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          result.catch(onError);
        }
      } catch (error) {
        onError(error);
      }
    }

    return handlers.length;
  }

  /**
   * Record the event in history and return its handlers, dropping `once`
   * subscriptions before they run.
   */
  private takeHandlers<K extends keyof TEvents & string>(event: BusEvent<TEvents, K>): EventHandler<TEvents, K>[] {
    if (this.maxHistorySize > 0) {
      this.history.push(event);
      if (this.history.length > this.maxHistorySize) {
        this.history = this.history.slice(-this.maxHistorySize);
      }
    }

    const subs: SubscriptionRecord<TEvents, K>[] = this.subscriptions[event.type] ?? [];
    const handlers = subs.map((sub) => sub.handler);
    for (const sub of subs.filter((s) => s.once)) {
      this.unsubscribe(event.type, sub.id);
    }
    return handlers;
  }

  getSubscriberCount<K extends keyof TEvents & string>(eventType: K): number {
    return this.subscriptions[eventType]?.length ?? 0;
  }

  /**
   * @returns historical events, newest last
   */
  getHistory(limit?: number): BusEvent<TEvents>[] {
    return limit === undefined ? [...this.history] : this.history.slice(-limit);
  }

  getHistoryByType<K extends keyof TEvents & string>(eventType: K): BusEvent<TEvents, K>[] {
    const matches: BusEvent<TEvents, K>[] = [];
    for (const event of this.history) {
      if (isEventOfType(event, eventType)) {
        matches.push(event);
      }
    }
    return matches;
  }

  clearHistory(): void {
    this.history = [];
  }

  /**
   * Remove all subscriptions.
   */
  clear(): void {
    this.subscriptions = {};
    this.subscriptionCounter = 0;
  }

  /**
   * Resolve with the next event of the given type.
   *
   * @param timeout - Optional timeout in milliseconds
   */
  waitFor<K extends keyof TEvents & string>(eventType: K, timeout?: number): Promise<BusEvent<TEvents, K>> {
    return new Promise((resolve, reject) => {
      let timeoutId: ReturnType<typeof setTimeout> | undefined;

      const subscription = this.once(eventType, (event) => {
        if (timeoutId) {
          clearTimeout(timeoutId);
        }
        resolve(event);
      });

      if (timeout !== undefined) {
        timeoutId = setTimeout(() => {
          subscription.unsubscribe();
          reject(new Error(`Timeout waiting for event: ${eventType}`));
        }, timeout);
      }
    });
  }
}

function isEventOfType<TEvents extends EventMap, K extends keyof TEvents>(
  event: BusEvent<TEvents>,
  eventType: K
): event is BusEvent<TEvents, K> {
  return event.type === eventType;
}
