type EventHandler<TEvent> = (event: TEvent) => void;

export interface EventBusOptions {
  /**
   * Events buffered before the oldest undelivered ones are dropped.
   * Default: 1000
   */
  maxQueueSize?: number | undefined;

  /**
   * Receives listener exceptions; they never reach the emitter.
   */
  onError: (err: unknown) => void;
}

/**
 * Emit-only view of a bus. Producers depend on this so a bus carrying a wider
 * event union can be handed to them.
 */
export interface EventSink<TEvent> {
  emit(event: TEvent): void;
}

/**
 * Typed in-process event bus for pipeline events.
 *
 * Emitting never blocks: delivery happens on the microtask queue, in emission
 * order, to every handler registered at delivery time. The queue is bounded and
 * drops oldest-first when listeners fall behind.
 */
export class EventBus<TEvent extends { type: string }> implements EventSink<TEvent> {
  private handlers: EventHandler<TEvent>[] = [];
  private queue: TEvent[] = [];
  private head = 0;
  private flushScheduled = false;
  private droppedCount = 0;
  private idleWaiters: (() => void)[] = [];
  private readonly maxQueueSize: number;
  private readonly onError: (err: unknown) => void;

  constructor(options: EventBusOptions) {
    this.maxQueueSize = options.maxQueueSize ?? 1000;
    this.onError = options.onError;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get pending(): number {
    return this.queue.length - this.head;
  }

  subscribe(handler: EventHandler<TEvent>): () => void {
    this.handlers.push(handler);
    return () => {
      const index = this.handlers.indexOf(handler);
      if (index >= 0) {
        this.handlers.splice(index, 1);
      }
    };
  }

  /**
   * Subscribe to a single event type with the handler narrowed to it.
   */
  on<TType extends TEvent['type']>(type: TType, handler: EventHandler<Extract<TEvent, { type: TType }>>): () => void {
    return this.subscribe((event) => {
      if (isEventOfType(event, type)) {
        handler(event);
      }
    });
  }

  emit(event: TEvent): void {
    this.queue.push(event);

    const overflow = this.pending - this.maxQueueSize;
    if (overflow > 0) {
      this.head += overflow;
      this.droppedCount += overflow;
    }

    this.scheduleFlush();
  }

  /**
   * Resolves once every event emitted so far has been delivered.
   */
  drain(): Promise<void> {
    if (this.pending === 0 && !this.flushScheduled) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private scheduleFlush(): void {
    if (this.flushScheduled) return;
    this.flushScheduled = true;
    queueMicrotask(() => this.flush());
  }

  private flush(): void {
    try {
      while (this.head < this.queue.length) {
        const event = this.queue[this.head];
        this.head++;
        if (event === undefined) continue;
        for (const handler of [...this.handlers]) {
          try {
            handler(event);
          } catch (err) {
            this.onError(err);
          }
        }
      }
      this.queue.length = 0;
      this.head = 0;
    } finally {
      this.flushScheduled = false;
      if (this.head < this.queue.length) {
        this.scheduleFlush();
      } else {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) resolve();
      }
    }
  }
}

function isEventOfType<TEvent extends { type: string }, TType extends TEvent['type']>(
  event: TEvent,
  type: TType
): event is Extract<TEvent, { type: TType }> {
  return event.type === type;
}
