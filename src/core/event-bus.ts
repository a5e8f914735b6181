import type { SessionEvent } from './types.js';
import { AsyncQueue } from './internal/async-queue.js';
import type { Logger } from './logger.js';

export type EventHook = (ev: SessionEvent) => void | Promise<void>;

/**
 * Session-scoped event fan-out. Hooks run fire-and-forget; iterators get their
 * own queue from the moment they start iterating.
 */
export class EventBus implements AsyncIterable<SessionEvent> {
  private readonly hooks = new Set<EventHook>();
  private readonly queues = new Set<AsyncQueue<SessionEvent>>();
  private closed = false;

  constructor(private readonly logger?: Logger) {}

  emit(ev: SessionEvent): void {
    if (this.closed) return;
    for (const h of this.hooks) {
      void Promise.resolve()
        .then(() => h(ev))
        .catch((e: unknown) => this.logger?.warn('Event hook failed', { event: ev.type, error: String(e) }));
    }
    for (const q of this.queues) q.push(ev);
  }

  subscribe(hook: EventHook): () => void {
    this.hooks.add(hook);
    return () => this.hooks.delete(hook);
  }

  close(reason?: unknown): void {
    if (this.closed) return;
    this.closed = true;
    for (const q of this.queues) q.close(reason);
    this.queues.clear();
    this.hooks.clear();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  [Symbol.asyncIterator](): AsyncIterator<SessionEvent> {
    const q = new AsyncQueue<SessionEvent>();
    if (this.closed) q.close();
    else this.queues.add(q);
    const inner = q[Symbol.asyncIterator]();
    return {
      next: () => inner.next(),
      return: async () => {
        this.queues.delete(q);
        q.close();
        return { value: undefined, done: true };
      },
    };
  }
}
