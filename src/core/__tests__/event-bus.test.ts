import { describe, it, expect } from 'vitest';
import type { SessionEvent } from '../types.js';
import { EventBus } from '../event-bus.js';
import { Logger } from '../logger.js';

const status = (at: number): SessionEvent => ({ type: 'status', state: 'ModelThinking', at });
const settle = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('EventBus', () => {
  it('delivers to hooks until they unsubscribe', async () => {
    const bus = new EventBus();
    const seen: number[] = [];
    const off = bus.subscribe((ev) => {
      seen.push(ev.at);
    });
    bus.emit(status(1));
    await settle();
    off();
    bus.emit(status(2));
    await settle();
    expect(seen).toEqual([1]);
  });

  it('logs hook failures without affecting other hooks', async () => {
    const lines: string[] = [];
    const bus = new EventBus(new Logger('warn', (line) => lines.push(line)));
    const seen: string[] = [];
    bus.subscribe(() => {
      throw new Error('boom');
    });
    bus.subscribe((ev) => {
      seen.push(ev.type);
    });
    bus.emit(status(1));
    await settle();
    expect(seen).toEqual(['status']);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('[WARN ] Event hook failed {"event":"status","error":"Error: boom"}');
  });

  it('queues events for iterators and ends them on close', async () => {
    const bus = new EventBus();
    const events = bus[Symbol.asyncIterator]();
    bus.emit(status(1));
    bus.emit(status(2));
    expect(await events.next()).toEqual({ value: status(1), done: false });
    expect(await events.next()).toEqual({ value: status(2), done: false });

    const pending = events.next();
    bus.close();
    expect(await pending).toEqual({ value: undefined, done: true });
    bus.emit(status(3));
    expect(await events.next()).toEqual({ value: undefined, done: true });
  });
});
