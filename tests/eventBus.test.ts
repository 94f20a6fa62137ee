import { describe, it, expect, beforeEach } from 'vitest';
import { eventBus, type EventType } from '../src/infra/eventBus.js';

describe('EventBus', () => {
  beforeEach(() => {
    eventBus.clear();
  });

  it('delivers events to specific listeners', () => {
    const received: Array<{ event: EventType; data: unknown }> = [];
    eventBus.on('poll.created', (event, data) => {
      received.push({ event, data });
    });

    eventBus.emit('poll.created', { poll_id: '1' });
    eventBus.emit('stake.deposited', { sender: 'alice' });

    expect(received).toEqual([{ event: 'poll.created', data: { poll_id: '1' } }]);
  });

  it('delivers all events to wildcard listeners', () => {
    const received: EventType[] = [];
    eventBus.on('*', (event) => {
      received.push(event);
    });

    eventBus.emit('poll.created', {});
    eventBus.emit('poll.voted', {});
    eventBus.emit('poll.ended', {});

    expect(received).toEqual(['poll.created', 'poll.voted', 'poll.ended']);
  });

  it('unsubscribes correctly', () => {
    const received: unknown[] = [];
    const unsub = eventBus.on('poll.executed', (_e, data) => {
      received.push(data);
    });

    eventBus.emit('poll.executed', 'first');
    unsub();
    eventBus.emit('poll.executed', 'second');

    expect(received).toEqual(['first']);
  });

  it('clear() removes all listeners', () => {
    const received: unknown[] = [];
    eventBus.on('poll.created', (_e, data) => received.push(data));
    eventBus.on('*', (_e, data) => received.push(data));

    eventBus.clear();
    eventBus.emit('poll.created', 'test');

    expect(received).toHaveLength(0);
  });

  it('routes listener errors to the handler without skipping other listeners', () => {
    const received: unknown[] = [];
    const failures: Array<{ event: EventType; message: string }> = [];
    eventBus.onListenerError((event, error) => {
      failures.push({ event, message: error instanceof Error ? error.message : String(error) });
    });

    eventBus.on('poll.created', () => {
      throw new Error('boom');
    });
    eventBus.on('poll.created', (_e, data) => {
      received.push(data);
    });

    eventBus.emit('poll.created', 'value');

    expect(received).toEqual(['value']);
    expect(failures).toEqual([{ event: 'poll.created', message: 'boom' }]);
  });

  it('rethrows the first listener error when no handler is set', () => {
    const received: unknown[] = [];
    eventBus.on('poll.created', () => {
      throw new Error('boom');
    });
    eventBus.on('*', (_e, data) => {
      received.push(data);
    });

    expect(() => eventBus.emit('poll.created', 'value')).toThrow('boom');
    expect(received).toEqual(['value']);
  });
});
