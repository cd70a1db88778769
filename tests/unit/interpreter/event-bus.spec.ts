import { describe, it, expect, vi } from 'vitest';
import { EventBus, EventSubscriptionManager, type InterpreterEvents } from '@/interpreter/event-bus';

describe('EventBus', () => {
    it('delivers payloads to every handler of an event', () => {
        const bus = new EventBus<InterpreterEvents>();
        const a = vi.fn();
        const b = vi.fn();
        bus.on('tree:reset', a);
        bus.on('tree:reset', b);

        bus.emit('tree:reset', { treeName: 'Main' });
        expect(a).toHaveBeenCalledWith({ treeName: 'Main' });
        expect(b).toHaveBeenCalledTimes(1);
    });

    it('stops delivering after off() and clear()', () => {
        const bus = new EventBus<InterpreterEvents>();
        const handler = vi.fn();
        bus.on('autorun:changed', handler);
        bus.off('autorun:changed', handler);
        bus.emit('autorun:changed', { enabled: true });

        bus.on('autorun:changed', handler);
        bus.clear();
        bus.emit('autorun:changed', { enabled: false });

        expect(handler).not.toHaveBeenCalled();
    });
});

describe('EventSubscriptionManager', () => {
    it('unsubscribes everything it tracked', () => {
        const bus = new EventBus<InterpreterEvents>();
        const subscriptions = new EventSubscriptionManager();
        const handler = vi.fn();
        subscriptions.subscribe(bus, 'connection:opened', handler);
        subscriptions.subscribe(bus, 'connection:error', handler);
        expect(subscriptions.count).toBe(2);

        subscriptions.unsubscribeAll();
        bus.emit('connection:opened', { address: 'ws://localhost:9090' });

        expect(subscriptions.count).toBe(0);
        expect(handler).not.toHaveBeenCalled();
    });
});
