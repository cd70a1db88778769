/**
 * Lightweight typed event bus for decoupling the session from its observers
 * (CLI output, a visual layer, tests).
 */

import type { NodeStatus, TickResult } from '@/engine/behavior-tree';
import type { JsonObject } from '@/marshal/json-value';
import type { StatusChange } from './index-translator';

/** Event map defining all interpreter events and their payloads */
export interface InterpreterEvents {
    /** Emitted after a tree document was parsed and its runtime tree built */
    'tree:loaded': {
        treeName: string;
        nodeCount: number;
    };
    /** Emitted when the runtime tree was rebuilt with every node IDLE */
    'tree:reset': {
        treeName: string;
    };
    /** Emitted after every tick with the changes sent to the visual layer */
    'tree:ticked': {
        treeName: string;
        result: TickResult;
        changes: readonly StatusChange[];
    };
    /** Emitted when a remote leaf's result was applied */
    'leaf:completed': {
        name: string;
        registrationId: string;
        runtimeIndex: number;
        status: NodeStatus;
    };
    /** Emitted when action feedback was written to the leaf's ports */
    'leaf:feedback': {
        name: string;
        runtimeIndex: number;
        feedback: JsonObject;
    };
    'connection:opened': {
        address: string;
    };
    'connection:error': {
        source: string;
        message: string;
    };
    'autorun:changed': {
        enabled: boolean;
    };
}

type EventHandler<T> = (payload: T) => void;

type HandlerTable<Events> = { [K in keyof Events]?: Set<EventHandler<Events[K]>> };

export class EventBus<Events extends object = InterpreterEvents> {
    private handlers: HandlerTable<Events> = {};

    /** Register an event handler */
    on<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void {
        let handlers = this.handlers[event];
        if (!handlers) {
            handlers = new Set<EventHandler<Events[K]>>();
            this.handlers[event] = handlers;
        }
        handlers.add(handler);
    }

    /** Remove an event handler */
    off<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void {
        this.handlers[event]?.delete(handler);
    }

    /** Emit an event to all registered handlers */
    emit<K extends keyof Events>(event: K, payload: Events[K]): void {
        const handlers = this.handlers[event];
        if (!handlers) return;
        for (const handler of handlers) {
            handler(payload);
        }
    }

    /** Remove all handlers */
    clear(): void {
        this.handlers = {};
    }
}

/**
 * Helper class to manage event subscriptions and unsubscribe all at once.
 *
 * @example
 * ```ts
 * const subscriptions = new EventSubscriptionManager();
 * subscriptions.subscribe(session.events, 'tree:ticked', ({ changes }) => render(changes));
 * // later
 * subscriptions.unsubscribeAll();
 * ```
 */
export class EventSubscriptionManager {
    private subscriptions: Array<() => void> = [];

    /**
     * Subscribe to an event and track the subscription for later cleanup.
     */
    subscribe<Events extends object, K extends keyof Events>(
        eventBus: EventBus<Events>,
        event: K,
        handler: EventHandler<Events[K]>,
    ): void {
        eventBus.on(event, handler);
        this.subscriptions.push(() => eventBus.off(event, handler));
    }

    /**
     * Unsubscribe from all tracked events.
     */
    unsubscribeAll(): void {
        for (const unsubscribe of this.subscriptions) {
            unsubscribe();
        }
        this.subscriptions = [];
    }

    /**
     * Get the number of active subscriptions.
     * Useful for testing/debugging.
     */
    get count(): number {
        return this.subscriptions.length;
    }
}
