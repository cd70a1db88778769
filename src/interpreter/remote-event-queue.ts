import type { NodeStatus } from '@/engine/behavior-tree';
import type { ConnectionError } from '@/errors';
import type { JsonObject } from '@/marshal/json-value';

/** A leaf that finishes activations out-of-band */
export interface ActivationTarget {
    readonly name: string;
    /** Apply the result of an activation; false when the activation is stale */
    completeActivation(activation: number, status: NodeStatus): boolean;
}

export interface FeedbackTarget {
    readonly name: string;
    /** Apply one feedback message; false when stale or not applicable */
    applyFeedback(activation: number, feedback: JsonObject): boolean;
}

export type RemoteEvent =
    | { kind: 'leaf:result'; target: ActivationTarget; activation: number; status: NodeStatus }
    | { kind: 'leaf:feedback'; target: FeedbackTarget; activation: number; feedback: JsonObject }
    | { kind: 'connection:error'; source: string; error: ConnectionError };

/**
 * Hand-off point between background remote work and the tick loop.
 * Any number of producers post; the session is the only consumer and drains
 * the queue before each tick, so node state only ever changes on the loop.
 */
export class RemoteEventQueue {
    private events: RemoteEvent[] = [];

    post(event: RemoteEvent): void {
        this.events.push(event);
    }

    /** Remove and return everything posted so far, oldest first */
    drain(): RemoteEvent[] {
        const drained = this.events;
        this.events = [];
        return drained;
    }

    get size(): number {
        return this.events.length;
    }

    clear(): void {
        this.events = [];
    }
}
