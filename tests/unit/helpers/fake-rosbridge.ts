/**
 * In-process stand-in for a rosbridge server. Every connect() yields a
 * FakeConnection that records what the client sends; tests answer by pushing
 * incoming messages, or register service handlers that answer on their own.
 */

import { ConnectionError } from '@/errors';
import { isJsonObject, type JsonObject } from '@/marshal/json-value';
import { formatAddress, type CloseHandler, type Connection, type Connector, type MessageHandler } from '@/remote/connection';
import type { OutgoingMessage } from '@/remote/protocol';

export class FakeConnection implements Connection {
    readonly sent: OutgoingMessage[] = [];
    private open = true;
    private readonly messageHandlers = new Set<MessageHandler>();
    private readonly closeHandlers = new Set<CloseHandler>();

    constructor(public readonly address: string, private readonly bridge: FakeBridge | null = null) {}

    get isOpen(): boolean {
        return this.open;
    }

    send(message: OutgoingMessage): void {
        if (!this.open) {
            throw new ConnectionError(`Connection to ${this.address} is closed`, this.address);
        }
        this.sent.push(message);
        this.bridge?.handleSent(this, message);
    }

    onMessage(handler: MessageHandler): () => void {
        this.messageHandlers.add(handler);
        return () => {
            this.messageHandlers.delete(handler);
        };
    }

    onClose(handler: CloseHandler): () => void {
        this.closeHandlers.add(handler);
        return () => {
            this.closeHandlers.delete(handler);
        };
    }

    close(): void {
        this.shutDown(null);
    }

    /** Deliver a message as if the server sent it */
    receive(message: JsonObject): void {
        for (const handler of [...this.messageHandlers]) handler(message);
    }

    /** The server side goes away */
    drop(reason = 'dropped'): void {
        this.shutDown(new ConnectionError(reason, this.address));
    }

    private shutDown(error: ConnectionError | null): void {
        if (!this.open) return;
        this.open = false;
        for (const handler of [...this.closeHandlers]) handler(error);
        this.messageHandlers.clear();
        this.closeHandlers.clear();
    }
}

/** Answers a service request with response values, or null to leave it unanswered */
export type ServiceHandler = (args: JsonObject) => JsonObject | null;

export interface SentGoal {
    connection: FakeConnection;
    id: string;
    goal: JsonObject;
}

export class FakeBridge {
    readonly connections: FakeConnection[] = [];
    readonly endpoints: string[] = [];
    /** When set, connect() rejects */
    refuse = false;

    private readonly services = new Map<string, ServiceHandler>();

    readonly connector: Connector = (hostname, port) => {
        const address = formatAddress(hostname, port);
        this.endpoints.push(address);
        if (this.refuse) {
            return Promise.reject(new ConnectionError(`Cannot connect to ${address}: refused`, address));
        }
        const connection = new FakeConnection(address, this);
        this.connections.push(connection);
        return Promise.resolve(connection);
    };

    /** Answer every call to `service` with the handler's values */
    serve(service: string, handler: ServiceHandler): void {
        this.services.set(service, handler);
    }

    /** Answer topic type queries for action servers (`/rosapi/topic_type`) */
    serveActionTypes(types: Record<string, string>): void {
        this.serve('/rosapi/topic_type', ({ topic }) => {
            const server = typeof topic === 'string' ? topic.replace(/\/goal$/, '') : '';
            const type = types[server];
            return type === undefined ? { type: '' } : { type: `${type}Goal` };
        });
    }

    /** Service calls sent so far, oldest first */
    serviceCalls(service: string): JsonObject[] {
        const calls: JsonObject[] = [];
        for (const connection of this.connections) {
            for (const message of connection.sent) {
                if (message.op === 'call_service' && message.service === service) calls.push(message.args);
            }
        }
        return calls;
    }

    /** Goals published to an action server so far, oldest first */
    goals(serverName: string): SentGoal[] {
        const goals: SentGoal[] = [];
        for (const connection of this.connections) {
            for (const message of connection.sent) {
                if (message.op !== 'publish' || message.topic !== `${serverName}/goal`) continue;
                const { goal_id: goalId, goal } = message.msg;
                if (isJsonObject(goalId) && typeof goalId.id === 'string' && isJsonObject(goal)) {
                    goals.push({ connection, id: goalId.id, goal });
                }
            }
        }
        return goals;
    }

    /** Most recent goal sent to a server; throws when there is none */
    lastGoal(serverName: string): SentGoal {
        const goals = this.goals(serverName);
        const last = goals[goals.length - 1];
        if (!last) throw new Error(`No goal was sent to ${serverName}`);
        return last;
    }

    /** Publish a result for the latest goal of a server */
    finishGoal(serverName: string, result: JsonObject): void {
        const { connection, id } = this.lastGoal(serverName);
        connection.receive({
            op: 'publish',
            topic: `${serverName}/result`,
            msg: { status: { goal_id: { id }, status: 3 }, result },
        });
    }

    /** Publish feedback for the latest goal of a server */
    sendFeedback(serverName: string, feedback: JsonObject): void {
        const { connection, id } = this.lastGoal(serverName);
        connection.receive({
            op: 'publish',
            topic: `${serverName}/feedback`,
            msg: { status: { goal_id: { id }, status: 1 }, feedback },
        });
    }

    /** Connections still open */
    openConnections(): FakeConnection[] {
        return this.connections.filter(c => c.isOpen);
    }

    handleSent(connection: FakeConnection, message: OutgoingMessage): void {
        if (message.op !== 'call_service') return;
        const handler = this.services.get(message.service);
        if (!handler) return;
        const values = handler(message.args);
        if (values === null) return;
        const { id, service } = message;
        queueMicrotask(() => {
            if (!connection.isOpen) return;
            connection.receive({ op: 'service_response', id, service, values, result: true });
        });
    }
}

/** Let promise chains started by the code under test run to their next real wait */
export async function flushPromises(rounds = 50): Promise<void> {
    for (let i = 0; i < rounds; i++) {
        await Promise.resolve();
    }
}
