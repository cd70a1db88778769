import { ClientUsageError, ConnectionError, RemoteCallError } from '@/errors';
import { isJsonObject, type JsonObject } from '@/marshal/json-value';
import type { Connection } from './connection';
import { callService, parseIncoming } from './protocol';

interface PendingCall {
    id: string;
    resolve: (values: JsonObject) => void;
    reject: (error: Error) => void;
}

let nextCallId = 0;

/**
 * Request/response client for one service. At most one call is outstanding;
 * the client owns its connection and closes it on dispose().
 */
export class ServiceClient {
    private pending: PendingCall | null = null;
    private readonly unsubscribe: Array<() => void> = [];

    constructor(private readonly connection: Connection, public readonly serviceName: string) {
        this.unsubscribe.push(
            connection.onMessage(message => this.handleMessage(message)),
            connection.onClose(error => this.fail(error ?? new ConnectionError('Connection closed', connection.address))),
        );
    }

    get isBusy(): boolean {
        return this.pending !== null;
    }

    /** Send a request; resolves with the response `values` */
    call(request: JsonObject): Promise<JsonObject> {
        if (this.pending) {
            return Promise.reject(new ClientUsageError(`A call to ${this.serviceName} is already outstanding`));
        }
        const id = `call_service:${this.serviceName}:${++nextCallId}`;
        return new Promise<JsonObject>((resolve, reject) => {
            this.pending = { id, resolve, reject };
            try {
                this.connection.send(callService(id, this.serviceName, request));
            } catch (e) {
                this.fail(e instanceof Error ? e : new ConnectionError(String(e), this.connection.address));
            }
        });
    }

    dispose(): void {
        for (const unsubscribe of this.unsubscribe) unsubscribe();
        this.unsubscribe.length = 0;
        this.fail(new ClientUsageError(`Client for ${this.serviceName} was disposed`));
        this.connection.close();
    }

    private handleMessage(raw: JsonObject): void {
        const message = parseIncoming(raw);
        if (message?.op !== 'service_response' || !this.pending) return;
        if (message.id !== this.pending.id && !(message.id === '' && message.service === this.serviceName)) return;

        const { resolve, reject } = this.pending;
        this.pending = null;
        if (!message.result) {
            const detail = typeof message.values === 'string' ? message.values : 'service reported failure';
            reject(new RemoteCallError(this.serviceName, detail));
            return;
        }
        resolve(isJsonObject(message.values) ? message.values : {});
    }

    private fail(error: Error): void {
        if (!this.pending) return;
        const { reject } = this.pending;
        this.pending = null;
        reject(error);
    }
}
