import type { ConnectionError } from '@/errors';
import type { JsonObject } from '@/marshal/json-value';
import type { OutgoingMessage } from './protocol';

export type MessageHandler = (message: JsonObject) => void;
export type CloseHandler = (error: ConnectionError | null) => void;

/**
 * One bidirectional message channel to the bridge. Handlers return an
 * unsubscribe function. Close handlers get null after a local close and the
 * error otherwise.
 */
export interface Connection {
    readonly address: string;
    readonly isOpen: boolean;
    send(message: OutgoingMessage): void;
    onMessage(handler: MessageHandler): () => void;
    onClose(handler: CloseHandler): () => void;
    close(): void;
}

/** Opens a connection; rejects with ConnectionError when the bridge cannot be reached */
export type Connector = (hostname: string, port: number) => Promise<Connection>;

export interface Endpoint {
    hostname: string;
    port: number;
}

export function formatAddress(hostname: string, port: number): string {
    return `ws://${hostname}:${port}`;
}
