import WebSocket from 'ws';
import { ConnectionError } from '@/errors';
import { parseJsonObject } from '@/marshal/json-value';
import { LogHandler } from '@/utilities/log-handler';
import { formatAddress, type CloseHandler, type Connection, type Connector, type MessageHandler } from './connection';
import type { OutgoingMessage } from './protocol';

const log = new LogHandler('WebSocketConnection');

function decode(data: WebSocket.RawData): string {
    if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
    if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
    return data.toString('utf8');
}

/** Connection over a `ws` socket that is already open */
export class WebSocketConnection implements Connection {
    private readonly messageHandlers = new Set<MessageHandler>();
    private readonly closeHandlers = new Set<CloseHandler>();
    private closedLocally = false;

    constructor(private readonly socket: WebSocket, public readonly address: string) {
        socket.on('message', data => this.handleMessage(decode(data)));
        socket.on('error', err => log.warn(`${address}: ${err.message}`));
        socket.on('close', (code, reason) => this.handleClose(code, reason.toString('utf8')));
    }

    get isOpen(): boolean {
        return this.socket.readyState === WebSocket.OPEN;
    }

    send(message: OutgoingMessage): void {
        if (!this.isOpen) {
            throw new ConnectionError(`Connection to ${this.address} is closed`, this.address);
        }
        this.socket.send(JSON.stringify(message));
    }

    onMessage(handler: MessageHandler): () => void {
        this.messageHandlers.add(handler);
        return () => this.messageHandlers.delete(handler);
    }

    onClose(handler: CloseHandler): () => void {
        this.closeHandlers.add(handler);
        return () => this.closeHandlers.delete(handler);
    }

    close(): void {
        if (this.closedLocally) return;
        this.closedLocally = true;
        this.socket.close();
    }

    private handleMessage(text: string): void {
        const message = parseJsonObject(text);
        if (!message) {
            log.warn(`${this.address}: ignoring message that is not a JSON object`);
            return;
        }
        for (const handler of [...this.messageHandlers]) {
            handler(message);
        }
    }

    private handleClose(code: number, reason: string): void {
        const error = this.closedLocally
            ? null
            : new ConnectionError(`Connection to ${this.address} closed (${code}${reason ? `: ${reason}` : ''})`, this.address);
        for (const handler of [...this.closeHandlers]) {
            handler(error);
        }
        this.messageHandlers.clear();
        this.closeHandlers.clear();
    }
}

/** Default connector: `ws://hostname:port` */
export const connectWebSocket: Connector = (hostname, port) => {
    const address = formatAddress(hostname, port);
    return new Promise((resolve, reject) => {
        const socket = new WebSocket(address);
        const onError = (err: Error): void => {
            socket.removeListener('open', onOpen);
            reject(new ConnectionError(`Cannot connect to ${address}: ${err.message}`, address));
        };
        const onOpen = (): void => {
            socket.removeListener('error', onError);
            resolve(new WebSocketConnection(socket, address));
        };
        socket.once('error', onError);
        socket.once('open', onOpen);
    });
};
