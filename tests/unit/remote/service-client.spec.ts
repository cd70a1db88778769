import { describe, it, expect } from 'vitest';
import { ClientUsageError, ConnectionError, RemoteCallError } from '@/errors';
import { ServiceClient } from '@/remote/service-client';
import { FakeConnection } from '../helpers/fake-rosbridge';

function lastCallId(connection: FakeConnection): string {
    const message = connection.sent[connection.sent.length - 1];
    if (message?.op !== 'call_service') throw new Error('no call was sent');
    return message.id;
}

describe('ServiceClient', () => {
    it('sends one call_service and resolves with the response values', async () => {
        const connection = new FakeConnection('ws://localhost:9090');
        const client = new ServiceClient(connection, '/add');

        const reply = client.call({ a: 1, b: 2 });
        const id = lastCallId(connection);
        expect(connection.sent).toEqual([{ op: 'call_service', id, service: '/add', args: { a: 1, b: 2 } }]);
        expect(id).toMatch(/^call_service:\/add:\d+$/);
        expect(client.isBusy).toBe(true);

        connection.receive({ op: 'service_response', id, service: '/add', values: { sum: 3 }, result: true });
        await expect(reply).resolves.toEqual({ sum: 3 });
        expect(client.isBusy).toBe(false);
    });

    it('ignores responses to other calls', async () => {
        const connection = new FakeConnection('ws://localhost:9090');
        const client = new ServiceClient(connection, '/add');
        const reply = client.call({});
        const id = lastCallId(connection);

        connection.receive({ op: 'service_response', id: 'call_service:/add:other', service: '/add', values: { sum: 0 }, result: true });
        expect(client.isBusy).toBe(true);

        connection.receive({ op: 'service_response', id, service: '/add', values: { sum: 1 }, result: true });
        await expect(reply).resolves.toEqual({ sum: 1 });
    });

    it('accepts a response without an id from the same service', async () => {
        const connection = new FakeConnection('ws://localhost:9090');
        const reply = new ServiceClient(connection, '/ping').call({});

        connection.receive({ op: 'service_response', service: '/ping', values: { ok: true } });
        await expect(reply).resolves.toEqual({ ok: true });
    });

    it('rejects with RemoteCallError when the service reports failure', async () => {
        const connection = new FakeConnection('ws://localhost:9090');
        const reply = new ServiceClient(connection, '/add').call({});

        connection.receive({ op: 'service_response', id: lastCallId(connection), service: '/add', values: 'bad args', result: false });
        await expect(reply).rejects.toThrow(new RemoteCallError('/add', 'bad args'));
    });

    it('allows only one outstanding call', async () => {
        const client = new ServiceClient(new FakeConnection('ws://localhost:9090'), '/add');
        void client.call({}).catch(() => undefined);

        await expect(client.call({})).rejects.toThrow(ClientUsageError);
    });

    it('rejects the outstanding call when the connection drops', async () => {
        const connection = new FakeConnection('ws://localhost:9090');
        const reply = new ServiceClient(connection, '/add').call({});

        connection.drop('bridge went away');
        await expect(reply).rejects.toThrow(new ConnectionError('bridge went away'));
    });

    it('rejects when the connection is already closed', async () => {
        const connection = new FakeConnection('ws://localhost:9090');
        connection.close();

        await expect(new ServiceClient(connection, '/add').call({})).rejects.toThrow(ConnectionError);
    });

    it('rejects the outstanding call and closes its connection on dispose', async () => {
        const connection = new FakeConnection('ws://localhost:9090');
        const client = new ServiceClient(connection, '/add');
        const reply = client.call({});

        client.dispose();
        await expect(reply).rejects.toThrow('Client for /add was disposed');
        expect(connection.isOpen).toBe(false);
    });
});
