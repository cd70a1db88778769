import { ActionClient } from './action-client';
import type { Connection, Connector, Endpoint } from './connection';
import { ServiceClient } from './service-client';
import { connectWebSocket } from './websocket-connection';

/** Creates remote clients, each on a connection of its own */
export interface RemoteClientFactory {
    createActionClient(serverName: string, actionType: string): Promise<ActionClient>;
    createServiceClient(serviceName: string): Promise<ServiceClient>;
}

export class RosbridgeClientFactory implements RemoteClientFactory {
    /**
     * @param endpoint read on every connect, so a changed hostname or port
     *                 applies to the next client without rebuilding the factory
     */
    constructor(
        private readonly endpoint: () => Endpoint,
        private readonly connector: Connector = connectWebSocket,
    ) {}

    async createActionClient(serverName: string, actionType: string): Promise<ActionClient> {
        return new ActionClient(await this.connect(), serverName, actionType);
    }

    async createServiceClient(serviceName: string): Promise<ServiceClient> {
        return new ServiceClient(await this.connect(), serviceName);
    }

    private connect(): Promise<Connection> {
        const { hostname, port } = this.endpoint();
        return this.connector(hostname, port);
    }
}
