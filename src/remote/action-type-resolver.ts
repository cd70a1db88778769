import { RemoteCallError } from '@/errors';
import { LogHandler } from '@/utilities/log-handler';
import type { RemoteClientFactory } from './client-factory';

/** Finds the action type behind a server name */
export interface ActionTypeResolver {
    resolve(serverName: string): Promise<string>;
}

export const TOPIC_TYPE_SERVICE = '/rosapi/topic_type';

const GOAL_SUFFIX = 'Goal';

/**
 * Asks the bridge for the type of `<server>/goal` and strips the Goal suffix.
 * Answers are cached per server name until clear().
 */
export class TopicTypeResolver implements ActionTypeResolver {
    private static log = new LogHandler('TopicTypeResolver');

    private readonly cache = new Map<string, Promise<string>>();

    constructor(private readonly clients: RemoteClientFactory) {}

    resolve(serverName: string): Promise<string> {
        let type = this.cache.get(serverName);
        if (!type) {
            type = this.query(serverName);
            this.cache.set(serverName, type);
            // Failed lookups are retried on the next activation
            type.catch(() => this.cache.delete(serverName));
        }
        return type;
    }

    clear(): void {
        this.cache.clear();
    }

    private async query(serverName: string): Promise<string> {
        const topic = `${serverName}/goal`;
        const client = await this.clients.createServiceClient(TOPIC_TYPE_SERVICE);
        try {
            const response = await client.call({ topic });
            const type = response.type;
            if (typeof type !== 'string' || type === '') {
                throw new RemoteCallError(TOPIC_TYPE_SERVICE, `no type known for ${topic}`);
            }
            const actionType = type.endsWith(GOAL_SUFFIX) ? type.slice(0, -GOAL_SUFFIX.length) : type;
            TopicTypeResolver.log.debug(`${serverName} → ${actionType}`);
            return actionType;
        } finally {
            client.dispose();
        }
    }
}

/** Resolver over a fixed server → type table */
export class StaticActionTypeResolver implements ActionTypeResolver {
    private readonly types: ReadonlyMap<string, string>;

    constructor(types: Record<string, string>) {
        this.types = new Map(Object.entries(types));
    }

    resolve(serverName: string): Promise<string> {
        const type = this.types.get(serverName);
        if (type === undefined) {
            return Promise.reject(new RemoteCallError(serverName, 'no action type configured'));
        }
        return Promise.resolve(type);
    }
}
