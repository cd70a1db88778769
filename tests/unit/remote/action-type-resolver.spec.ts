import { describe, it, expect } from 'vitest';
import { RemoteCallError } from '@/errors';
import { StaticActionTypeResolver, TopicTypeResolver } from '@/remote/action-type-resolver';
import { RosbridgeClientFactory } from '@/remote/client-factory';
import { FakeBridge } from '../helpers/fake-rosbridge';

function resolverOn(bridge: FakeBridge): TopicTypeResolver {
    return new TopicTypeResolver(new RosbridgeClientFactory(() => ({ hostname: 'localhost', port: 9090 }), bridge.connector));
}

describe('TopicTypeResolver', () => {
    it('asks for the goal topic type and strips the Goal suffix', async () => {
        const bridge = new FakeBridge();
        bridge.serveActionTypes({ '/move_base': 'nav_msgs/MoveAction' });

        await expect(resolverOn(bridge).resolve('/move_base')).resolves.toBe('nav_msgs/MoveAction');
        expect(bridge.serviceCalls('/rosapi/topic_type')).toEqual([{ topic: '/move_base/goal' }]);
        expect(bridge.openConnections()).toEqual([]);
    });

    it('keeps a type that has no Goal suffix', async () => {
        const bridge = new FakeBridge();
        bridge.serve('/rosapi/topic_type', () => ({ type: 'custom/Thing' }));

        await expect(resolverOn(bridge).resolve('/thing')).resolves.toBe('custom/Thing');
    });

    it('caches answers per server until cleared', async () => {
        const bridge = new FakeBridge();
        bridge.serveActionTypes({ '/move_base': 'nav_msgs/MoveAction' });
        const resolver = resolverOn(bridge);

        await resolver.resolve('/move_base');
        await resolver.resolve('/move_base');
        expect(bridge.serviceCalls('/rosapi/topic_type')).toHaveLength(1);

        resolver.clear();
        await resolver.resolve('/move_base');
        expect(bridge.serviceCalls('/rosapi/topic_type')).toHaveLength(2);
    });

    it('fails for unknown servers and asks again next time', async () => {
        const bridge = new FakeBridge();
        bridge.serveActionTypes({});
        const resolver = resolverOn(bridge);

        await expect(resolver.resolve('/nowhere')).rejects.toThrow(
            new RemoteCallError('/rosapi/topic_type', 'no type known for /nowhere/goal'),
        );
        await expect(resolver.resolve('/nowhere')).rejects.toThrow(RemoteCallError);
        expect(bridge.serviceCalls('/rosapi/topic_type')).toHaveLength(2);
    });
});

describe('StaticActionTypeResolver', () => {
    it('answers from its table and rejects servers it does not know', async () => {
        const resolver = new StaticActionTypeResolver({ '/move_base': 'nav_msgs/MoveAction' });

        await expect(resolver.resolve('/move_base')).resolves.toBe('nav_msgs/MoveAction');
        await expect(resolver.resolve('/dock')).rejects.toThrow('Call to /dock failed: no action type configured');
    });
});
