import { describe, it, expect } from 'vitest';
import { NodeStatus } from '@/engine/behavior-tree';
import { Blackboard } from '@/engine/blackboard';
import { MissingInputError } from '@/errors';
import { ManualExecutor, ManualFeedbackTarget } from '@/interpreter/manual-execution';
import { RemoteEventQueue } from '@/interpreter/remote-event-queue';
import { parseTreeDocument } from '@/model/tree-document';
import { FlatVisualTree, type VisualNode } from '@/model/visual-tree';
import { StaticActionTypeResolver } from '@/remote/action-type-resolver';
import { RosbridgeClientFactory } from '@/remote/client-factory';
import { FakeBridge, flushPromises } from '../helpers/fake-rosbridge';
import { MISSION_TREE, MOVE_ACTION_TYPE } from '../helpers/tree-fixtures';

interface Fixture {
    bridge: FakeBridge;
    events: RemoteEventQueue;
    executor: ManualExecutor;
    rows: readonly VisualNode[];
}

function setup(): Fixture {
    const bridge = new FakeBridge();
    const events = new RemoteEventQueue();
    const executor = new ManualExecutor(
        new RosbridgeClientFactory(() => ({ hostname: 'localhost', port: 9090 }), bridge.connector),
        new StaticActionTypeResolver({ '/move_base': MOVE_ACTION_TYPE }),
        events,
    );
    const rows = FlatVisualTree.fromDocument(parseTreeDocument(MISSION_TREE)).nodes();
    return { bridge, events, executor, rows };
}

describe('ManualExecutor', () => {
    it('calls the service of a condition row', async () => {
        const { bridge, executor, rows } = setup();
        bridge.serve('/battery_ok', ({ min_level: level }) => ({ success: level === 20 }));

        await expect(executor.execute(rows[2], new Blackboard(), 2)).resolves.toBe(NodeStatus.SUCCESS);
        expect(bridge.openConnections()).toEqual([]);
    });

    it('maps an unsuccessful response to FAILURE', async () => {
        const { bridge, executor, rows } = setup();
        bridge.serve('/battery_ok', () => ({ success: false }));

        await expect(executor.execute(rows[2], new Blackboard(), 2)).resolves.toBe(NodeStatus.FAILURE);
    });

    it('returns null for rows that are not leaves', async () => {
        const { executor, rows } = setup();

        await expect(executor.execute(rows[0], new Blackboard(), 0)).resolves.toBeNull();
        await expect(executor.execute(rows[1], new Blackboard(), 1)).resolves.toBeNull();
    });

    it('fails before connecting when an input is missing', async () => {
        const { bridge, executor, rows } = setup();

        await expect(executor.execute(rows[3], new Blackboard(), 3)).rejects.toThrow(MissingInputError);
        expect(bridge.connections).toHaveLength(0);
    });

    it('queues feedback and stores it only for ports bound to a key', async () => {
        const { bridge, events, executor, rows } = setup();
        const store = new Blackboard();
        store.set('goal', { x: 3 });

        const execution = executor.execute(rows[3], store, 3);
        await flushPromises();
        bridge.sendFeedback('/move_base', { update_field_name: 'progress', progress: 50 });
        bridge.sendFeedback('/move_base', { update_field_name: 'speed', speed: 2 });
        bridge.finishGoal('/move_base', { success: true });

        await expect(execution).resolves.toBe(NodeStatus.SUCCESS);
        expect(store.get('progress')).toBeUndefined();
        expect(events.size).toBe(2);

        const applied = events.drain().map(event => {
            if (event.kind !== 'leaf:feedback' || !(event.target instanceof ManualFeedbackTarget)) return null;
            expect([event.target.name, event.target.runtimeIndex, event.target.store]).toEqual(['move', 3, store]);
            return event.target.applyFeedback(event.activation, event.feedback);
        });
        expect(applied).toEqual([true, false]);
        expect(store.keys().sort()).toEqual(['goal', 'progress']);
        expect(store.get('progress')).toBe(50);
    });
});
