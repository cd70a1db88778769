import type { BehaviorTree } from '@/engine/tree';
import { BehaviorTreeFactory } from '@/engine/tree-factory';
import { RemoteEventQueue, type RemoteEvent } from '@/interpreter/remote-event-queue';
import type { LeafContext } from '@/leaves/leaf-context';
import { registerRemoteLeaves } from '@/leaves/register-remote-leaves';
import type { NodeKind } from '@/model/node-model';
import { parseTreeDocument } from '@/model/tree-document';
import { FlatVisualTree, type VisualEntry } from '@/model/visual-tree';
import { StaticActionTypeResolver } from '@/remote/action-type-resolver';
import { RosbridgeClientFactory } from '@/remote/client-factory';
import type { FakeBridge } from './fake-rosbridge';

export const NODE_MODELS = `
  <TreeNodesModel>
    <Action ID="MoveTo">
      <input_port name="server_name"/>
      <input_port name="target" type="geometry_msgs/Point">Where to go</input_port>
      <input_port name="speed" type="float64" default="0.5"/>
      <output_port name="progress" type="int32"/>
    </Action>
    <Condition ID="IsBatteryOk">
      <input_port name="service_name"/>
      <input_port name="min_level" type="uint8" default="20"/>
    </Condition>
  </TreeNodesModel>`;

/**
 * Runtime and visual indices:
 *   0 tree / ROOT, 1 mission, 2 battery, 3 move
 */
export const MISSION_TREE = `
<root main_tree_to_execute="Main">
  <BehaviorTree ID="Main">
    <Sequence name="mission">
      <IsBatteryOk name="battery" service_name="/battery_ok"/>
      <MoveTo name="move" server_name="/move_base" target="{goal}" progress="{progress}"/>
    </Sequence>
  </BehaviorTree>
  ${NODE_MODELS}
</root>`;

/**
 * Runtime indices (and visual indices while expanded):
 *   0 tree / ROOT, 1 mission, 2 approach, 3 approach_seq, 4 battery, 5 move, 6 done
 * With "approach" collapsed the visual rows are ROOT, mission, approach, done.
 */
export const SUBTREE_MISSION = `
<root main_tree_to_execute="Main">
  <BehaviorTree ID="Main">
    <Sequence name="mission">
      <SubTree ID="Approach" name="approach" target="{goal}"/>
      <AlwaysSuccess name="done"/>
    </Sequence>
  </BehaviorTree>
  <BehaviorTree ID="Approach">
    <Sequence name="approach_seq">
      <IsBatteryOk name="battery" service_name="/battery_ok"/>
      <MoveTo name="move" server_name="/move_base" target="{target}"/>
    </Sequence>
  </BehaviorTree>
  ${NODE_MODELS}
</root>`;

export const MOVE_ACTION_TYPE = 'nav_msgs/MoveAction';

/** Leaf context whose clients connect to the fake bridge */
export function remoteContext(
    bridge: FakeBridge,
    actionTypes: Record<string, string> = { '/move_base': MOVE_ACTION_TYPE },
): LeafContext {
    return {
        clients: new RosbridgeClientFactory(() => ({ hostname: 'localhost', port: 9090 }), bridge.connector),
        actionTypes: new StaticActionTypeResolver(actionTypes),
        events: new RemoteEventQueue(),
    };
}

/** Runtime tree of a document with remote leaves wired to `context` */
export function buildTree(xml: string, context: LeafContext, treeId?: string): BehaviorTree {
    const doc = parseTreeDocument(xml);
    const factory = new BehaviorTreeFactory();
    registerRemoteLeaves(factory, doc.models.values(), context);
    return factory.createTree(doc, treeId);
}

/** Apply queued results and feedback the way the session does between ticks */
export function applyRemoteEvents(queue: RemoteEventQueue): RemoteEvent[] {
    const events = queue.drain();
    for (const event of events) {
        switch (event.kind) {
        case 'leaf:result':
            event.target.completeActivation(event.activation, event.status);
            break;
        case 'leaf:feedback':
            event.target.applyFeedback(event.activation, event.feedback);
            break;
        case 'connection:error':
            break;
        }
    }
    return events;
}

/** One entry of a hand-built visual tree */
export function row(instanceName: string, kind: NodeKind, descendantCount = 0, collapsed = false): VisualEntry {
    return {
        instanceName,
        model: { kind, registrationId: instanceName, ports: new Map() },
        portMapping: new Map(),
        descendantCount,
        collapsed,
    };
}

/**
 * Five runtime nodes below the tree status; "sub" (runtime 1) is collapsed
 * and hides runtime 2..4, so the visible rows are ROOT, sub, leaf.
 */
export function collapsedFiveNodeTree(): FlatVisualTree {
    return new FlatVisualTree([
        row('ROOT', 'Control', 5),
        row('sub', 'Subtree', 3, true),
        row('c1', 'Action'),
        row('c2', 'Action'),
        row('c3', 'Action'),
        row('leaf', 'Action'),
    ]);
}
