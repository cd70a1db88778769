import { leafBuilder, type BehaviorTreeFactory } from '@/engine/tree-factory';
import type { NodeModel } from '@/model/node-model';
import type { LeafContext } from './leaf-context';
import { RemoteActionNode } from './remote-action-node';
import { RemoteConditionNode } from './remote-condition-node';

/**
 * Register a remote leaf for every Action and Condition model that has no
 * local implementation. Returns the registration IDs added.
 */
export function registerRemoteLeaves(
    factory: BehaviorTreeFactory,
    models: Iterable<NodeModel>,
    context: LeafContext,
): string[] {
    const added: string[] = [];
    for (const model of models) {
        if (factory.hasNodeType(model.registrationId)) continue;
        switch (model.kind) {
        case 'Action':
            factory.registerNodeType(
                model.registrationId,
                leafBuilder(ctx => new RemoteActionNode(ctx.name, model.registrationId, ctx.config, context)),
            );
            break;
        case 'Condition':
            factory.registerNodeType(
                model.registrationId,
                leafBuilder(ctx => new RemoteConditionNode(ctx.name, model.registrationId, ctx.config, context)),
            );
            break;
        case 'Control':
        case 'Decorator':
        case 'Subtree':
            continue;
        }
        added.push(model.registrationId);
    }
    return added;
}
