import { TreeLoadError } from '@/errors';
import type { NodeModel } from '@/model/node-model';
import { parsePortBinding } from '@/model/port-binding';
import { getTreeElement, SHARED_BLACKBOARD_ATTRIBUTE, type TreeDocument, type TreeElement } from '@/model/tree-document';
import { LogHandler } from '@/utilities/log-handler';
import {
    AlwaysFailure,
    AlwaysSuccess,
    Fallback,
    ForceFailure,
    ForceSuccess,
    Inverter,
    Parallel,
    ReactiveFallback,
    ReactiveSequence,
    Repeat,
    RetryUntilSuccessful,
    Sequence,
    SubtreeNode,
    type NodeConfig,
    type TreeNode,
} from './behavior-tree';
import { Blackboard } from './blackboard';
import { BehaviorTree } from './tree';

/** Everything a builder gets to construct one node instance */
export interface NodeBuildContext {
    name: string;
    model: NodeModel;
    config: NodeConfig;
    children: TreeNode[];
}

export type NodeBuilder = (context: NodeBuildContext) => TreeNode;

type ControlConstructor = new (name: string, registrationId: string, config: NodeConfig, children: TreeNode[]) => TreeNode;
type DecoratorConstructor = new (name: string, registrationId: string, config: NodeConfig, child: TreeNode) => TreeNode;

function singleChild(context: NodeBuildContext): TreeNode {
    if (context.children.length !== 1) {
        throw new TreeLoadError(
            `${context.model.registrationId}(${context.name}) needs exactly one child, found ${context.children.length}`,
        );
    }
    return context.children[0];
}

function noChildren(context: NodeBuildContext): void {
    if (context.children.length > 0) {
        throw new TreeLoadError(`${context.model.registrationId}(${context.name}) is a leaf and cannot have children`);
    }
}

/**
 * Turns tree documents into runtime trees. Builtin control and decorator
 * nodes are registered up front; remote leaves are registered by the
 * session for every Action and Condition model of a loaded document.
 */
export class BehaviorTreeFactory {
    private static log = new LogHandler('BehaviorTreeFactory');

    private readonly builders = new Map<string, NodeBuilder>();

    constructor() {
        this.registerBuiltins();
    }

    registerNodeType(registrationId: string, builder: NodeBuilder): void {
        this.builders.set(registrationId, builder);
    }

    hasNodeType(registrationId: string): boolean {
        return this.builders.has(registrationId);
    }

    /** Build a runtime tree; `treeId` defaults to the document's main tree */
    createTree(doc: TreeDocument, treeId = doc.mainTreeId, blackboard = new Blackboard()): BehaviorTree {
        const root = this.buildElement(doc, getTreeElement(doc, treeId), blackboard, [treeId]);
        BehaviorTreeFactory.log.debug(`Created tree "${treeId}"`);
        return new BehaviorTree(treeId, root, blackboard);
    }

    private buildElement(doc: TreeDocument, element: TreeElement, blackboard: Blackboard, including: string[]): TreeNode {
        const model = doc.models.get(element.registrationId);
        if (!model) {
            throw new TreeLoadError(`Node "${element.registrationId}" has no model in the document`);
        }

        if (model.kind === 'Subtree') {
            return this.buildSubtree(doc, element, model, blackboard, including);
        }

        const builder = this.builders.get(element.registrationId);
        if (!builder) {
            throw new TreeLoadError(`No node type registered for "${element.registrationId}"`);
        }
        const children = element.children.map(child => this.buildElement(doc, child, blackboard, including));
        return builder({
            name: element.instanceName,
            model,
            config: { blackboard, ports: model.ports, mapping: element.mapping },
            children,
        });
    }

    private buildSubtree(
        doc: TreeDocument,
        element: TreeElement,
        model: NodeModel,
        parentBoard: Blackboard,
        including: string[],
    ): TreeNode {
        const treeId = element.registrationId;
        if (including.includes(treeId)) {
            throw new TreeLoadError(`Subtree "${treeId}" includes itself`);
        }

        const shared = element.mapping.get(SHARED_BLACKBOARD_ATTRIBUTE) === 'true';
        const board = shared ? parentBoard : parentBoard.createChild();
        if (!shared) {
            for (const [internalKey, raw] of element.mapping) {
                if (internalKey === SHARED_BLACKBOARD_ATTRIBUTE) continue;
                const binding = parsePortBinding(raw);
                if (binding.kind === 'reference') {
                    board.addSubtreeRemapping(internalKey, binding.key);
                } else {
                    board.set(internalKey, binding.text);
                }
            }
        }

        const child = this.buildElement(doc, getTreeElement(doc, treeId), board, [...including, treeId]);
        return new SubtreeNode(element.instanceName, treeId, { blackboard: board, ports: model.ports, mapping: new Map() }, child);
    }

    private registerBuiltins(): void {
        const controls: Record<string, ControlConstructor> = {
            Sequence,
            ReactiveSequence,
            Fallback,
            ReactiveFallback,
            Parallel,
        };
        for (const [id, NodeClass] of Object.entries(controls)) {
            this.registerNodeType(id, ctx => {
                if (ctx.children.length === 0) {
                    throw new TreeLoadError(`${id}(${ctx.name}) needs at least one child`);
                }
                return new NodeClass(ctx.name, id, ctx.config, ctx.children);
            });
        }

        const decorators: Record<string, DecoratorConstructor> = {
            Inverter,
            ForceSuccess,
            ForceFailure,
            Repeat,
            RetryUntilSuccessful,
        };
        for (const [id, NodeClass] of Object.entries(decorators)) {
            this.registerNodeType(id, ctx => new NodeClass(ctx.name, id, ctx.config, singleChild(ctx)));
        }

        this.registerNodeType('AlwaysSuccess', ctx => {
            noChildren(ctx);
            return new AlwaysSuccess(ctx.name, 'AlwaysSuccess', ctx.config);
        });
        this.registerNodeType('AlwaysFailure', ctx => {
            noChildren(ctx);
            return new AlwaysFailure(ctx.name, 'AlwaysFailure', ctx.config);
        });
    }
}

/** Leaf builders check for stray children the same way builtin leaves do */
export function leafBuilder(create: (context: NodeBuildContext) => TreeNode): NodeBuilder {
    return ctx => {
        noChildren(ctx);
        return create(ctx);
    };
}
