import { NodeStatus, type TickResult, type TreeNode } from './behavior-tree';
import type { Blackboard } from './blackboard';

/**
 * A runtime tree: the root node plus the flattened, fully expanded node list.
 *
 * `nodes` is in pre-order, so a subtree's nodes directly follow the node that
 * includes it. Runtime index 0 is reserved for the tree's own status; runtime
 * index i ≥ 1 is `nodes[i - 1]`.
 */
export class BehaviorTree {
    public readonly nodes: readonly TreeNode[];

    constructor(
        public readonly name: string,
        public readonly root: TreeNode,
        public readonly blackboard: Blackboard,
    ) {
        this.nodes = collectPreOrder(root);
    }

    /** Run one tick of the tree */
    tickRoot(): TickResult {
        return this.root.executeTick();
    }

    /** Stop everything that runs and return all nodes to IDLE */
    haltTree(): void {
        this.root.reset();
        for (const node of this.nodes) {
            if (node.status !== NodeStatus.IDLE) node.reset();
        }
    }

    /** Node at a runtime index; index 0 (the tree status) has no node */
    nodeAt(runtimeIndex: number): TreeNode | undefined {
        return runtimeIndex >= 1 ? this.nodes[runtimeIndex - 1] : undefined;
    }

    /** Runtime index of a node, or -1 */
    indexOf(node: TreeNode): number {
        const position = this.nodes.indexOf(node);
        return position < 0 ? -1 : position + 1;
    }
}

function collectPreOrder(root: TreeNode): TreeNode[] {
    const result: TreeNode[] = [];
    const visit = (node: TreeNode): void => {
        result.push(node);
        for (const child of node.children()) visit(child);
    };
    visit(root);
    return result;
}
