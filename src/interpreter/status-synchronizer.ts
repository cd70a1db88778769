import { NodeStatus } from '@/engine/behavior-tree';
import type { BehaviorTree } from '@/engine/tree';
import type { VisualTree } from '@/model/visual-tree';
import { revealCollapsedChanges, toVisualIndices, type StatusChange } from './index-translator';

/** Statuses in runtime order: index 0 is the tree status, i ≥ 1 is `tree.nodes[i - 1]` */
export function captureStatuses(tree: BehaviorTree, rootStatus: NodeStatus): NodeStatus[] {
    return [rootStatus, ...tree.nodes.map(node => node.status)];
}

/**
 * Changes between the statuses shown before a tick and the tree after it,
 * in runtime indices.
 *
 * - The tree status is reported only when it changed.
 * - A node that went back to IDLE reports its previous status first, then IDLE.
 * - A RUNNING node that is not a condition is reported even when unchanged.
 * - While a condition waits for its response, each such forced RUNNING is
 *   followed by IDLE so the visual layer can gray it out.
 */
export function diffStatuses(
    previous: readonly NodeStatus[],
    tree: BehaviorTree,
    rootStatus: NodeStatus,
    conditionPending: boolean,
): StatusChange[] {
    const changes: StatusChange[] = [];
    if (rootStatus !== (previous[0] ?? NodeStatus.IDLE)) {
        changes.push({ index: 0, status: rootStatus });
    }

    tree.nodes.forEach((node, position) => {
        const index = position + 1;
        const status = node.status;
        const before = previous[index] ?? NodeStatus.IDLE;

        if (status !== before) {
            if (status === NodeStatus.IDLE) {
                changes.push({ index, status: before });
            }
            changes.push({ index, status });
        } else if (status === NodeStatus.RUNNING && node.kind !== 'Condition') {
            changes.push({ index, status });
            if (conditionPending) {
                changes.push({ index, status: NodeStatus.IDLE });
            }
        }
    });
    return changes;
}

/** Drop an entry that repeats the last status already listed for the same index */
export function dedupeChanges(changes: readonly StatusChange[]): StatusChange[] {
    const last = new Map<number, NodeStatus>();
    const result: StatusChange[] = [];
    for (const change of changes) {
        if (last.get(change.index) === change.status) continue;
        last.set(change.index, change.status);
        result.push(change);
    }
    return result;
}

export interface SynchronizeOptions {
    /** Expand collapsed subtrees that hide a changed node before translating */
    revealCollapsed?: boolean;
}

/** Runtime changes → the batch the visual layer receives */
export function synchronizeStatuses(
    changes: readonly StatusChange[],
    visualTree: VisualTree,
    options: SynchronizeOptions = {},
): StatusChange[] {
    if (changes.length === 0) return [];
    if (options.revealCollapsed) {
        revealCollapsedChanges(changes, visualTree);
    }
    return dedupeChanges(toVisualIndices(changes, visualTree));
}
