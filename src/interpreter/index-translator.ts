/**
 * Mapping between runtime indices (fully expanded, pre-order, 0 = tree
 * status) and visual indices (visible rows, 0 = ROOT row).
 *
 * Nothing is cached: every call walks the visible rows as they are now, so
 * expanding or collapsing a subtree can never leave stale offsets behind.
 * The walk stops at the highest index of the change set.
 */

import type { NodeStatus } from '@/engine/behavior-tree';
import type { VisualTree } from '@/model/visual-tree';

export interface StatusChange {
    index: number;
    status: NodeStatus;
}

/** A visible row and the runtime span it stands for */
interface RowSpan {
    visualIndex: number;
    runtimeStart: number;
    /** Runtime nodes hidden behind the row, i.e. runtimeStart + 1 .. runtimeStart + hidden */
    hidden: number;
}

function maxIndex(changes: readonly StatusChange[]): number {
    return changes.reduce((max, change) => Math.max(max, change.index), -1);
}

/** Visible rows in order, stopping at the first row past `limit` */
function rowSpans(tree: VisualTree, limit: { runtime?: number; visual?: number }): RowSpan[] {
    const rowCount = tree.nodes().length;
    const spans: RowSpan[] = [];
    let runtime = 0;
    for (let visualIndex = 0; visualIndex < rowCount; visualIndex++) {
        if (limit.runtime !== undefined && runtime > limit.runtime) break;
        if (limit.visual !== undefined && visualIndex > limit.visual) break;
        const hidden = tree.hiddenNodeCount(visualIndex);
        spans.push({ visualIndex, runtimeStart: runtime, hidden });
        runtime += hidden + 1;
    }
    return spans;
}

function findSpan(spans: readonly RowSpan[], runtimeIndex: number): RowSpan | undefined {
    return spans.find(span => runtimeIndex >= span.runtimeStart && runtimeIndex <= span.runtimeStart + span.hidden);
}

/** Runtime → visual. Indices hidden inside a collapsed subtree map to its placeholder row. */
export function toVisualIndices(changes: readonly StatusChange[], tree: VisualTree): StatusChange[] {
    if (changes.length === 0) return [];
    const spans = rowSpans(tree, { runtime: maxIndex(changes) });
    return changes.map(change => {
        const span = findSpan(spans, change.index);
        if (!span) {
            throw new RangeError(`Runtime index ${change.index} is outside the visual tree`);
        }
        return { index: span.visualIndex, status: change.status };
    });
}

/** Visual → runtime. A placeholder row maps to the runtime node of the subtree itself. */
export function toRuntimeIndices(changes: readonly StatusChange[], tree: VisualTree): StatusChange[] {
    if (changes.length === 0) return [];
    const spans = rowSpans(tree, { visual: maxIndex(changes) });
    return changes.map(change => {
        const span = change.index >= 0 ? spans[change.index] : undefined;
        if (!span) {
            throw new RangeError(`Visual index ${change.index} is outside the visual tree`);
        }
        return { index: span.runtimeStart, status: change.status };
    });
}

/**
 * Expand every collapsed placeholder that hides one of the changed runtime
 * nodes, nested ones included. Returns the number of rows expanded.
 */
export function revealCollapsedChanges(changes: readonly StatusChange[], tree: VisualTree): number {
    if (changes.length === 0) return 0;
    const limit = maxIndex(changes);
    let expanded = 0;
    for (;;) {
        const spans = rowSpans(tree, { runtime: limit });
        const hiding = spans.find(span =>
            span.hidden > 0
            && changes.some(c => c.index > span.runtimeStart && c.index <= span.runtimeStart + span.hidden),
        );
        if (!hiding) return expanded;
        tree.setSubtreeExpanded(hiding.visualIndex, true);
        expanded++;
    }
}
