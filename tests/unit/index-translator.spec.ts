import { describe, it, expect } from 'vitest';
import { NodeStatus } from '@/engine/behavior-tree';
import {
    revealCollapsedChanges,
    toRuntimeIndices,
    toVisualIndices,
    type StatusChange,
} from '@/interpreter/index-translator';
import { parseTreeDocument } from '@/model/tree-document';
import { FlatVisualTree } from '@/model/visual-tree';
import { collapsedFiveNodeTree, row, SUBTREE_MISSION } from './helpers/tree-fixtures';

const R = NodeStatus.RUNNING;
const S = NodeStatus.SUCCESS;

function changes(...indices: number[]): StatusChange[] {
    return indices.map(index => ({ index, status: R }));
}

function indices(list: StatusChange[]): number[] {
    return list.map(change => change.index);
}

describe('toVisualIndices', () => {
    it('maps nodes hidden in a collapsed subtree to its placeholder', () => {
        const tree = collapsedFiveNodeTree();

        expect(toVisualIndices([{ index: 3, status: R }, { index: 5, status: S }], tree)).toEqual([
            { index: 1, status: R },
            { index: 2, status: S },
        ]);
    });

    it('maps each visible row to itself when nothing is collapsed', () => {
        const tree = FlatVisualTree.fromDocument(parseTreeDocument(SUBTREE_MISSION));

        expect(indices(toVisualIndices(changes(0, 1, 2, 3, 4, 5, 6), tree))).toEqual([0, 1, 2, 3, 4, 5, 6]);
    });

    it('shifts the rows after a collapsed subtree', () => {
        const tree = FlatVisualTree.fromDocument(parseTreeDocument(SUBTREE_MISSION), { collapseSubtrees: true });

        expect(indices(toVisualIndices(changes(2, 4, 5, 6), tree))).toEqual([2, 2, 2, 3]);
    });

    it('returns an empty batch for no changes', () => {
        expect(toVisualIndices([], collapsedFiveNodeTree())).toEqual([]);
    });

    it('rejects runtime indices past the last node', () => {
        expect(() => toVisualIndices(changes(6), collapsedFiveNodeTree()))
            .toThrow('Runtime index 6 is outside the visual tree');
    });
});

describe('toRuntimeIndices', () => {
    it('maps a placeholder row to the subtree node itself', () => {
        expect(indices(toRuntimeIndices(changes(0, 1, 2), collapsedFiveNodeTree()))).toEqual([0, 1, 5]);
    });

    it('inverts toVisualIndices for every visible row', () => {
        const tree = collapsedFiveNodeTree();
        const runtime = toRuntimeIndices(changes(0, 1, 2), tree);

        expect(indices(toVisualIndices(runtime, tree))).toEqual([0, 1, 2]);
    });

    it('rejects rows that do not exist', () => {
        expect(() => toRuntimeIndices(changes(3), collapsedFiveNodeTree()))
            .toThrow('Visual index 3 is outside the visual tree');
        expect(() => toRuntimeIndices(changes(-1), collapsedFiveNodeTree())).toThrow(RangeError);
    });
});

describe('revealCollapsedChanges', () => {
    it('expands the placeholder hiding a changed node', () => {
        const tree = collapsedFiveNodeTree();

        expect(revealCollapsedChanges(changes(3), tree)).toBe(1);
        expect(indices(toVisualIndices(changes(3, 5), tree))).toEqual([3, 5]);
    });

    it('leaves the tree alone when only the placeholder itself changed', () => {
        const tree = collapsedFiveNodeTree();

        expect(revealCollapsedChanges(changes(1, 5), tree)).toBe(0);
        expect(tree.nodes()).toHaveLength(3);
    });

    it('expands nested placeholders down to the changed node', () => {
        const tree = new FlatVisualTree([
            row('ROOT', 'Control', 5),
            row('outer', 'Subtree', 3, true),
            row('inner', 'Subtree', 1, true),
            row('deep', 'Action'),
            row('mid', 'Action'),
            row('last', 'Action'),
        ]);

        expect(revealCollapsedChanges(changes(3), tree)).toBe(2);
        expect(tree.nodes().map(n => n.instanceName)).toEqual(['ROOT', 'outer', 'inner', 'deep', 'mid', 'last']);
        expect(indices(toVisualIndices(changes(3), tree))).toEqual([3]);
    });
});
