import { describe, it, expect } from 'vitest';
import { TreeLoadError } from '@/errors';
import { PortDirection } from '@/model/node-model';
import { parseTreeDocument } from '@/model/tree-document';
import { FlatVisualTree } from '@/model/visual-tree';
import { MISSION_TREE, SUBTREE_MISSION } from './helpers/tree-fixtures';

function rowNames(tree: FlatVisualTree): string[] {
    return tree.nodes().map(n => n.instanceName);
}

// ─── Document ─────────────────────────────────────────────────────────────────

describe('parseTreeDocument', () => {
    it('reads trees, instances and their port mappings', () => {
        const doc = parseTreeDocument(MISSION_TREE);
        const root = doc.trees.get('Main');

        expect(doc.mainTreeId).toBe('Main');
        expect(root?.registrationId).toBe('Sequence');
        expect(root?.instanceName).toBe('mission');
        expect(root?.children.map(c => c.registrationId)).toEqual(['IsBatteryOk', 'MoveTo']);
        expect([...(root?.children[1].mapping ?? [])]).toEqual([
            ['server_name', '/move_base'],
            ['target', '{goal}'],
            ['progress', '{progress}'],
        ]);
    });

    it('reads node models with their ports', () => {
        const doc = parseTreeDocument(MISSION_TREE);
        const move = doc.models.get('MoveTo');

        expect(move?.kind).toBe('Action');
        expect([...(move?.ports.keys() ?? [])]).toEqual(['server_name', 'target', 'speed', 'progress']);
        expect(move?.ports.get('target')).toEqual({
            name: 'target',
            direction: PortDirection.INPUT,
            typeName: 'geometry_msgs/Point',
            defaultValue: '',
            description: 'Where to go',
        });
        expect(move?.ports.get('speed')?.defaultValue).toBe('0.5');
        expect(move?.ports.get('progress')?.direction).toBe(PortDirection.OUTPUT);
        expect(move?.ports.get('server_name')?.typeName).toBe('string');
        expect(doc.models.get('IsBatteryOk')?.kind).toBe('Condition');
    });

    it('adds builtin models and a subtree model per tree', () => {
        const doc = parseTreeDocument(SUBTREE_MISSION);

        expect(doc.models.get('Sequence')?.kind).toBe('Control');
        expect(doc.models.get('Approach')?.kind).toBe('Subtree');
        expect(doc.models.get('Main')?.kind).toBe('Subtree');
    });

    it('takes IDs from generic tags, applies aliases and defaults names to the ID', () => {
        const doc = parseTreeDocument(`
            <root>
              <BehaviorTree ID="T">
                <Selector>
                  <Action ID="AlwaysFailure"/>
                  <RetryUntilSuccesful num_attempts="2"><AlwaysSuccess/></RetryUntilSuccesful>
                </Selector>
              </BehaviorTree>
            </root>`);
        const root = doc.trees.get('T');

        expect(doc.mainTreeId).toBe('T');
        expect(root?.registrationId).toBe('Fallback');
        expect(root?.children.map(c => c.instanceName)).toEqual(['AlwaysFailure', 'RetryUntilSuccessful']);
        expect(root?.children[1].mapping.get('num_attempts')).toBe('2');
    });

    it.each([
        ['malformed XML', '<root><BehaviorTree ID="T">', 'XML parse error'],
        ['a foreign root element', '<tree><BehaviorTree ID="T"><AlwaysSuccess/></BehaviorTree></tree>', 'Expected <root> element, found <tree>'],
        ['no trees', '<root/>', 'Document contains no <BehaviorTree>'],
        [
            'two roots in one tree',
            '<root><BehaviorTree ID="T"><AlwaysSuccess/><AlwaysFailure/></BehaviorTree></root>',
            'BehaviorTree "T" must have exactly one root node, found 2',
        ],
        [
            'duplicate tree IDs',
            '<root><BehaviorTree ID="T"><AlwaysSuccess/></BehaviorTree><BehaviorTree ID="T"><AlwaysSuccess/></BehaviorTree></root>',
            'Duplicate BehaviorTree ID "T"',
        ],
        [
            'an unknown main tree',
            '<root main_tree_to_execute="Nope"><BehaviorTree ID="T"><AlwaysSuccess/></BehaviorTree></root>',
            'main_tree_to_execute names unknown tree "Nope"',
        ],
        ['an Action tag without ID', '<root><BehaviorTree ID="T"><Action/></BehaviorTree></root>', '<Action> without an ID attribute'],
    ])('rejects %s', (_label, xml, expected) => {
        expect(() => parseTreeDocument(xml)).toThrow(expected);
    });

    it('reports every load problem as TreeLoadError', () => {
        expect(() => parseTreeDocument('<root><BehaviorTree')).toThrow(TreeLoadError);
        expect(() => parseTreeDocument('<root/>')).toThrow(TreeLoadError);
    });
});

// ─── Visual tree ──────────────────────────────────────────────────────────────

describe('FlatVisualTree.fromDocument', () => {
    it('puts a ROOT row above the main tree', () => {
        const tree = FlatVisualTree.fromDocument(parseTreeDocument(MISSION_TREE));

        expect(rowNames(tree)).toEqual(['ROOT', 'mission', 'battery', 'move']);
        expect(tree.nodes()[3].model.registrationId).toBe('MoveTo');
        expect(tree.nodes()[3].portMapping.get('server_name')).toBe('/move_base');
    });

    it('inlines subtrees below their SubTree row', () => {
        const tree = FlatVisualTree.fromDocument(parseTreeDocument(SUBTREE_MISSION));

        expect(rowNames(tree)).toEqual(['ROOT', 'mission', 'approach', 'approach_seq', 'battery', 'move', 'done']);
        expect(tree.hiddenNodeCount(2)).toBe(0);
    });

    it('hides collapsed subtrees behind their placeholder', () => {
        const tree = FlatVisualTree.fromDocument(parseTreeDocument(SUBTREE_MISSION), { collapseSubtrees: true });

        expect(rowNames(tree)).toEqual(['ROOT', 'mission', 'approach', 'done']);
        expect(tree.nodes()[2].collapsed).toBe(true);
        expect(tree.hiddenNodeCount(2)).toBe(3);
        expect(tree.hiddenNodeCount(3)).toBe(0);
    });

    it('expands and collapses placeholders', () => {
        const tree = FlatVisualTree.fromDocument(parseTreeDocument(SUBTREE_MISSION), { collapseSubtrees: true });

        tree.setSubtreeExpanded(2, true);
        expect(rowNames(tree)).toHaveLength(7);
        tree.setSubtreeExpanded(2, false);
        expect(rowNames(tree)).toEqual(['ROOT', 'mission', 'approach', 'done']);
    });

    it('refuses to expand rows that are not subtrees or do not exist', () => {
        const tree = FlatVisualTree.fromDocument(parseTreeDocument(SUBTREE_MISSION));

        expect(() => tree.setSubtreeExpanded(1, true)).toThrow('Row 1 (mission) is not a subtree');
        expect(() => tree.setSubtreeExpanded(42, true)).toThrow(RangeError);
    });

    it('can show a tree other than the main one', () => {
        const tree = FlatVisualTree.fromDocument(parseTreeDocument(SUBTREE_MISSION), { treeId: 'Approach' });

        expect(rowNames(tree)).toEqual(['ROOT', 'approach_seq', 'battery', 'move']);
    });

    it('treats nodes without a model as actions', () => {
        const doc = parseTreeDocument('<root><BehaviorTree ID="T"><Teleport name="jump"/></BehaviorTree></root>');

        expect(FlatVisualTree.fromDocument(doc).nodes()[1].model.kind).toBe('Action');
    });

    it('rejects a subtree that includes itself', () => {
        const doc = parseTreeDocument('<root><BehaviorTree ID="Loop"><Sequence><SubTree ID="Loop"/></Sequence></BehaviorTree></root>');

        expect(() => FlatVisualTree.fromDocument(doc)).toThrow('Subtree "Loop" includes itself');
    });
});
