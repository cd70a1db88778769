import { TreeLoadError } from '@/errors';
import type { NodeModel } from './node-model';
import type { TreeDocument, TreeElement } from './tree-document';
import { getTreeElement } from './tree-document';

/** A row of the visual tree */
export interface VisualNode {
    instanceName: string;
    model: NodeModel;
    /** Port name → mapping value on this instance */
    portMapping: ReadonlyMap<string, string>;
    /** Only subtree placeholders can be collapsed */
    collapsed: boolean;
}

/**
 * The editable view of a tree. Row 0 is the ROOT row; a collapsed subtree
 * placeholder hides the rows of the subtree it includes.
 */
export interface VisualTree {
    /** Visible rows in order */
    nodes(): readonly VisualNode[];
    /** Runtime nodes hidden behind a collapsed row (0 for any other row) */
    hiddenNodeCount(visualIndex: number): number;
    setSubtreeExpanded(visualIndex: number, expanded: boolean): void;
}

export const ROOT_MODEL: NodeModel = { kind: 'Control', registrationId: 'Root', ports: new Map() };

/** One node of the fully expanded tree, in pre-order */
export interface VisualEntry {
    instanceName: string;
    model: NodeModel;
    portMapping: ReadonlyMap<string, string>;
    /** Number of entries below this one (its whole expanded subtree) */
    descendantCount: number;
    collapsed: boolean;
}

/**
 * Visual tree over a flat pre-order entry list. The list always holds every
 * node; collapse flags only decide which of them are visible.
 */
export class FlatVisualTree implements VisualTree {
    constructor(private readonly entries: VisualEntry[]) {}

    nodes(): readonly VisualNode[] {
        return this.visibleEntries().map(entry => ({
            instanceName: entry.instanceName,
            model: entry.model,
            portMapping: entry.portMapping,
            collapsed: entry.collapsed,
        }));
    }

    hiddenNodeCount(visualIndex: number): number {
        const entry = this.visibleAt(visualIndex);
        return entry?.collapsed ? entry.descendantCount : 0;
    }

    setSubtreeExpanded(visualIndex: number, expanded: boolean): void {
        const entry = this.visibleAt(visualIndex);
        if (!entry) {
            throw new RangeError(`No visual row ${visualIndex}`);
        }
        if (entry.model.kind !== 'Subtree') {
            throw new Error(`Row ${visualIndex} (${entry.instanceName}) is not a subtree`);
        }
        entry.collapsed = !expanded;
    }

    private visibleAt(visualIndex: number): VisualEntry | undefined {
        const visible = this.visibleEntries();
        return visualIndex >= 0 && visualIndex < visible.length ? visible[visualIndex] : undefined;
    }

    private visibleEntries(): VisualEntry[] {
        const result: VisualEntry[] = [];
        let position = 0;
        while (position < this.entries.length) {
            const entry = this.entries[position];
            result.push(entry);
            position += entry.collapsed ? entry.descendantCount + 1 : 1;
        }
        return result;
    }

    /**
     * Visual tree of a document's tree, with subtrees inlined below their
     * SubTree node (the same order the runtime tree uses).
     */
    static fromDocument(doc: TreeDocument, options: { treeId?: string; collapseSubtrees?: boolean } = {}): FlatVisualTree {
        const collapse = options.collapseSubtrees ?? false;
        const entries: VisualEntry[] = [];
        const including: string[] = [];

        const visit = (element: TreeElement): number => {
            const model: NodeModel = doc.models.get(element.registrationId) ?? {
                kind: 'Action',
                registrationId: element.registrationId,
                ports: new Map(),
            };
            const entry: VisualEntry = {
                instanceName: element.instanceName,
                model,
                portMapping: element.mapping,
                descendantCount: 0,
                collapsed: false,
            };
            entries.push(entry);

            let count = 0;
            if (model.kind === 'Subtree') {
                if (including.includes(element.registrationId)) {
                    throw new TreeLoadError(`Subtree "${element.registrationId}" includes itself`);
                }
                including.push(element.registrationId);
                count += visit(getTreeElement(doc, element.registrationId));
                including.pop();
                entry.collapsed = collapse;
            }
            for (const child of element.children) {
                count += visit(child);
            }
            entry.descendantCount = count;
            return count + 1;
        };

        const root: VisualEntry = {
            instanceName: 'ROOT',
            model: ROOT_MODEL,
            portMapping: new Map(),
            descendantCount: 0,
            collapsed: false,
        };
        entries.push(root);
        root.descendantCount = visit(getTreeElement(doc, options.treeId ?? doc.mainTreeId));
        return new FlatVisualTree(entries);
    }
}
