/**
 * Reader for the XML tree format:
 *
 *   <root main_tree_to_execute="MainTree">
 *     <BehaviorTree ID="MainTree"> ...one root node... </BehaviorTree>
 *     <TreeNodesModel> ...node models... </TreeNodesModel>
 *   </root>
 *
 * Only reading is supported; the document is never written back.
 */

import { TreeLoadError } from '@/errors';
import { LogHandler } from '@/utilities/log-handler';
import { BUILTIN_ALIASES, BUILTIN_MODELS } from './builtin-models';
import { PortDirection, type NodeKind, type NodeModel, type PortModel } from './node-model';
import { attributeMap, childElements, getAttribute, parseXML } from './xml-utils';

const log = new LogHandler('TreeDocument');

/** Attribute that makes a subtree use its parent's blackboard instead of a remapped child */
export const SHARED_BLACKBOARD_ATTRIBUTE = '__shared_blackboard';

/** One node instance inside a <BehaviorTree> */
export interface TreeElement {
    registrationId: string;
    /** Instance name; falls back to the registration ID */
    instanceName: string;
    /** Port name → mapping value (for subtrees: internal key → external binding) */
    mapping: ReadonlyMap<string, string>;
    children: readonly TreeElement[];
}

export interface TreeDocument {
    /** ID of the tree to run when none is named */
    mainTreeId: string;
    trees: ReadonlyMap<string, TreeElement>;
    /** Builtin models, then the document's <TreeNodesModel>, then one Subtree model per tree */
    models: ReadonlyMap<string, NodeModel>;
}

// ─── Node models ──────────────────────────────────────────────────────────────

const MODEL_TAGS: Readonly<Record<string, NodeKind>> = {
    Action: 'Action',
    Condition: 'Condition',
    Control: 'Control',
    Decorator: 'Decorator',
    SubTree: 'Subtree',
};

const PORT_TAGS: Readonly<Record<string, PortDirection>> = {
    input_port: PortDirection.INPUT,
    output_port: PortDirection.OUTPUT,
    inout_port: PortDirection.INOUT,
};

function parsePort(el: Element, direction: PortDirection): PortModel {
    const name = getAttribute(el, 'name');
    if (name === '') {
        throw new TreeLoadError(`<${el.tagName}> without a name attribute`);
    }
    return {
        name,
        direction,
        typeName: getAttribute(el, 'type', 'string'),
        defaultValue: getAttribute(el, 'default'),
        description: (el.textContent ?? '').trim(),
    };
}

function parseModel(el: Element): NodeModel | null {
    const kind = MODEL_TAGS[el.tagName];
    if (kind === undefined) {
        log.warn(`Ignoring unknown model element <${el.tagName}>`);
        return null;
    }
    const registrationId = getAttribute(el, 'ID');
    if (registrationId === '') {
        throw new TreeLoadError(`<${el.tagName}> model without an ID attribute`);
    }

    const ports = new Map<string, PortModel>();
    for (const child of childElements(el)) {
        const direction = PORT_TAGS[child.tagName];
        if (direction === undefined) continue;
        const port = parsePort(child, direction);
        ports.set(port.name, port);
    }
    return { kind, registrationId, ports };
}

// ─── Tree elements ────────────────────────────────────────────────────────────

/** Tags that carry their registration ID in an ID attribute */
const GENERIC_TAGS = new Set(['Action', 'Condition', 'Control', 'Decorator', 'SubTree', 'SubTreePlus']);

const RESERVED_ATTRIBUTES = new Set(['ID', 'name']);

function parseElement(el: Element): TreeElement {
    let registrationId = el.tagName;
    if (GENERIC_TAGS.has(el.tagName)) {
        registrationId = getAttribute(el, 'ID');
        if (registrationId === '') {
            throw new TreeLoadError(`<${el.tagName}> without an ID attribute`);
        }
    }
    registrationId = BUILTIN_ALIASES.get(registrationId) ?? registrationId;

    return {
        registrationId,
        instanceName: getAttribute(el, 'name', registrationId),
        mapping: attributeMap(el, RESERVED_ATTRIBUTES),
        children: childElements(el).map(parseElement),
    };
}

function parseTree(el: Element): [string, TreeElement] {
    const id = getAttribute(el, 'ID');
    if (id === '') {
        throw new TreeLoadError('<BehaviorTree> without an ID attribute');
    }
    const roots = childElements(el);
    if (roots.length !== 1) {
        throw new TreeLoadError(`BehaviorTree "${id}" must have exactly one root node, found ${roots.length}`);
    }
    return [id, parseElement(roots[0])];
}

// ─── Document ─────────────────────────────────────────────────────────────────

/** Parse a tree document from XML text */
export function parseTreeDocument(xml: string): TreeDocument {
    let doc: Document;
    try {
        doc = parseXML(xml);
    } catch (e) {
        throw new TreeLoadError(e instanceof Error ? e.message : String(e));
    }

    const root = doc.documentElement;
    if (root.tagName !== 'root') {
        throw new TreeLoadError(`Expected <root> element, found <${root.tagName}>`);
    }

    const trees = new Map<string, TreeElement>();
    const models = new Map<string, NodeModel>(BUILTIN_MODELS.map(m => [m.registrationId, m]));

    for (const child of childElements(root)) {
        if (child.tagName === 'BehaviorTree') {
            const [id, element] = parseTree(child);
            if (trees.has(id)) {
                throw new TreeLoadError(`Duplicate BehaviorTree ID "${id}"`);
            }
            trees.set(id, element);
        } else if (child.tagName === 'TreeNodesModel') {
            for (const modelEl of childElements(child)) {
                const model = parseModel(modelEl);
                if (model) models.set(model.registrationId, model);
            }
        }
    }

    if (trees.size === 0) {
        throw new TreeLoadError('Document contains no <BehaviorTree>');
    }

    // Every tree can be included as a subtree; its remapping keys are not declared ports
    for (const id of trees.keys()) {
        if (!models.has(id)) {
            models.set(id, { kind: 'Subtree', registrationId: id, ports: new Map() });
        }
    }

    const named = getAttribute(root, 'main_tree_to_execute');
    const [firstTree] = trees.keys();
    const mainTreeId = named !== '' ? named : firstTree;
    if (!trees.has(mainTreeId)) {
        throw new TreeLoadError(`main_tree_to_execute names unknown tree "${mainTreeId}"`);
    }

    return { mainTreeId, trees, models };
}

/** Root element of a tree of the document */
export function getTreeElement(doc: TreeDocument, treeId: string): TreeElement {
    const tree = doc.trees.get(treeId);
    if (!tree) {
        throw new TreeLoadError(`Unknown tree "${treeId}"`);
    }
    return tree;
}
