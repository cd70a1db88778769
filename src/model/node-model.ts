/**
 * Node models as declared in the tree document's <TreeNodesModel> section.
 * The kind tag drives every dispatch on "what sort of node is this".
 */

export enum PortDirection {
    INPUT = 'input',
    OUTPUT = 'output',
    INOUT = 'inout',
}

export interface PortModel {
    name: string;
    direction: PortDirection;
    /** Wire type name, e.g. "int32" or "geometry_msgs/Pose" */
    typeName: string;
    /** Literal used when the node instance does not bind the port */
    defaultValue: string;
    description: string;
}

export type PortModels = ReadonlyMap<string, PortModel>;

export type NodeKind = 'Action' | 'Condition' | 'Control' | 'Decorator' | 'Subtree';

interface NodeModelBase {
    registrationId: string;
    ports: PortModels;
}

export interface ActionModel extends NodeModelBase {
    kind: 'Action';
}

export interface ConditionModel extends NodeModelBase {
    kind: 'Condition';
}

export interface ControlModel extends NodeModelBase {
    kind: 'Control';
}

export interface DecoratorModel extends NodeModelBase {
    kind: 'Decorator';
}

export interface SubtreeModel extends NodeModelBase {
    kind: 'Subtree';
}

export type NodeModel = ActionModel | ConditionModel | ControlModel | DecoratorModel | SubtreeModel;

export type LeafModel = ActionModel | ConditionModel;

/** Port holding the action server name; never sent as part of a goal */
export const SERVER_NAME_PORT = 'server_name';
/** Port holding the service name; never sent as part of a request */
export const SERVICE_NAME_PORT = 'service_name';

/** Ports that address the remote endpoint instead of carrying payload */
export const ADDRESS_PORTS: ReadonlySet<string> = new Set([SERVER_NAME_PORT, SERVICE_NAME_PORT]);

export function isLeafModel(model: NodeModel): model is LeafModel {
    return model.kind === 'Action' || model.kind === 'Condition';
}

export function isPayloadPort(port: PortModel): boolean {
    return port.direction !== PortDirection.OUTPUT && !ADDRESS_PORTS.has(port.name);
}

export function inputPort(name: string, typeName = 'string', defaultValue = ''): PortModel {
    return { name, direction: PortDirection.INPUT, typeName, defaultValue, description: '' };
}

export function outputPort(name: string, typeName = 'string'): PortModel {
    return { name, direction: PortDirection.OUTPUT, typeName, defaultValue: '', description: '' };
}

export function portsOf(...ports: PortModel[]): PortModels {
    return new Map(ports.map(p => [p.name, p]));
}
