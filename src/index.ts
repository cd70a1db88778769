export { NodeStatus, PENDING, isTerminal, statusName, type TickResult, type TreeNode } from './engine/behavior-tree';
export { Blackboard } from './engine/blackboard';
export { BehaviorTree } from './engine/tree';
export { BehaviorTreeFactory, leafBuilder, type NodeBuilder, type NodeBuildContext } from './engine/tree-factory';
export {
    ClientUsageError,
    ConnectionError,
    GoalCancelledError,
    MissingInputError,
    PortConversionError,
    RemoteCallError,
    TreeLoadError,
    UnsupportedTypeError,
} from './errors';
export type { JsonObject, JsonValue, PortValue } from './marshal/json-value';
export {
    buildRequestFromBindings,
    buildRequestFromPorts,
    decodePort,
    encodePort,
    type PortHost,
    type ValueStore,
} from './marshal/port-marshaler';
export type { NodeKind, NodeModel, PortModel } from './model/node-model';
export { parseTreeDocument, type TreeDocument, type TreeElement } from './model/tree-document';
export { FlatVisualTree, type VisualNode, type VisualTree } from './model/visual-tree';
export { ActionClient } from './remote/action-client';
export { ServiceClient } from './remote/service-client';
export { RosbridgeClientFactory, type RemoteClientFactory } from './remote/client-factory';
export { StaticActionTypeResolver, TopicTypeResolver, type ActionTypeResolver } from './remote/action-type-resolver';
export type { Connection, Connector } from './remote/connection';
export { connectWebSocket } from './remote/websocket-connection';
export { EventBus, EventSubscriptionManager, type InterpreterEvents } from './interpreter/event-bus';
export { toRuntimeIndices, toVisualIndices, revealCollapsedChanges, type StatusChange } from './interpreter/index-translator';
export { diffStatuses, synchronizeStatuses } from './interpreter/status-synchronizer';
export { InterpreterSession, type InterpreterSessionOptions, type StatusSink } from './interpreter/interpreter-session';
export { InterpreterSettingsManager, type InterpreterSettings } from './interpreter/interpreter-settings';
export { UserNotifier, type UserNotification, type NotificationSink } from './interpreter/user-notifications';
export { LogHandler } from './utilities/log-handler';
