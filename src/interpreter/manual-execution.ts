/**
 * Runs a single leaf straight from its visual row, outside the tree: the
 * request comes from the row's bindings and the shared store. Feedback is
 * posted to the session queue and only reaches the store when the session
 * drains it. Used by "execute selection" and "execute running".
 */

import { NodeStatus } from '@/engine/behavior-tree';
import { PortConversionError, UnsupportedTypeError } from '@/errors';
import type { JsonObject } from '@/marshal/json-value';
import { BindingPortHost, buildRequestFromPorts, decodePort, readAddress, type ValueStore } from '@/marshal/port-marshaler';
import { SERVER_NAME_PORT, SERVICE_NAME_PORT } from '@/model/node-model';
import type { VisualNode } from '@/model/visual-tree';
import type { ActionTypeResolver } from '@/remote/action-type-resolver';
import type { RemoteClientFactory } from '@/remote/client-factory';
import { UPDATE_FIELD_NAME } from '@/remote/protocol';
import { LogHandler } from '@/utilities/log-handler';
import { ThrottledLogger } from '@/utilities/throttled-logger';
import type { FeedbackTarget, RemoteEventQueue } from './remote-event-queue';

/** Feedback of one manual run, written through the row's bindings */
export class ManualFeedbackTarget implements FeedbackTarget {
    constructor(
        readonly host: BindingPortHost,
        /** Store the run reads from; the session drops feedback once it is replaced */
        readonly store: ValueStore,
        readonly runtimeIndex: number,
        private readonly feedbackLog: ThrottledLogger,
    ) {}

    get name(): string {
        return this.host.name;
    }

    /** Manual runs are never superseded, so every activation applies */
    applyFeedback(_activation: number, feedback: JsonObject): boolean {
        const host = this.host;
        const field = feedback[UPDATE_FIELD_NAME];
        if (typeof field !== 'string') {
            this.feedbackLog.warn(`Feedback for ${host.name} without "${UPDATE_FIELD_NAME}"`);
            return false;
        }
        const port = host.ports.get(field);
        const value = feedback[field];
        if (!port || value === undefined || host.referenceKey(field) === null) {
            this.feedbackLog.warn(`Feedback field "${field}" of ${host.name} is not bound to a key`);
            return false;
        }
        try {
            decodePort(host, field, port.typeName, value);
        } catch (e) {
            if (e instanceof PortConversionError || e instanceof UnsupportedTypeError) {
                this.feedbackLog.error(`Cannot store feedback field "${field}" of ${host.name}`, e);
                return false;
            }
            throw e;
        }
        return true;
    }
}

export class ManualExecutor {
    private static log = new LogHandler('ManualExecutor');

    private readonly feedbackLog = new ThrottledLogger(ManualExecutor.log, 1000);
    private runs = 0;

    constructor(
        private readonly clients: RemoteClientFactory,
        private readonly actionTypes: ActionTypeResolver,
        private readonly events: RemoteEventQueue,
    ) {}

    /**
     * Execute the leaf of a visual row whose runtime node sits at
     * `runtimeIndex`. Resolves to its final status, or null for rows that
     * are not leaves (controls, decorators, subtrees).
     */
    async execute(node: VisualNode, store: ValueStore, runtimeIndex: number): Promise<NodeStatus | null> {
        const host = new BindingPortHost(node.model, node.portMapping, store, node.instanceName);
        switch (node.model.kind) {
        case 'Condition':
            return this.executeCondition(host);
        case 'Action':
            return this.executeAction(new ManualFeedbackTarget(host, store, runtimeIndex, this.feedbackLog));
        case 'Control':
        case 'Decorator':
        case 'Subtree':
            return null;
        }
    }

    private async executeCondition(host: BindingPortHost): Promise<NodeStatus> {
        const serviceName = readAddress(host, SERVICE_NAME_PORT);
        const request = buildRequestFromPorts(host);
        const client = await this.clients.createServiceClient(serviceName);
        try {
            const response = await client.call(request);
            return response.success === true ? NodeStatus.SUCCESS : NodeStatus.FAILURE;
        } finally {
            client.dispose();
        }
    }

    private async executeAction(target: ManualFeedbackTarget): Promise<NodeStatus> {
        const host = target.host;
        const serverName = readAddress(host, SERVER_NAME_PORT);
        const goal = buildRequestFromPorts(host);
        const actionType = await this.actionTypes.resolve(serverName);
        const client = await this.clients.createActionClient(serverName, actionType);
        const activation = ++this.runs;
        try {
            client.registerFeedbackCallback(feedback => {
                this.events.post({ kind: 'leaf:feedback', target, activation, feedback });
            });
            client.sendGoal(goal);
            const result = await client.waitForResult();
            return result.success === true ? NodeStatus.SUCCESS : NodeStatus.FAILURE;
        } finally {
            client.dispose();
        }
    }
}
