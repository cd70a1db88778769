import {
    isTerminal,
    LeafNode,
    NodeStatus,
    statusName,
    type NodeConfig,
    type TickResult,
} from '@/engine/behavior-tree';
import { ConnectionError, GoalCancelledError, MissingInputError, PortConversionError, UnsupportedTypeError } from '@/errors';
import type { ActivationTarget, FeedbackTarget } from '@/interpreter/remote-event-queue';
import type { JsonObject } from '@/marshal/json-value';
import { buildRequestFromPorts, decodePort, readAddress } from '@/marshal/port-marshaler';
import { SERVER_NAME_PORT } from '@/model/node-model';
import type { ActionClient } from '@/remote/action-client';
import { UPDATE_FIELD_NAME } from '@/remote/protocol';
import { LogHandler, toError } from '@/utilities/log-handler';
import { ThrottledLogger } from '@/utilities/throttled-logger';
import type { LeafContext } from './leaf-context';

interface GoalCall {
    activation: number;
    client: ActionClient | null;
    cancelled: boolean;
}

/**
 * Leaf that runs a remote action.
 *
 * IDLE → RUNNING on the first tick: the goal is built from the ports and
 * sent in the background. Feedback and the result come back through the
 * session's event queue. SUCCESS or FAILURE then holds until the node is
 * reset. Halting cancels the goal and makes any late result stale.
 *
 * While a manual run holds the node, its own goal is cancelled and ticks
 * report RUNNING without sending another one.
 */
export class RemoteActionNode extends LeafNode implements ActivationTarget, FeedbackTarget {
    private static log = new LogHandler('RemoteActionNode');

    readonly kind = 'Action';

    private activation = 0;
    private call: GoalCall | null = null;
    private manualHold = false;
    private readonly logger: LogHandler;
    private readonly feedbackLog: ThrottledLogger;

    constructor(
        name: string,
        registrationId: string,
        config: NodeConfig,
        private readonly context: LeafContext,
    ) {
        super(name, registrationId, config);
        this.logger = RemoteActionNode.log.scoped(name);
        this.feedbackLog = new ThrottledLogger(this.logger, 1000);
    }

    get isAwaitingRemote(): boolean {
        return this.call !== null || this.manualHold;
    }

    /** Hand the remote call over to a manual run until released or overridden */
    holdForManualRun(): void {
        this.cancelActivation();
        this.manualHold = true;
    }

    releaseManualHold(): void {
        this.manualHold = false;
    }

    protected tick(): TickResult {
        if (this.call || this.manualHold) return NodeStatus.RUNNING;
        if (isTerminal(this.status)) return this.status;

        let serverName: string;
        let goal: JsonObject;
        try {
            serverName = readAddress(this, SERVER_NAME_PORT);
            goal = buildRequestFromPorts(this);
        } catch (e) {
            if (e instanceof MissingInputError) {
                this.logger.warn(e.message);
                return NodeStatus.FAILURE;
            }
            throw e;
        }

        const call: GoalCall = { activation: ++this.activation, client: null, cancelled: false };
        this.call = call;
        this.run(call, serverName, goal).catch((e: unknown) => {
            this.logger.error('Goal dispatch failed', toError(e));
        });
        return NodeStatus.RUNNING;
    }

    completeActivation(activation: number, status: NodeStatus): boolean {
        if (this.call?.activation !== activation) return false;
        this.call = null;
        this.setStatus(status);
        this.logger.debug(`activation ${activation} finished with ${statusName(status)}`);
        return true;
    }

    applyFeedback(activation: number, feedback: JsonObject): boolean {
        if (this.call?.activation !== activation) return false;

        const field = feedback[UPDATE_FIELD_NAME];
        if (typeof field !== 'string') {
            this.feedbackLog.warn(`Feedback without "${UPDATE_FIELD_NAME}"`);
            return false;
        }
        const port = this.ports.get(field);
        const value = feedback[field];
        if (!port || value === undefined) {
            this.feedbackLog.warn(`Feedback field "${field}" has no matching port or value`);
            return false;
        }
        try {
            decodePort(this, field, port.typeName, value);
        } catch (e) {
            if (e instanceof PortConversionError || e instanceof UnsupportedTypeError) {
                this.feedbackLog.error(`Cannot store feedback field "${field}"`, e);
                return false;
            }
            throw e;
        }
        return true;
    }

    override reset(): void {
        this.cancelActivation();
        super.reset();
    }

    override overrideStatus(status: NodeStatus): void {
        this.cancelActivation();
        this.manualHold = false;
        super.overrideStatus(status);
    }

    protected override halt(): void {
        this.cancelActivation();
    }

    private cancelActivation(): void {
        const call = this.call;
        if (!call) return;
        this.call = null;
        call.cancelled = true;
        call.client?.cancelGoal();
        this.logger.debug(`activation ${call.activation} cancelled`);
    }

    private async run(call: GoalCall, serverName: string, goal: JsonObject): Promise<void> {
        const { clients, actionTypes, events } = this.context;
        let status = NodeStatus.FAILURE;
        try {
            const actionType = await actionTypes.resolve(serverName);
            if (call.cancelled) return;
            const client = await clients.createActionClient(serverName, actionType);
            call.client = client;
            if (call.cancelled) return;

            client.registerFeedbackCallback(feedback => {
                events.post({ kind: 'leaf:feedback', target: this, activation: call.activation, feedback });
            });
            client.sendGoal(goal);
            const result = await client.waitForResult();
            status = result.success === true ? NodeStatus.SUCCESS : NodeStatus.FAILURE;
        } catch (e) {
            if (call.cancelled || e instanceof GoalCancelledError) return;
            if (e instanceof ConnectionError) {
                events.post({ kind: 'connection:error', source: this.name, error: e });
            } else {
                this.logger.error(`Action on ${serverName} failed`, toError(e));
            }
        } finally {
            call.client?.dispose();
        }
        events.post({ kind: 'leaf:result', target: this, activation: call.activation, status });
    }
}
