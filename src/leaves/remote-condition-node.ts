import { LeafNode, NodeStatus, PENDING, statusName, type NodeConfig, type TickResult } from '@/engine/behavior-tree';
import { ConnectionError, MissingInputError } from '@/errors';
import type { ActivationTarget } from '@/interpreter/remote-event-queue';
import type { JsonObject } from '@/marshal/json-value';
import { buildRequestFromPorts, readAddress } from '@/marshal/port-marshaler';
import { SERVICE_NAME_PORT } from '@/model/node-model';
import type { ServiceClient } from '@/remote/service-client';
import { LogHandler, toError } from '@/utilities/log-handler';
import type { LeafContext } from './leaf-context';

interface ServiceCall {
    activation: number;
    client: ServiceClient | null;
    cancelled: boolean;
}

/**
 * Leaf that evaluates a remote service.
 *
 * The first tick starts exactly one call and returns PENDING, which ends
 * the tick pass without settling any ancestor. Once the response has been
 * drained, ticks return the resolved status until the node is reset.
 * A manual run holds the node PENDING until it is released or overridden.
 */
export class RemoteConditionNode extends LeafNode implements ActivationTarget {
    private static log = new LogHandler('RemoteConditionNode');

    readonly kind = 'Condition';

    private activation = 0;
    private inFlight: ServiceCall | null = null;
    private resolution: NodeStatus | null = null;
    private manualHold = false;
    private readonly logger: LogHandler;

    constructor(
        name: string,
        registrationId: string,
        config: NodeConfig,
        private readonly context: LeafContext,
    ) {
        super(name, registrationId, config);
        this.logger = RemoteConditionNode.log.scoped(name);
    }

    get isAwaitingRemote(): boolean {
        return this.inFlight !== null || this.manualHold;
    }

    /** Hand the service call over to a manual run until released or overridden */
    holdForManualRun(): void {
        this.cancelActivation();
        this.resolution = null;
        this.manualHold = true;
    }

    releaseManualHold(): void {
        this.manualHold = false;
    }

    protected tick(): TickResult {
        if (this.resolution !== null) return this.resolution;
        if (this.inFlight || this.manualHold) return PENDING;

        let serviceName: string;
        let request: JsonObject;
        try {
            serviceName = readAddress(this, SERVICE_NAME_PORT);
            request = buildRequestFromPorts(this);
        } catch (e) {
            if (e instanceof MissingInputError) {
                this.logger.warn(e.message);
                this.resolution = NodeStatus.FAILURE;
                return NodeStatus.FAILURE;
            }
            throw e;
        }

        const call: ServiceCall = { activation: ++this.activation, client: null, cancelled: false };
        this.inFlight = call;
        this.setStatus(NodeStatus.RUNNING);
        this.evaluate(call, serviceName, request).catch((e: unknown) => {
            this.logger.error('Service call failed', toError(e));
        });
        return PENDING;
    }

    completeActivation(activation: number, status: NodeStatus): boolean {
        if (this.inFlight?.activation !== activation) return false;
        this.inFlight = null;
        this.resolution = status;
        this.setStatus(status);
        this.logger.debug(`activation ${activation} resolved to ${statusName(status)}`);
        return true;
    }

    override reset(): void {
        this.cancelActivation();
        this.resolution = null;
        super.reset();
    }

    override overrideStatus(status: NodeStatus): void {
        this.cancelActivation();
        this.manualHold = false;
        this.resolution = status === NodeStatus.IDLE ? null : status;
        super.overrideStatus(status);
    }

    protected override halt(): void {
        this.cancelActivation();
        this.resolution = null;
    }

    private cancelActivation(): void {
        const call = this.inFlight;
        if (!call) return;
        this.inFlight = null;
        call.cancelled = true;
        // A service call cannot be withdrawn; closing the client drops the response
        call.client?.dispose();
    }

    private async evaluate(call: ServiceCall, serviceName: string, request: JsonObject): Promise<void> {
        const { clients, events } = this.context;
        let status = NodeStatus.FAILURE;
        try {
            const client = await clients.createServiceClient(serviceName);
            call.client = client;
            if (call.cancelled) return;
            const response = await client.call(request);
            status = response.success === true ? NodeStatus.SUCCESS : NodeStatus.FAILURE;
        } catch (e) {
            if (call.cancelled) return;
            if (e instanceof ConnectionError) {
                events.post({ kind: 'connection:error', source: this.name, error: e });
            } else {
                this.logger.error(`Call to ${serviceName} failed`, toError(e));
            }
        } finally {
            call.client?.dispose();
        }
        events.post({ kind: 'leaf:result', target: this, activation: call.activation, status });
    }
}
