import type { Blackboard } from './blackboard';
import type { NodeKind, PortModel, PortModels } from '@/model/node-model';
import { resolvePortBinding } from '@/model/port-binding';
import type { PortValue } from '@/marshal/json-value';
import { readTypedInput, type InputSource, type PortHost } from '@/marshal/port-marshaler';

// ─── Node Status ──────────────────────────────────────────────────────────────

export enum NodeStatus {
    IDLE,
    RUNNING,
    SUCCESS,
    FAILURE,
}

/**
 * Returned by a leaf instead of a status when it has started an evaluation
 * that finishes out-of-band. The tick pass unwinds immediately: no ancestor
 * records a result for this pass.
 */
export const PENDING = 'PENDING';

export type TickResult = NodeStatus | typeof PENDING;

export function isTerminal(status: NodeStatus): boolean {
    return status === NodeStatus.SUCCESS || status === NodeStatus.FAILURE;
}

export function statusName(status: TickResult): string {
    return status === PENDING ? PENDING : NodeStatus[status];
}

// ─── Abstract Base ────────────────────────────────────────────────────────────

export interface NodeConfig {
    blackboard: Blackboard;
    /** Ports declared by the node's model */
    ports: PortModels;
    /** Port name → mapping value written on the node instance */
    mapping: ReadonlyMap<string, string>;
}

export abstract class TreeNode implements PortHost {
    abstract readonly kind: NodeKind;

    private _status = NodeStatus.IDLE;
    /** Outputs with no reference binding stay on the node */
    private readonly localOutputs = new Map<string, PortValue>();

    constructor(
        public readonly name: string,
        public readonly registrationId: string,
        protected readonly config: NodeConfig,
    ) {}

    get status(): NodeStatus {
        return this._status;
    }

    get ports(): PortModels {
        return this.config.ports;
    }

    get blackboard(): Blackboard {
        return this.config.blackboard;
    }

    children(): readonly TreeNode[] {
        return [];
    }

    /** Tick the node and record the status it returns */
    executeTick(): TickResult {
        const result = this.tick();
        if (result !== PENDING) {
            this.setStatus(result);
        }
        return result;
    }

    /** Stop a running node and return it to IDLE */
    reset(): void {
        if (this._status === NodeStatus.RUNNING) {
            this.halt();
        }
        this.setStatus(NodeStatus.IDLE);
    }

    /** Force a status from outside the tick (manual override from the visual layer) */
    overrideStatus(status: NodeStatus): void {
        if (status === NodeStatus.IDLE) {
            this.reset();
            return;
        }
        this.setStatus(status);
    }

    protected abstract tick(): TickResult;

    /** Stop whatever the node is running; called by reset() while RUNNING */
    protected halt(): void {}

    protected setStatus(status: NodeStatus): void {
        this._status = status;
    }

    // ─── Ports ────────────────────────────────────────────────────────────────

    readInput(portName: string): InputSource | undefined {
        const port = this.requirePort(portName);
        const binding = resolvePortBinding(port, this.config.mapping.get(portName));
        if (binding === null) return undefined;
        if (binding.kind === 'literal') return { kind: 'literal', text: binding.text };
        const value = this.config.blackboard.get(binding.key);
        return value === undefined ? undefined : { kind: 'stored', value };
    }

    writeOutput(portName: string, value: PortValue): void {
        const port = this.requirePort(portName);
        const binding = resolvePortBinding(port, this.config.mapping.get(portName));
        if (binding?.kind === 'reference') {
            this.config.blackboard.set(binding.key, value);
            return;
        }
        this.localOutputs.set(portName, value);
    }

    /** Last value written to an output that is not bound to the blackboard */
    localOutput(portName: string): PortValue | undefined {
        return this.localOutputs.get(portName);
    }

    private requirePort(portName: string): PortModel {
        const port = this.config.ports.get(portName);
        if (!port) {
            throw new Error(`Port "${portName}" is not declared by ${this.registrationId}(${this.name})`);
        }
        return port;
    }
}

export abstract class LeafNode extends TreeNode {}

export abstract class ControlNode extends TreeNode {
    readonly kind = 'Control';

    constructor(name: string, registrationId: string, config: NodeConfig, protected readonly childNodes: TreeNode[]) {
        super(name, registrationId, config);
    }

    override children(): readonly TreeNode[] {
        return this.childNodes;
    }

    protected override halt(): void {
        this.haltChildren();
    }

    /** Reset every child from index `from` on */
    protected haltChildren(from = 0): void {
        for (let i = from; i < this.childNodes.length; i++) {
            this.childNodes[i].reset();
        }
    }
}

export abstract class DecoratorNode extends TreeNode {
    readonly kind: 'Decorator' | 'Subtree' = 'Decorator';

    constructor(name: string, registrationId: string, config: NodeConfig, protected readonly child: TreeNode) {
        super(name, registrationId, config);
    }

    override children(): readonly TreeNode[] {
        return [this.child];
    }

    protected override halt(): void {
        this.child.reset();
    }

    /** Integer parameter port with a fallback when unset */
    protected intParameter(portName: string, fallback: number): number {
        if (this.readInput(portName) === undefined) return fallback;
        const value = readTypedInput(this, portName, 'int32');
        return typeof value === 'number' ? value : fallback;
    }
}

// ─── Control Nodes ────────────────────────────────────────────────────────────

/** Runs children in order, remembering the running child across ticks.
 *  Fails on first FAILURE, returns RUNNING while a child runs, succeeds when
 *  all children succeed. */
export class Sequence extends ControlNode {
    private current = 0;

    protected tick(): TickResult {
        this.setStatus(NodeStatus.RUNNING);
        while (this.current < this.childNodes.length) {
            const status = this.childNodes[this.current].executeTick();
            if (status === PENDING || status === NodeStatus.RUNNING) return status;
            if (status === NodeStatus.FAILURE) {
                this.haltChildren();
                this.current = 0;
                return NodeStatus.FAILURE;
            }
            this.current++;
        }
        this.haltChildren();
        this.current = 0;
        return NodeStatus.SUCCESS;
    }

    protected override halt(): void {
        this.current = 0;
        super.halt();
    }
}

/** Like Sequence, but re-evaluates earlier children on every tick. */
export class ReactiveSequence extends ControlNode {
    protected tick(): TickResult {
        this.setStatus(NodeStatus.RUNNING);
        for (let i = 0; i < this.childNodes.length; i++) {
            const status = this.childNodes[i].executeTick();
            if (status === PENDING) return status;
            if (status === NodeStatus.RUNNING) {
                this.haltChildren(i + 1);
                return status;
            }
            if (status === NodeStatus.FAILURE) {
                this.haltChildren();
                return NodeStatus.FAILURE;
            }
        }
        this.haltChildren();
        return NodeStatus.SUCCESS;
    }
}

/** Tries children in order. Succeeds on first SUCCESS, returns RUNNING while
 *  a child runs, fails only when all children fail. */
export class Fallback extends ControlNode {
    private current = 0;

    protected tick(): TickResult {
        this.setStatus(NodeStatus.RUNNING);
        while (this.current < this.childNodes.length) {
            const status = this.childNodes[this.current].executeTick();
            if (status === PENDING || status === NodeStatus.RUNNING) return status;
            if (status === NodeStatus.SUCCESS) {
                this.haltChildren();
                this.current = 0;
                return NodeStatus.SUCCESS;
            }
            this.current++;
        }
        this.haltChildren();
        this.current = 0;
        return NodeStatus.FAILURE;
    }

    protected override halt(): void {
        this.current = 0;
        super.halt();
    }
}

/** Like Fallback, but re-evaluates earlier children on every tick. */
export class ReactiveFallback extends ControlNode {
    protected tick(): TickResult {
        this.setStatus(NodeStatus.RUNNING);
        for (let i = 0; i < this.childNodes.length; i++) {
            const status = this.childNodes[i].executeTick();
            if (status === PENDING) return status;
            if (status === NodeStatus.RUNNING) {
                this.haltChildren(i + 1);
                return status;
            }
            if (status === NodeStatus.SUCCESS) {
                this.haltChildren();
                return NodeStatus.SUCCESS;
            }
        }
        this.haltChildren();
        return NodeStatus.FAILURE;
    }
}

/** Ticks every unfinished child each tick. Succeeds once `success_threshold`
 *  children succeeded (-1: all of them), fails once `failure_threshold`
 *  children failed. */
export class Parallel extends ControlNode {
    protected tick(): TickResult {
        this.setStatus(NodeStatus.RUNNING);
        const count = this.childNodes.length;
        const successThreshold = this.threshold('success_threshold', -1, count);
        const failureThreshold = this.threshold('failure_threshold', 1, count);

        let successCount = 0;
        let failureCount = 0;
        for (const child of this.childNodes) {
            const status = isTerminal(child.status) ? child.status : child.executeTick();
            if (status === PENDING) return status;
            if (status === NodeStatus.SUCCESS) successCount++;
            if (status === NodeStatus.FAILURE) failureCount++;
        }

        if (successCount >= successThreshold) {
            this.haltChildren();
            return NodeStatus.SUCCESS;
        }
        if (failureCount >= failureThreshold || count - failureCount < successThreshold) {
            this.haltChildren();
            return NodeStatus.FAILURE;
        }
        return NodeStatus.RUNNING;
    }

    private threshold(portName: string, fallback: number, count: number): number {
        let value = fallback;
        if (this.readInput(portName) !== undefined) {
            const typed = readTypedInput(this, portName, 'int32');
            if (typeof typed === 'number') value = typed;
        }
        return value < 0 ? Math.max(count + value + 1, 0) : value;
    }
}

// ─── Decorator Nodes ──────────────────────────────────────────────────────────

/** Swaps SUCCESS and FAILURE. */
export class Inverter extends DecoratorNode {
    protected tick(): TickResult {
        this.setStatus(NodeStatus.RUNNING);
        const status = this.child.executeTick();
        if (status === NodeStatus.SUCCESS || status === NodeStatus.FAILURE) {
            this.child.reset();
            return status === NodeStatus.SUCCESS ? NodeStatus.FAILURE : NodeStatus.SUCCESS;
        }
        return status;
    }
}

/** Turns a finished child into SUCCESS. */
export class ForceSuccess extends DecoratorNode {
    protected tick(): TickResult {
        this.setStatus(NodeStatus.RUNNING);
        const status = this.child.executeTick();
        if (status === NodeStatus.SUCCESS || status === NodeStatus.FAILURE) {
            this.child.reset();
            return NodeStatus.SUCCESS;
        }
        return status;
    }
}

/** Turns a finished child into FAILURE. */
export class ForceFailure extends DecoratorNode {
    protected tick(): TickResult {
        this.setStatus(NodeStatus.RUNNING);
        const status = this.child.executeTick();
        if (status === NodeStatus.SUCCESS || status === NodeStatus.FAILURE) {
            this.child.reset();
            return NodeStatus.FAILURE;
        }
        return status;
    }
}

/** Repeats child `num_cycles` times, one completion per tick. Returns RUNNING
 *  while counting, SUCCESS after the last cycle, FAILURE if the child fails.
 *  Resets count after completion or failure. */
export class Repeat extends DecoratorNode {
    private count = 0;

    protected tick(): TickResult {
        this.setStatus(NodeStatus.RUNNING);
        const times = this.intParameter('num_cycles', 1);
        const status = this.child.executeTick();
        if (status === PENDING || status === NodeStatus.RUNNING) return status;

        this.child.reset();
        if (status === NodeStatus.FAILURE) {
            this.count = 0;
            return NodeStatus.FAILURE;
        }
        this.count++;
        if (times >= 0 && this.count >= times) {
            this.count = 0;
            return NodeStatus.SUCCESS;
        }
        return NodeStatus.RUNNING;
    }

    protected override halt(): void {
        this.count = 0;
        super.halt();
    }
}

/** Retries a failing child up to `num_attempts` times, one attempt per tick. */
export class RetryUntilSuccessful extends DecoratorNode {
    private attempts = 0;

    protected tick(): TickResult {
        this.setStatus(NodeStatus.RUNNING);
        const limit = this.intParameter('num_attempts', 1);
        const status = this.child.executeTick();
        if (status === PENDING || status === NodeStatus.RUNNING) return status;

        this.child.reset();
        if (status === NodeStatus.SUCCESS) {
            this.attempts = 0;
            return NodeStatus.SUCCESS;
        }
        this.attempts++;
        if (limit >= 0 && this.attempts >= limit) {
            this.attempts = 0;
            return NodeStatus.FAILURE;
        }
        return NodeStatus.RUNNING;
    }

    protected override halt(): void {
        this.attempts = 0;
        super.halt();
    }
}

/** Root of an included tree; passes its child's status through. */
export class SubtreeNode extends DecoratorNode {
    override readonly kind = 'Subtree';

    protected tick(): TickResult {
        this.setStatus(NodeStatus.RUNNING);
        return this.child.executeTick();
    }
}

// ─── Local Leaf Nodes ─────────────────────────────────────────────────────────

export class AlwaysSuccess extends LeafNode {
    readonly kind = 'Action';

    protected tick(): TickResult {
        return NodeStatus.SUCCESS;
    }
}

export class AlwaysFailure extends LeafNode {
    readonly kind = 'Action';

    protected tick(): TickResult {
        return NodeStatus.FAILURE;
    }
}
