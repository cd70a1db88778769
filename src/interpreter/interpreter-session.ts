import { readFile } from 'node:fs/promises';
import { watch, type WatchStopHandle } from 'vue';
import { NodeStatus, PENDING, statusName, type TickResult, type TreeNode } from '@/engine/behavior-tree';
import type { BehaviorTree } from '@/engine/tree';
import { BehaviorTreeFactory } from '@/engine/tree-factory';
import { ConnectionError } from '@/errors';
import type { LeafContext } from '@/leaves/leaf-context';
import { registerRemoteLeaves } from '@/leaves/register-remote-leaves';
import { RemoteActionNode } from '@/leaves/remote-action-node';
import { RemoteConditionNode } from '@/leaves/remote-condition-node';
import type { JsonObject } from '@/marshal/json-value';
import { isLeafModel } from '@/model/node-model';
import { parseTreeDocument, type TreeDocument } from '@/model/tree-document';
import { FlatVisualTree, type VisualTree } from '@/model/visual-tree';
import { TopicTypeResolver, type ActionTypeResolver } from '@/remote/action-type-resolver';
import { RosbridgeClientFactory, type RemoteClientFactory } from '@/remote/client-factory';
import { formatAddress, type Connection, type Connector } from '@/remote/connection';
import { connectWebSocket } from '@/remote/websocket-connection';
import { LogHandler, toError } from '@/utilities/log-handler';
import { EventBus, type InterpreterEvents } from './event-bus';
import { revealCollapsedChanges, toRuntimeIndices, toVisualIndices, type StatusChange } from './index-translator';
import { InterpreterSettingsManager, type InterpreterSettings } from './interpreter-settings';
import { ManualExecutor, ManualFeedbackTarget } from './manual-execution';
import { RemoteEventQueue } from './remote-event-queue';
import { captureStatuses, dedupeChanges, diffStatuses, synchronizeStatuses } from './status-synchronizer';
import { UserNotifier } from './user-notifications';

/** Where status batches for the visual layer go */
export interface StatusSink {
    /**
     * Apply a batch in visual indices. A returned promise keeps the session
     * from ticking again until it settles.
     */
    applyNodeStatus(treeName: string, changes: readonly StatusChange[], resetBeforeApplying: boolean): void | Promise<void>;
    /** Return every row of the tree to its unstyled look */
    resetTreeStyle?(treeName: string): void;
}

export interface InterpreterSessionOptions {
    sink: StatusSink;
    /** Defaults to in-memory default settings */
    settings?: InterpreterSettings;
    /** Used for the connection probe and, unless `clients` is given, for every remote client */
    connector?: Connector;
    clients?: RemoteClientFactory;
    actionTypes?: ActionTypeResolver;
    notifier?: UserNotifier;
    events?: EventBus<InterpreterEvents>;
    /** Visual tree of a loaded document; defaults to a FlatVisualTree */
    createVisualTree?: (document: TreeDocument, treeId: string) => VisualTree;
}

type RemoteLeaf = RemoteActionNode | RemoteConditionNode;

function isRemoteLeaf(node: TreeNode): node is RemoteLeaf {
    return node instanceof RemoteActionNode || node instanceof RemoteConditionNode;
}

function sameStatuses(a: readonly NodeStatus[], b: readonly NodeStatus[]): boolean {
    return a.length === b.length && a.every((status, i) => status === b[i]);
}

interface LoadedTree {
    document: TreeDocument;
    treeId: string;
    runtime: BehaviorTree;
    visual: VisualTree;
    remoteLeaves: RemoteLeaf[];
}

/**
 * Owns one runtime tree and drives it: a timer ticks it while auto-run is
 * on, remote results are applied between ticks, and every tick's status
 * changes are forwarded to the visual layer.
 *
 * Auto-run only ticks while there is an unresolved change: the last tick
 * moved the tree forward, a remote result or feedback arrived, or the user
 * did something. A tree that settled (SUCCESS or FAILURE) or that waits on
 * remote work is left alone until one of those happens.
 */
export class InterpreterSession {
    private static log = new LogHandler('InterpreterSession');

    public readonly events: EventBus<InterpreterEvents>;
    public readonly settings: InterpreterSettings;

    private readonly sink: StatusSink;
    private readonly connector: Connector;
    private readonly notifier: UserNotifier;
    private readonly queue = new RemoteEventQueue();
    private readonly leafContext: LeafContext;
    private readonly executor: ManualExecutor;
    private readonly createVisualTree: (document: TreeDocument, treeId: string) => VisualTree;

    private loaded: LoadedTree | null = null;
    private _rootStatus = NodeStatus.IDLE;
    /** Statuses the visual layer shows, in runtime indices */
    private displayed: NodeStatus[] = [];
    private updated = true;
    private autorun: boolean;
    private applying = 0;

    private timer: ReturnType<typeof setInterval> | null = null;
    private readonly stopIntervalWatch: WatchStopHandle;

    private monitor: Connection | null = null;
    private connecting: Promise<boolean> | null = null;

    constructor(options: InterpreterSessionOptions) {
        this.sink = options.sink;
        this.settings = options.settings ?? new InterpreterSettingsManager().state;
        this.connector = options.connector ?? connectWebSocket;
        this.notifier = options.notifier ?? new UserNotifier();
        this.events = options.events ?? new EventBus<InterpreterEvents>();
        this.createVisualTree = options.createVisualTree
            ?? ((document, treeId) => FlatVisualTree.fromDocument(document, { treeId }));

        const clients = options.clients
            ?? new RosbridgeClientFactory(() => ({ hostname: this.settings.hostname, port: this.settings.port }), this.connector);
        const actionTypes = options.actionTypes ?? new TopicTypeResolver(clients);
        this.leafContext = { clients, actionTypes, events: this.queue };
        this.executor = new ManualExecutor(clients, actionTypes, this.queue);
        this.autorun = this.settings.autorun;

        this.stopIntervalWatch = watch(
            () => this.settings.tickIntervalMs,
            () => {
                if (this.timer === null) return;
                this.stopTimer();
                this.startTimer();
            },
        );
    }

    // ─── State ────────────────────────────────────────────────────────────────

    get treeName(): string | null {
        return this.loaded?.treeId ?? null;
    }

    get runtimeTree(): BehaviorTree | null {
        return this.loaded?.runtime ?? null;
    }

    get visualTree(): VisualTree | null {
        return this.loaded?.visual ?? null;
    }

    get rootStatus(): NodeStatus {
        return this._rootStatus;
    }

    get isAutoRunEnabled(): boolean {
        return this.autorun;
    }

    get isConnected(): boolean {
        return this.monitor !== null;
    }

    /** Whether the next auto-run step will tick */
    get hasUnresolvedChange(): boolean {
        return this.updated;
    }

    /** Remote events posted but not yet applied */
    get pendingEventCount(): number {
        return this.queue.size;
    }

    // ─── Lifecycle ────────────────────────────────────────────────────────────

    /** Load a tree document from XML text; `treeId` defaults to its main tree */
    loadTree(xml: string, treeId?: string): void {
        const document = parseTreeDocument(xml);
        const id = treeId ?? document.mainTreeId;
        this.install(document, id, this.createVisualTree(document, id));
        InterpreterSession.log.info(`Loaded tree "${id}" (${this.loaded?.runtime.nodes.length ?? 0} nodes)`);
        this.events.emit('tree:loaded', { treeName: id, nodeCount: this.loaded?.runtime.nodes.length ?? 0 });
    }

    async loadTreeFromFile(filePath: string, treeId?: string): Promise<void> {
        const xml = await readFile(filePath, 'utf8');
        this.loadTree(xml, treeId);
    }

    /** Rebuild the runtime tree with every node IDLE and a fresh blackboard */
    reset(): void {
        const loaded = this.loaded;
        if (!loaded) return;
        this.install(loaded.document, loaded.treeId, loaded.visual);
        this.sink.resetTreeStyle?.(loaded.treeId);
        this.events.emit('tree:reset', { treeName: loaded.treeId });
    }

    dispose(): void {
        this.stopTimer();
        this.stopIntervalWatch();
        this.teardownTree();
        this.disconnect();
    }

    private install(document: TreeDocument, treeId: string, visual: VisualTree): void {
        this.teardownTree();

        const factory = new BehaviorTreeFactory();
        registerRemoteLeaves(factory, document.models.values(), this.leafContext);
        const runtime = factory.createTree(document, treeId);

        this.loaded = {
            document,
            treeId,
            runtime,
            visual,
            remoteLeaves: runtime.nodes.filter(isRemoteLeaf),
        };
        this._rootStatus = NodeStatus.IDLE;
        this.displayed = captureStatuses(runtime, NodeStatus.IDLE);
        this.updated = true;
        this.notifier.clearThrottle();
        if (this.autorun) this.startTimer();
    }

    private teardownTree(): void {
        if (!this.loaded) return;
        this.loaded.runtime.haltTree();
        this.loaded = null;
        this.queue.clear();
    }

    // ─── Ticking ──────────────────────────────────────────────────────────────

    /** Apply pending remote events, tick once and forward the changes. Errors propagate. */
    tickOnce(): TickResult | null {
        const loaded = this.loaded;
        if (!loaded) return null;
        this.drainEvents(loaded);

        const before = this.displayed;
        const result = loaded.runtime.tickRoot();
        if (result !== PENDING) this._rootStatus = result;

        const changes = diffStatuses(before, loaded.runtime, this._rootStatus, result === PENDING);
        this.displayed = captureStatuses(loaded.runtime, this._rootStatus);

        const progressed = !sameStatuses(before, this.displayed);
        const awaitingRemote = loaded.remoteLeaves.some(leaf => leaf.isAwaitingRemote);
        this.updated = result === NodeStatus.RUNNING && (progressed || !awaitingRemote);

        const visualChanges = this.deliver(loaded, changes, false);
        InterpreterSession.log.debug(`tick → ${statusName(result)}, ${visualChanges.length} change(s)`);
        this.events.emit('tree:ticked', { treeName: loaded.treeId, result, changes: visualChanges });
        return result;
    }

    /** Manual tick: errors are reported instead of thrown */
    runTree(): TickResult | null {
        try {
            return this.tickOnce();
        } catch (e) {
            const err = toError(e);
            InterpreterSession.log.error('Error running tree', err);
            this.notifier.error('Error Running Tree', err.message);
            return null;
        }
    }

    /** One auto-run step; called by the timer */
    runStep(): void {
        const loaded = this.loaded;
        if (!loaded) return;
        this.drainEvents(loaded);
        if (!this.updated || !this.autorun || this.applying > 0) return;

        try {
            this.tickOnce();
        } catch (e) {
            const err = toError(e);
            this.disableAutoRun();
            InterpreterSession.log.error('Error during auto-run tick', err);
            this.notifier.error('InterpreterSession', err.message);
        }
    }

    enableAutoRun(): void {
        this.updated = true;
        if (this.autorun) return;
        this.autorun = true;
        this.settings.autorun = true;
        this.startTimer();
        this.events.emit('autorun:changed', { enabled: true });
    }

    disableAutoRun(): void {
        this.stopTimer();
        if (!this.autorun) return;
        this.autorun = false;
        this.settings.autorun = false;
        this.events.emit('autorun:changed', { enabled: false });
    }

    private startTimer(): void {
        if (this.timer !== null || !this.loaded) return;
        this.timer = setInterval(() => this.runStep(), this.settings.tickIntervalMs);
    }

    private stopTimer(): void {
        if (this.timer === null) return;
        clearInterval(this.timer);
        this.timer = null;
    }

    private drainEvents(loaded: LoadedTree): void {
        for (const event of this.queue.drain()) {
            switch (event.kind) {
            case 'leaf:result': {
                const leaf = loaded.remoteLeaves.find(l => l === event.target);
                if (!leaf || !leaf.completeActivation(event.activation, event.status)) continue;
                this.updated = true;
                this.events.emit('leaf:completed', {
                    name: leaf.name,
                    registrationId: leaf.registrationId,
                    runtimeIndex: loaded.runtime.indexOf(leaf),
                    status: event.status,
                });
                break;
            }
            case 'leaf:feedback': {
                if (event.target instanceof ManualFeedbackTarget) {
                    this.applyManualFeedback(loaded, event.target, event.activation, event.feedback);
                    continue;
                }
                const leaf = loaded.remoteLeaves.find(l => l === event.target);
                if (!leaf || !event.target.applyFeedback(event.activation, event.feedback)) continue;
                this.updated = true;
                this.events.emit('leaf:feedback', {
                    name: leaf.name,
                    runtimeIndex: loaded.runtime.indexOf(leaf),
                    feedback: event.feedback,
                });
                break;
            }
            case 'connection:error':
                this.handleConnectionError(event.source, event.error);
                break;
            }
        }
    }

    private applyManualFeedback(loaded: LoadedTree, target: ManualFeedbackTarget, activation: number, feedback: JsonObject): void {
        // Feedback of a run against a tree that has since been replaced
        if (target.store !== loaded.runtime.blackboard) return;
        if (!target.applyFeedback(activation, feedback)) return;
        this.updated = true;
        this.events.emit('leaf:feedback', { name: target.name, runtimeIndex: target.runtimeIndex, feedback });
    }

    // ─── Visual layer ─────────────────────────────────────────────────────────

    /** Runtime changes → visual batch → sink. Returns the batch. */
    private deliver(loaded: LoadedTree, changes: readonly StatusChange[], resetBeforeApplying: boolean): StatusChange[] {
        const visualChanges = synchronizeStatuses(changes, loaded.visual, {
            revealCollapsed: this.settings.revealCollapsedChanges,
        });
        this.applyToSink(loaded, visualChanges, resetBeforeApplying);
        return visualChanges;
    }

    private applyToSink(loaded: LoadedTree, changes: readonly StatusChange[], resetBeforeApplying: boolean): void {
        if (changes.length === 0) return;
        const applied = this.sink.applyNodeStatus(loaded.treeId, changes, resetBeforeApplying);
        if (!(applied instanceof Promise)) return;

        this.applying++;
        applied
            .catch((e: unknown) => InterpreterSession.log.error('Status sink failed', toError(e)))
            .finally(() => {
                this.applying--;
            });
    }

    // ─── Manual execution and overrides ───────────────────────────────────────

    /**
     * Run the leaf of one visual row against the remote side and show its
     * result. Resolves to null when the row is not a leaf or could not run.
     */
    async executeNode(visualIndex: number): Promise<NodeStatus | null> {
        const loaded = this.loaded;
        if (!loaded) return null;
        const node = loaded.visual.nodes()[visualIndex];
        if (!node) {
            throw new RangeError(`No visual row ${visualIndex}`);
        }
        if (!isLeafModel(node.model)) return null;
        if (!this.isConnected) {
            this.notifier.warn('InterpreterSession', 'Connect before executing nodes');
            return null;
        }

        // The leaf's own call gives way so the instance never has two calls in flight
        const [{ index: runtimeIndex }] = toRuntimeIndices([{ index: visualIndex, status: NodeStatus.RUNNING }], loaded.visual);
        const runtimeNode = loaded.runtime.nodeAt(runtimeIndex);
        const heldLeaf = runtimeNode && isRemoteLeaf(runtimeNode) ? runtimeNode : null;
        heldLeaf?.holdForManualRun();

        let status: NodeStatus | null;
        try {
            status = await this.executor.execute(node, loaded.runtime.blackboard, runtimeIndex);
        } catch (e) {
            if (e instanceof ConnectionError) {
                this.handleConnectionError(node.instanceName, e);
            } else {
                const err = toError(e);
                InterpreterSession.log.error(`Executing ${node.instanceName} failed`, err);
                this.notifier.error(node.instanceName, err.message);
            }
            return null;
        } finally {
            heldLeaf?.releaseManualHold();
        }
        // The tree was reset or replaced while the call ran
        if (status === null || this.loaded !== loaded) return status;

        this.applyOverrides(loaded, [{ index: visualIndex, status }]);
        return status;
    }

    /** Execute every selected row, one after the other */
    async executeSelection(visualIndices: readonly number[]): Promise<void> {
        for (const index of visualIndices) {
            await this.executeNode(index);
        }
        this.updated = true;
    }

    /**
     * Execute every leaf that is RUNNING in the runtime tree. Collapsed
     * subtrees that hide one are expanded first so each leaf has its own row.
     */
    async executeRunning(): Promise<void> {
        const loaded = this.loaded;
        if (!loaded) return;
        const running = this.runningChanges(loaded, NodeStatus.RUNNING);
        revealCollapsedChanges(running, loaded.visual);
        const rows = new Set(toVisualIndices(running, loaded.visual).map(change => change.index));
        await this.executeSelection([...rows]);
    }

    /** Force a status onto selected rows and the runtime nodes behind them */
    setSelectedStatus(visualIndices: readonly number[], status: NodeStatus): void {
        const loaded = this.loaded;
        if (!loaded) return;
        this.applyOverrides(loaded, visualIndices.map(index => ({ index, status })));
    }

    /** Force a status onto every RUNNING runtime node */
    setRunningStatus(status: NodeStatus): void {
        const loaded = this.loaded;
        if (!loaded) return;
        const changes = this.runningChanges(loaded, status);
        for (const { index } of changes) {
            loaded.runtime.nodeAt(index)?.overrideStatus(status);
        }
        this.deliver(loaded, changes, true);
        this.displayed = captureStatuses(loaded.runtime, this._rootStatus);
        this.updated = true;
    }

    private applyOverrides(loaded: LoadedTree, visualChanges: readonly StatusChange[]): void {
        this.applyToSink(loaded, dedupeChanges(visualChanges), true);
        for (const change of toRuntimeIndices(visualChanges, loaded.visual)) {
            loaded.runtime.nodeAt(change.index)?.overrideStatus(change.status);
        }
        this.displayed = captureStatuses(loaded.runtime, this._rootStatus);
        this.updated = true;
    }

    private runningChanges(loaded: LoadedTree, status: NodeStatus): StatusChange[] {
        const changes: StatusChange[] = [];
        loaded.runtime.nodes.forEach((node, position) => {
            if (node.status === NodeStatus.RUNNING) changes.push({ index: position + 1, status });
        });
        return changes;
    }

    // ─── Connection ───────────────────────────────────────────────────────────

    /** Open a connection to the configured bridge and keep it as a liveness probe */
    connect(): Promise<boolean> {
        if (this.monitor) return Promise.resolve(true);
        if (!this.connecting) {
            this.connecting = this.openMonitor().finally(() => {
                this.connecting = null;
            });
        }
        return this.connecting;
    }

    disconnect(): void {
        const monitor = this.monitor;
        this.monitor = null;
        monitor?.close();
    }

    private async openMonitor(): Promise<boolean> {
        const { hostname, port } = this.settings;
        let connection: Connection;
        try {
            connection = await this.connector(hostname, port);
        } catch (e) {
            const error = e instanceof ConnectionError
                ? e
                : new ConnectionError(toError(e).message, formatAddress(hostname, port));
            this.handleConnectionError('Connection', error);
            return false;
        }

        this.monitor = connection;
        connection.onClose(error => {
            if (this.monitor !== connection) return;
            this.monitor = null;
            this.handleConnectionError('Connection', error ?? new ConnectionError('Connection closed.', connection.address));
        });
        InterpreterSession.log.info(`Connected to ${connection.address}`);
        this.events.emit('connection:opened', { address: connection.address });
        return true;
    }

    private handleConnectionError(source: string, error: ConnectionError): void {
        this.disconnect();
        this.disableAutoRun();
        InterpreterSession.log.error(`Connection error (${source})`, error);
        this.notifier.error('Connection Error', error.message);
        this.events.emit('connection:error', { source, message: error.message });
    }
}
