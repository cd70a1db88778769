import { ClientUsageError, ConnectionError, GoalCancelledError } from '@/errors';
import { isJsonObject, type JsonObject } from '@/marshal/json-value';
import type { Connection } from './connection';
import {
    actionTopics,
    advertise,
    GOAL_ID_TYPE,
    parseIncoming,
    publish,
    statusGoalId,
    subscribe,
    unadvertise,
    unsubscribe,
    type ActionTopics,
} from './protocol';

export type FeedbackCallback = (feedback: JsonObject) => void;

/**
 * idle: no goal sent yet
 * active: goal sent, no result
 * done: result received (success or not is up to the caller)
 * cancelled: cancelGoal() before a result
 * failed: the connection broke before a result
 */
export type GoalState = 'idle' | 'active' | 'done' | 'cancelled' | 'failed';

interface Waiter {
    resolve: (result: JsonObject) => void;
    reject: (error: Error) => void;
}

let nextGoalId = 0;

/**
 * Goal/feedback/result client for one action server over rosbridge topics.
 * One goal at a time; the client owns its connection.
 */
export class ActionClient {
    private readonly topics: ActionTopics;
    private _state: GoalState = 'idle';
    private goalId: string | null = null;
    private result: JsonObject | null = null;
    private failure: Error | null = null;
    private waiters: Waiter[] = [];
    private feedbackCallback: FeedbackCallback | null = null;
    private advertised = false;
    private readonly unsubscribe: Array<() => void> = [];

    constructor(
        private readonly connection: Connection,
        public readonly serverName: string,
        /** Action type without the Goal suffix, e.g. `move_base_msgs/MoveBaseAction` */
        public readonly actionType: string,
    ) {
        this.topics = actionTopics(serverName);
        this.unsubscribe.push(
            connection.onMessage(message => this.handleMessage(message)),
            connection.onClose(error => {
                if (this._state === 'active') {
                    this.settle('failed', error ?? new ConnectionError('Connection closed', connection.address));
                }
            }),
        );
    }

    get state(): GoalState {
        return this._state;
    }

    registerFeedbackCallback(callback: FeedbackCallback): void {
        this.feedbackCallback = callback;
    }

    sendGoal(goal: JsonObject): void {
        if (this._state === 'active') {
            throw new ClientUsageError(`A goal on ${this.serverName} is already outstanding`);
        }
        if (!this.advertised) {
            this.connection.send(advertise(this.topics.goal, `${this.actionType}Goal`));
            this.connection.send(advertise(this.topics.cancel, GOAL_ID_TYPE));
            this.connection.send(subscribe(this.topics.feedback, `${this.actionType}Feedback`));
            this.connection.send(subscribe(this.topics.result, `${this.actionType}Result`));
            this.advertised = true;
        }

        this.goalId = `goal:${this.serverName}:${++nextGoalId}`;
        this.result = null;
        this.failure = null;
        this._state = 'active';
        this.connection.send(
            publish(this.topics.goal, {
                goal_id: { id: this.goalId, stamp: { secs: 0, nsecs: 0 } },
                goal,
            }),
        );
    }

    /** Resolves with `msg.result` of the current goal */
    waitForResult(): Promise<JsonObject> {
        switch (this._state) {
        case 'idle':
            return Promise.reject(new ClientUsageError(`No goal sent on ${this.serverName}`));
        case 'done':
            return Promise.resolve(this.result ?? {});
        case 'cancelled':
        case 'failed':
            return Promise.reject(this.failure ?? new GoalCancelledError(this.serverName));
        case 'active':
            return new Promise((resolve, reject) => {
                this.waiters.push({ resolve, reject });
            });
        }
    }

    /** Cancel the outstanding goal; nothing happens when idle or already finished */
    cancelGoal(): void {
        if (this._state !== 'active' || this.goalId === null) return;
        if (this.connection.isOpen) {
            this.connection.send(publish(this.topics.cancel, { id: this.goalId, stamp: { secs: 0, nsecs: 0 } }));
        }
        this.settle('cancelled', new GoalCancelledError(this.serverName));
    }

    dispose(): void {
        this.cancelGoal();
        for (const unsubscribeHandler of this.unsubscribe) unsubscribeHandler();
        this.unsubscribe.length = 0;
        if (this.advertised && this.connection.isOpen) {
            this.connection.send(unsubscribe(this.topics.feedback));
            this.connection.send(unsubscribe(this.topics.result));
            this.connection.send(unadvertise(this.topics.goal));
            this.connection.send(unadvertise(this.topics.cancel));
        }
        this.feedbackCallback = null;
        this.connection.close();
    }

    private handleMessage(raw: JsonObject): void {
        const message = parseIncoming(raw);
        if (message?.op !== 'publish' || this._state !== 'active') return;

        // Messages of other clients' goals share the topics
        const goalId = statusGoalId(message.msg);
        if (goalId !== null && goalId !== this.goalId) return;

        if (message.topic === this.topics.feedback) {
            const feedback = message.msg.feedback;
            if (isJsonObject(feedback)) this.feedbackCallback?.(feedback);
            return;
        }
        if (message.topic === this.topics.result) {
            const result = message.msg.result;
            this.result = isJsonObject(result) ? result : {};
            this.settle('done', null);
        }
    }

    private settle(state: 'done' | 'cancelled' | 'failed', error: Error | null): void {
        this._state = state;
        this.failure = error;
        const waiters = this.waiters;
        this.waiters = [];
        for (const waiter of waiters) {
            if (error) waiter.reject(error);
            else waiter.resolve(this.result ?? {});
        }
    }
}
