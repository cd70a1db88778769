/**
 * rosbridge v2 message shapes used by the clients.
 *
 * Outgoing ops are built by the helpers below; incoming messages are narrowed
 * from parsed JSON by `parseIncoming`, which drops anything the clients do
 * not consume.
 */

import { isJsonObject, type JsonObject, type JsonValue } from '@/marshal/json-value';

// ─── Outgoing ─────────────────────────────────────────────────────────────────

export type OutgoingMessage =
    | { op: 'advertise'; topic: string; type: string }
    | { op: 'unadvertise'; topic: string }
    | { op: 'subscribe'; topic: string; type?: string }
    | { op: 'unsubscribe'; topic: string }
    | { op: 'publish'; topic: string; msg: JsonObject }
    | { op: 'call_service'; id: string; service: string; args: JsonObject };

export function advertise(topic: string, type: string): OutgoingMessage {
    return { op: 'advertise', topic, type };
}

export function unadvertise(topic: string): OutgoingMessage {
    return { op: 'unadvertise', topic };
}

export function subscribe(topic: string, type?: string): OutgoingMessage {
    return type === undefined ? { op: 'subscribe', topic } : { op: 'subscribe', topic, type };
}

export function unsubscribe(topic: string): OutgoingMessage {
    return { op: 'unsubscribe', topic };
}

export function publish(topic: string, msg: JsonObject): OutgoingMessage {
    return { op: 'publish', topic, msg };
}

export function callService(id: string, service: string, args: JsonObject): OutgoingMessage {
    return { op: 'call_service', id, service, args };
}

// ─── Incoming ─────────────────────────────────────────────────────────────────

export type IncomingMessage =
    | { op: 'publish'; topic: string; msg: JsonObject }
    | { op: 'service_response'; id: string; service: string; values: JsonValue; result: boolean }
    | { op: 'status'; level: string; msg: string };

/** Narrow a parsed message to one the clients understand, or null */
export function parseIncoming(message: JsonObject): IncomingMessage | null {
    switch (message.op) {
    case 'publish': {
        const { topic, msg } = message;
        if (typeof topic !== 'string' || !isJsonObject(msg)) return null;
        return { op: 'publish', topic, msg };
    }
    case 'service_response': {
        const { id, service, values, result } = message;
        if (typeof service !== 'string') return null;
        return {
            op: 'service_response',
            id: typeof id === 'string' ? id : '',
            service,
            values: values ?? null,
            // rosbridge omits `result` on older servers; absence means success
            result: result !== false,
        };
    }
    case 'status': {
        const { level, msg } = message;
        return {
            op: 'status',
            level: typeof level === 'string' ? level : 'info',
            msg: typeof msg === 'string' ? msg : '',
        };
    }
    default:
        return null;
    }
}

// ─── Action topics ────────────────────────────────────────────────────────────

export interface ActionTopics {
    goal: string;
    cancel: string;
    feedback: string;
    result: string;
}

export function actionTopics(serverName: string): ActionTopics {
    return {
        goal: `${serverName}/goal`,
        cancel: `${serverName}/cancel`,
        feedback: `${serverName}/feedback`,
        result: `${serverName}/result`,
    };
}

/** Goal ID carried in `msg.status.goal_id.id` of feedback and result messages */
export function statusGoalId(msg: JsonObject): string | null {
    const status = msg.status;
    if (!isJsonObject(status)) return null;
    const goalId = status.goal_id;
    if (!isJsonObject(goalId)) return null;
    return typeof goalId.id === 'string' ? goalId.id : null;
}

export const GOAL_ID_TYPE = 'actionlib_msgs/GoalID';

/** Field of a feedback message naming the port it updates; the value sits under that port's name */
export const UPDATE_FIELD_NAME = 'update_field_name';
