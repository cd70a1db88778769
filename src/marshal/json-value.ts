/** Generic tree-structured value carried on the wire */
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
    [key: string]: JsonValue;
}

/** Value held by a port or a blackboard entry: anything JSON, plus bigint for 64-bit integers */
export type PortValue = JsonValue | bigint;

export function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Narrow an untyped parse result (e.g. from JSON.parse) to a JSON value */
export function isJsonValue(value: unknown): value is JsonValue {
    switch (typeof value) {
    case 'string':
    case 'boolean':
        return true;
    case 'number':
        return Number.isFinite(value);
    case 'object':
        if (value === null) return true;
        if (Array.isArray(value)) return value.every(isJsonValue);
        return Object.values(value).every(isJsonValue);
    default:
        return false;
    }
}

/** Parse text and require a JSON object at the top level */
export function parseJsonObject(text: string): JsonObject | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch {
        return null;
    }
    return isJsonObject(parsed) && isJsonValue(parsed) ? parsed : null;
}

/** Structural copy so stored values are not shared with the message they came from */
export function cloneJson<T extends JsonValue>(value: T): T {
    return structuredClone(value);
}
