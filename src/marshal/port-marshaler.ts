/**
 * Port Marshaler: moves typed port values in and out of untyped JSON.
 *
 * Reading a port yields its typed value (literal text converted by the
 * declared wire type, or a stored blackboard value coerced to it). Writing a
 * port coerces a JSON value to the wire type first. Message types (any name
 * with a namespace separator) are opaque nested JSON.
 */

import { MissingInputError, PortConversionError, UnsupportedTypeError } from '@/errors';
import { isPayloadPort, type NodeModel, type PortModels } from '@/model/node-model';
import { resolvePortBinding } from '@/model/port-binding';
import { cloneJson, isJsonValue, type JsonObject, type JsonValue, type PortValue } from './json-value';
import {
    INTEGER_RANGES,
    isIntegerType,
    parseWireType,
    type IntegerWireType,
    type PrimitiveWireType,
    type WireType,
} from './wire-types';

/** Where an input's value comes from */
export type InputSource =
    | { kind: 'literal'; text: string }
    | { kind: 'stored'; value: PortValue };

/** What the marshaler needs from a node: its identity, its declared ports, and port access */
export interface PortHost {
    readonly name: string;
    readonly registrationId: string;
    readonly ports: PortModels;
    /** undefined when the port is unset (no binding, or a reference to an empty key) */
    readInput(portName: string): InputSource | undefined;
    writeOutput(portName: string, value: PortValue): void;
}

/** Minimal store contract used for bindings outside the runtime tree */
export interface ValueStore {
    get(key: string): PortValue | undefined;
    set(key: string, value: PortValue): void;
}

const INTEGER_LITERAL = /^[+-]?\d+$/;

function resolveWireType(host: PortHost, portName: string, typeName: string): WireType {
    const type = parseWireType(typeName);
    if (!type) {
        throw new UnsupportedTypeError(typeName, portName, host.name, host.registrationId);
    }
    return type;
}

function toInteger(big: bigint, type: IntegerWireType, portName: string): number | bigint {
    const range = INTEGER_RANGES[type];
    if (big < range.min || big > range.max) {
        throw new PortConversionError(portName, type, `${big} is out of range`);
    }
    return range.wide ? big : Number(big);
}

function convertPrimitiveLiteral(text: string, type: PrimitiveWireType, portName: string): PortValue {
    if (isIntegerType(type)) {
        const trimmed = text.trim();
        if (!INTEGER_LITERAL.test(trimmed)) {
            throw new PortConversionError(portName, type, `"${text}" is not an integer`);
        }
        return toInteger(BigInt(trimmed), type, portName);
    }
    switch (type) {
    case 'bool': {
        const lowered = text.trim().toLowerCase();
        if (lowered === 'true' || lowered === '1') return true;
        if (lowered === 'false' || lowered === '0') return false;
        throw new PortConversionError(portName, type, `"${text}" is not a boolean`);
    }
    case 'float32':
    case 'float64': {
        const trimmed = text.trim();
        const value = Number(trimmed);
        if (trimmed === '' || !Number.isFinite(value)) {
            throw new PortConversionError(portName, type, `"${text}" is not a number`);
        }
        return value;
    }
    case 'string':
        return text;
    }
}

/** Convert literal text from a tree document to the typed value of `type` */
export function convertLiteral(text: string, type: WireType, portName: string): PortValue {
    if (type.kind === 'message') {
        let parsed: unknown;
        try {
            parsed = JSON.parse(text);
        } catch {
            throw new PortConversionError(portName, type.name, 'literal is not valid JSON');
        }
        if (!isJsonValue(parsed)) {
            throw new PortConversionError(portName, type.name, 'literal is not a JSON value');
        }
        return parsed;
    }
    return convertPrimitiveLiteral(text, type.name, portName);
}

/** Coerce a stored or received value to the typed value of `type` */
export function coerceValue(value: PortValue, type: WireType, portName: string): PortValue {
    if (type.kind === 'message') {
        if (typeof value === 'bigint') {
            throw new PortConversionError(portName, type.name, 'expected a message, got an integer');
        }
        return cloneJson(value);
    }

    const name = type.name;
    // Values stored as text (e.g. by a string output) convert like literals
    if (typeof value === 'string' && name !== 'string') {
        return convertPrimitiveLiteral(value, name, portName);
    }

    if (isIntegerType(name)) {
        if (typeof value === 'bigint') return toInteger(value, name, portName);
        if (typeof value === 'number' && Number.isInteger(value)) return toInteger(BigInt(value), name, portName);
        throw new PortConversionError(portName, name, `expected an integer, got ${JSON.stringify(value)}`);
    }
    switch (name) {
    case 'bool':
        if (typeof value === 'boolean') return value;
        break;
    case 'float32':
    case 'float64':
        if (typeof value === 'number') return value;
        if (typeof value === 'bigint') return Number(value);
        break;
    case 'string':
        if (typeof value === 'string') return value;
        break;
    }
    const shown = typeof value === 'bigint' ? value.toString() : JSON.stringify(value);
    throw new PortConversionError(portName, name, `unexpected value ${shown}`);
}

/** Typed value to its wire form; 64-bit integers outside the safe range travel as decimal text */
export function toWireValue(value: PortValue): JsonValue {
    if (typeof value === 'bigint') {
        const asNumber = Number(value);
        return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
    }
    return value;
}

/** Read the typed value of an input port */
export function readTypedInput(host: PortHost, portName: string, typeName: string): PortValue {
    const type = resolveWireType(host, portName, typeName);
    const source = host.readInput(portName);
    if (source === undefined) {
        throw new MissingInputError(portName, host.name, host.registrationId);
    }
    return source.kind === 'literal'
        ? convertLiteral(source.text, type, portName)
        : coerceValue(source.value, type, portName);
}

/** String value of a port naming the remote endpoint; the port must be declared */
export function readAddress(host: PortHost, portName: string): string {
    if (!host.ports.has(portName)) {
        throw new MissingInputError(portName, host.name, host.registrationId);
    }
    return String(readTypedInput(host, portName, 'string'));
}

/** encode(node, port, type): typed input → generic value */
export function encodePort(host: PortHost, portName: string, typeName: string): JsonValue {
    return toWireValue(readTypedInput(host, portName, typeName));
}

/** decode(node, port, type, value): generic value → typed output */
export function decodePort(host: PortHost, portName: string, typeName: string, value: JsonValue): void {
    const type = resolveWireType(host, portName, typeName);
    host.writeOutput(portName, coerceValue(value, type, portName));
}

/** Goal or request payload: every non-output port except the ones naming the endpoint */
export function buildRequestFromPorts(host: PortHost): JsonObject {
    const request: JsonObject = {};
    for (const port of host.ports.values()) {
        if (!isPayloadPort(port)) continue;
        request[port.name] = encodePort(host, port.name, port.typeName);
    }
    return request;
}

/**
 * Ports of a node described only by its model and bindings (a visual-tree
 * row), with references resolved against a store instead of a blackboard.
 */
export class BindingPortHost implements PortHost {
    public readonly registrationId: string;
    public readonly ports: PortModels;

    constructor(
        model: NodeModel,
        private readonly mapping: ReadonlyMap<string, string>,
        private readonly store: ValueStore,
        public readonly name: string,
    ) {
        this.registrationId = model.registrationId;
        this.ports = model.ports;
    }

    public readInput(portName: string): InputSource | undefined {
        const port = this.ports.get(portName);
        if (!port) return undefined;
        const binding = resolvePortBinding(port, this.mapping.get(portName));
        if (binding === null) return undefined;
        if (binding.kind === 'literal') return { kind: 'literal', text: binding.text };
        const value = this.store.get(binding.key);
        return value === undefined ? undefined : { kind: 'stored', value };
    }

    /** Outputs of a visual node only land somewhere when bound to a reference */
    public writeOutput(portName: string, value: PortValue): void {
        const port = this.ports.get(portName);
        if (!port) return;
        const binding = resolvePortBinding(port, this.mapping.get(portName));
        if (binding?.kind === 'reference') {
            this.store.set(binding.key, value);
        }
    }

    /** Store key the port is bound to, if it is a reference */
    public referenceKey(portName: string): string | null {
        const port = this.ports.get(portName);
        if (!port) return null;
        const binding = resolvePortBinding(port, this.mapping.get(portName));
        return binding?.kind === 'reference' ? binding.key : null;
    }
}

/** Build a request from a visual node's bindings against the shared store */
export function buildRequestFromBindings(
    model: NodeModel,
    mapping: ReadonlyMap<string, string>,
    store: ValueStore,
    nodeName = model.registrationId,
): JsonObject {
    return buildRequestFromPorts(new BindingPortHost(model, mapping, store, nodeName));
}
