/**
 * Wire types a port can declare. Primitive names follow the ROS message
 * built-ins; anything with a namespace separator ("geometry_msgs/Pose") is a
 * message type carried as nested JSON.
 */

export type IntegerWireType =
    | 'int8' | 'int16' | 'int32' | 'int64'
    | 'uint8' | 'uint16' | 'uint32' | 'uint64';

export type PrimitiveWireType = 'bool' | IntegerWireType | 'float32' | 'float64' | 'string';

export type WireType =
    | { kind: 'primitive'; name: PrimitiveWireType }
    | { kind: 'message'; name: string };

export const MESSAGE_NAMESPACE_SEPARATOR = '/';

interface IntegerRange {
    min: bigint;
    max: bigint;
    /** 64-bit values are kept as bigint, narrower ones as number */
    wide: boolean;
}

export const INTEGER_RANGES: Readonly<Record<IntegerWireType, IntegerRange>> = {
    int8: { min: -(2n ** 7n), max: 2n ** 7n - 1n, wide: false },
    int16: { min: -(2n ** 15n), max: 2n ** 15n - 1n, wide: false },
    int32: { min: -(2n ** 31n), max: 2n ** 31n - 1n, wide: false },
    int64: { min: -(2n ** 63n), max: 2n ** 63n - 1n, wide: true },
    uint8: { min: 0n, max: 2n ** 8n - 1n, wide: false },
    uint16: { min: 0n, max: 2n ** 16n - 1n, wide: false },
    uint32: { min: 0n, max: 2n ** 32n - 1n, wide: false },
    uint64: { min: 0n, max: 2n ** 64n - 1n, wide: true },
};

const PRIMITIVE_NAMES: ReadonlySet<string> = new Set<PrimitiveWireType>([
    'bool', 'string', 'float32', 'float64',
    'int8', 'int16', 'int32', 'int64',
    'uint8', 'uint16', 'uint32', 'uint64',
]);

function isPrimitiveName(name: string): name is PrimitiveWireType {
    return PRIMITIVE_NAMES.has(name);
}

export function isIntegerType(type: PrimitiveWireType): type is IntegerWireType {
    return type in INTEGER_RANGES;
}

/** Classify a declared type name; null when it is neither a primitive nor a message type */
export function parseWireType(typeName: string): WireType | null {
    const name = typeName.trim();
    if (name.includes(MESSAGE_NAMESPACE_SEPARATOR)) {
        return { kind: 'message', name };
    }
    if (isPrimitiveName(name)) {
        return { kind: 'primitive', name };
    }
    return null;
}
