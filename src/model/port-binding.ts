import type { PortModel } from './node-model';

/** A port is bound either to literal text or to a blackboard key */
export type PortBinding =
    | { kind: 'literal'; text: string }
    | { kind: 'reference'; key: string };

const BRACED_REFERENCE = /^\{(.*)\}$/;

/** Parse a mapping value: `$key` and `{key}` are references, anything else is literal */
export function parsePortBinding(raw: string): PortBinding {
    if (raw.startsWith('$')) {
        return { kind: 'reference', key: raw.slice(1) };
    }
    const braced = BRACED_REFERENCE.exec(raw);
    if (braced) {
        return { kind: 'reference', key: braced[1] };
    }
    return { kind: 'literal', text: raw };
}

/**
 * Binding of a port on one node instance. An empty mapping falls back to the
 * declared default; null when neither is set.
 */
export function resolvePortBinding(port: PortModel, mappingValue: string | undefined): PortBinding | null {
    const raw = mappingValue !== undefined && mappingValue !== '' ? mappingValue : port.defaultValue;
    if (raw === '') return null;
    return parsePortBinding(raw);
}
