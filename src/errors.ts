/**
 * Error types raised by the interpreter.
 *
 * MissingInputError ends the current activation of a leaf (reported as FAILURE).
 * UnsupportedTypeError is a configuration error and aborts the tick.
 * ConnectionError is reported to the session, which stops auto-run.
 */

/** A declared input port has no value bound to it */
export class MissingInputError extends Error {
    public override readonly name = 'MissingInputError';

    constructor(
        public readonly portName: string,
        public readonly nodeName: string,
        public readonly registrationId: string,
    ) {
        super(`Missing input port "${portName}" at ${registrationId}(${nodeName})`);
    }
}

/** A port declares a wire type that is neither a primitive nor a message type */
export class UnsupportedTypeError extends Error {
    public override readonly name = 'UnsupportedTypeError';

    constructor(
        public readonly typeName: string,
        public readonly portName: string,
        public readonly nodeName: string,
        public readonly registrationId: string,
    ) {
        super(`Invalid port type: ${typeName} for ${portName} at ${registrationId}(${nodeName})`);
    }
}

/** A literal or stored value cannot be represented as the port's wire type */
export class PortConversionError extends Error {
    public override readonly name = 'PortConversionError';

    constructor(
        public readonly portName: string,
        public readonly typeName: string,
        detail: string,
    ) {
        super(`Cannot convert port "${portName}" to ${typeName}: ${detail}`);
    }
}

/** The transport failed: refused, closed, or broken mid-call */
export class ConnectionError extends Error {
    public override readonly name = 'ConnectionError';

    constructor(message: string, public readonly address?: string) {
        super(message);
    }
}

/** The remote side answered, but reported the call itself as failed */
export class RemoteCallError extends Error {
    public override readonly name = 'RemoteCallError';

    constructor(public readonly target: string, detail: string) {
        super(`Call to ${target} failed: ${detail}`);
    }
}

/** A client method was called out of order (second goal, second call, wait before send) */
export class ClientUsageError extends Error {
    public override readonly name = 'ClientUsageError';
}

/** The outstanding goal was cancelled locally before a result arrived */
export class GoalCancelledError extends Error {
    public override readonly name = 'GoalCancelledError';

    constructor(public readonly serverName: string) {
        super(`Goal on ${serverName} was cancelled`);
    }
}

/** The tree document is malformed or references unknown nodes */
export class TreeLoadError extends Error {
    public override readonly name = 'TreeLoadError';
}
