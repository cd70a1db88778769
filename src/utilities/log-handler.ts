import { LogManager, LogType } from './log-manager';

/**
 * Logger of one module (`InterpreterSession`) or one node instance
 * (`RemoteActionNode[move]`). Every entry lands in the shared LogManager.
 */
export class LogHandler {
    private static manager = new LogManager();

    constructor(private readonly source: string) {}

    public error(msg: string, exception?: Error): void {
        this.push(LogType.Error, msg, exception);
    }

    public warn(msg: string): void {
        this.push(LogType.Warn, msg);
    }

    public info(msg: string): void {
        this.push(LogType.Info, msg);
    }

    /** Objects such as goal or feedback payloads are passed through unformatted */
    public debug(msg: string | object): void {
        this.push(LogType.Debug, msg);
    }

    public scoped(instance: string): LogHandler {
        return new LogHandler(`${this.source}[${instance}]`);
    }

    public static getLogManager(): LogManager {
        return this.manager;
    }

    private push(type: LogType, msg: string | object, exception?: Error): void {
        LogHandler.manager.push({ type, source: this.source, msg, exception });
    }
}

/** Wrap a caught value so it can be handed to LogHandler.error */
export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
