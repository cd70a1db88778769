export enum LogType {
    Error,
    Debug,
    Warn,
    Info
}

export interface ILogMessage {
    type: LogType;
    source: string;
    msg: string | object;
    exception?: Error;
    index?: number;
}

export type LogMessageCallback = ((msg: ILogMessage) => void);

/** Minimum interval between identical log messages (in ms) */
const LOG_THROTTLE_MS = 1000;

/** Number of messages kept for late listeners */
const LOG_HISTORY_SIZE = 100;

/**
 * Patterns that indicate async boundaries where we should truncate the stack.
 * Timer and promise frames below the first boundary are scheduler noise.
 */
const ASYNC_BOUNDARY_PATTERNS = [
    /processTicksAndRejections/,
    /listOnTimeout/,
    /setTimeout/,
    /setInterval/,
    /Promise\.then/,
    /async function/,
];

/**
 * Clean up stack traces by truncating at the first async boundary
 * (timer callbacks, promise jobs).
 * @param stack The stack trace string
 * @returns Cleaned stack trace
 */
function cleanStackTrace(stack: string): string {
    const lines = stack.split('\n');
    const result: string[] = [];

    for (const line of lines) {
        const trimmed = line.trim();

        if (ASYNC_BOUNDARY_PATTERNS.some(p => p.test(trimmed))) {
            // Keep the first async boundary for context, truncate the rest
            result.push(line);
            result.push('    ... (async stack truncated)');
            break;
        }

        result.push(line);
    }

    return result.join('\n');
}

export class LogManager {
    public log: ILogMessage[] = [];
    private logMsgCount = 0;
    private listener: LogMessageCallback | null = null;

    /** Throttle state: source+msg -> { lastTime, suppressedCount } */
    private throttleState = new Map<string, { lastTime: number; suppressedCount: number }>();

    /** When false, messages are kept and forwarded but not written to the console */
    public consoleEnabled = true;

    public onLogMessage(callback: LogMessageCallback | null): void {
        this.listener = callback;

        if (!callback) {
            return;
        }

        // send old messages
        for (const msg of this.log) {
            callback(msg);
        }
    }

    /** Drop the kept history and throttle state */
    public clear(): void {
        this.log = [];
        this.throttleState.clear();
    }

    public push(msg: ILogMessage): void {
        msg.index = this.logMsgCount++;

        // save message to log
        this.log.push(msg);
        if (this.log.length > LOG_HISTORY_SIZE) {
            this.log.shift();
        }

        // publish to listener
        if (this.listener) {
            this.listener(msg);
        }

        if (!this.consoleEnabled) {
            return;
        }

        // Check throttle for console output
        const msgStr = typeof msg.msg === 'string' ? msg.msg : JSON.stringify(msg.msg);
        const throttleKey = `${msg.source}:${msg.type}:${msgStr}`;
        const now = performance.now();
        const state = this.throttleState.get(throttleKey);

        if (state && now - state.lastTime < LOG_THROTTLE_MS) {
            // Throttled - just count
            state.suppressedCount++;
            return;
        }

        const suppressedNote = state && state.suppressedCount > 0
            ? ` (${state.suppressedCount} similar suppressed)`
            : '';

        // Reset or create throttle state
        this.throttleState.set(throttleKey, { lastTime: now, suppressedCount: 0 });

        if (typeof msg.msg !== 'string') {
            console.dir(msg.msg);
            return;
        }

        // Build the complete message including exception details in one console call
        let formatted = msg.source + '\t' + msg.msg + suppressedNote;

        if (msg.exception) {
            formatted += '\n' + msg.exception.message;
            if (msg.exception.stack) {
                formatted += '\n' + cleanStackTrace(msg.exception.stack);
            }
        }

        switch (msg.type) {
        case LogType.Error:
            console.error(formatted);
            break;
        case LogType.Warn:
            console.warn(formatted);
            break;
        case LogType.Info:
            console.info(formatted);
            break;
        case LogType.Debug:
            console.log(formatted);
            break;
        }
    }
}
