import { LogHandler } from './log-handler';

interface Window {
    openedAt: number;
    suppressed: number;
}

/**
 * Logger for feedback streams. An action server may publish feedback many
 * times a second, and a field that fails to convert fails on every message.
 * Each key (by default the message text) logs once per `throttleMs`; the next
 * entry after a window carries the number of repeats it swallowed.
 */
export class ThrottledLogger {
    private readonly windows = new Map<string, Window>();

    constructor(
        private readonly log: LogHandler,
        private readonly throttleMs: number
    ) {}

    /** Returns true when the entry was written */
    error(message: string, error: Error, key = message): boolean {
        const text = this.admit(key, message);
        if (text === null) return false;
        this.log.error(text, error);
        return true;
    }

    warn(message: string, key = message): boolean {
        const text = this.admit(key, message);
        if (text === null) return false;
        this.log.warn(text);
        return true;
    }

    /** Number of keys with an open window */
    get size(): number {
        return this.windows.size;
    }

    private admit(key: string, message: string): string | null {
        const now = performance.now();
        const window = this.windows.get(key);
        if (window && now - window.openedAt < this.throttleMs) {
            window.suppressed++;
            return null;
        }

        const repeats = window?.suppressed ?? 0;
        this.windows.set(key, { openedAt: now, suppressed: 0 });
        return repeats > 0 ? `${message} (repeated ${repeats}x)` : message;
    }
}
