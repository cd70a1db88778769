/**
 * Notifications meant for the person running the interpreter, as opposed to
 * log output. The session calls these when auto-run stops or the connection
 * breaks; the sink decides how to show them (console line in the CLI, a
 * dialog in a visual front end).
 *
 * Each source+message pair is throttled so a hot path cannot flood the sink.
 */

import { LogHandler } from '@/utilities/log-handler';

/** Minimum interval between identical notifications (ms) */
const THROTTLE_MS = 10_000;

export type NotificationLevel = 'error' | 'warn';

export interface UserNotification {
    level: NotificationLevel;
    source: string;
    message: string;
    /** How long a front end should keep it visible */
    timeoutMs: number;
}

export type NotificationSink = (notification: UserNotification) => void;

const log = new LogHandler('UserNotifier');

/** Default sink: notifications go to the log */
export const logNotificationSink: NotificationSink = ({ level, source, message }) => {
    if (level === 'error') log.error(`[${source}] ${message}`);
    else log.warn(`[${source}] ${message}`);
};

export class UserNotifier {
    /** Throttle state per unique key (key → last-show timestamp) */
    private readonly throttle = new Map<string, number>();

    constructor(
        private readonly sink: NotificationSink = logNotificationSink,
        private readonly throttleMs = THROTTLE_MS,
    ) {}

    /**
     * Show an error.  Throttled per source+message.
     */
    error(source: string, message: string): void {
        const key = `error:${source}:${message}`;
        if (this.isThrottled(key)) return;
        this.sink({ level: 'error', source, message, timeoutMs: 8000 });
    }

    /**
     * Show a warning.  Throttled per source+message.
     */
    warn(source: string, message: string): void {
        const key = `warn:${source}:${message}`;
        if (this.isThrottled(key)) return;
        this.sink({ level: 'warn', source, message, timeoutMs: 6000 });
    }

    /** Forget what was shown; the session calls this whenever it installs a tree */
    clearThrottle(): void {
        this.throttle.clear();
    }

    private isThrottled(key: string): boolean {
        const now = performance.now();
        this.prune(now);
        const last = this.throttle.get(key);
        if (last !== undefined && now - last < this.throttleMs) {
            return true;
        }
        this.throttle.set(key, now);
        return false;
    }

    /** Forget keys that can no longer throttle anything */
    private prune(now: number): void {
        for (const [key, time] of this.throttle) {
            if (now - time > this.throttleMs * 2) {
                this.throttle.delete(key);
            }
        }
    }
}
