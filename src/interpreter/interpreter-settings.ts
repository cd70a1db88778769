import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { reactive, toRaw, watch, type WatchStopHandle } from 'vue';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { isJsonObject } from '@/marshal/json-value';
import { LogHandler } from '@/utilities/log-handler';

const log = new LogHandler('InterpreterSettings');

/**
 * Interpreter settings schema - add new settings here and they will be
 * loaded from and saved to the settings file automatically.
 */
export interface InterpreterSettings {
    // Bridge endpoint
    hostname: string;
    port: number;

    // Loop
    tickIntervalMs: number;
    autorun: boolean;

    // Display
    /** Expand collapsed subtrees when a hidden node changes status */
    revealCollapsedChanges: boolean;
}

/** Default values for all settings */
const DEFAULT_SETTINGS: InterpreterSettings = {
    hostname: 'localhost',
    port: 9090,

    tickIntervalMs: 20,
    autorun: true,

    revealCollapsedChanges: false,
};

const SETTINGS_KEYS: readonly (keyof InterpreterSettings)[] = [
    'hostname',
    'port',
    'tickIntervalMs',
    'autorun',
    'revealCollapsedChanges',
];

const SAVE_DEBOUNCE_MS = 100;

function isValidPort(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value > 0 && value < 65536;
}

function isPositive(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

/** Keep only known keys whose values have the right type; warn about the rest */
export function mergeSettings(raw: unknown): InterpreterSettings {
    const settings = { ...DEFAULT_SETTINGS };
    if (raw === null || raw === undefined) return settings;
    if (!isJsonObject(raw)) {
        log.warn('Settings file does not contain a mapping; using defaults');
        return settings;
    }

    for (const [key, value] of Object.entries(raw)) {
        switch (key) {
        case 'hostname':
            if (typeof value === 'string' && value !== '') settings.hostname = value;
            else log.warn(`Ignoring invalid hostname ${JSON.stringify(value)}`);
            break;
        case 'port':
            if (isValidPort(value)) settings.port = value;
            else log.warn(`Ignoring invalid port ${JSON.stringify(value)}`);
            break;
        case 'tickIntervalMs':
            if (isPositive(value)) settings.tickIntervalMs = value;
            else log.warn(`Ignoring invalid tickIntervalMs ${JSON.stringify(value)}`);
            break;
        case 'autorun':
        case 'revealCollapsedChanges':
            if (typeof value === 'boolean') settings[key] = value;
            else log.warn(`Ignoring invalid ${key} ${JSON.stringify(value)}`);
            break;
        default:
            log.warn(`Ignoring unknown setting "${key}"`);
        }
    }
    return settings;
}

/** Load settings from a YAML file, merging with defaults */
export function loadSettings(filePath: string): InterpreterSettings {
    if (!existsSync(filePath)) return { ...DEFAULT_SETTINGS };
    try {
        return mergeSettings(parseYaml(readFileSync(filePath, 'utf8')));
    } catch (e) {
        log.warn(`Failed to load settings from ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
        return { ...DEFAULT_SETTINGS };
    }
}

/** Save settings to a YAML file */
export function saveSettings(filePath: string, settings: InterpreterSettings): void {
    try {
        writeFileSync(filePath, stringifyYaml({ ...toRaw(settings) }), 'utf8');
    } catch (e) {
        log.warn(`Failed to save settings to ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
    }
}

/**
 * Interpreter settings manager.
 * - Loads the settings file on construction (defaults when there is none)
 * - Saves the file again when any value changes (debounced)
 * - Exposes reactive state, so the session can watch individual values
 *
 * Without a file path the state is kept in memory only.
 */
export class InterpreterSettingsManager {
    public readonly state: InterpreterSettings;

    private saveTimeoutId: ReturnType<typeof setTimeout> | null = null;
    private readonly stopHandles: WatchStopHandle[] = [];

    constructor(private readonly filePath: string | null = null, overrides: Partial<InterpreterSettings> = {}) {
        const loaded = filePath ? loadSettings(filePath) : { ...DEFAULT_SETTINGS };
        this.state = reactive<InterpreterSettings>({ ...loaded, ...overrides });

        if (filePath) {
            this.setupAutoSave();
        }
    }

    /** Set up watchers to persist settings on change (debounced) */
    private setupAutoSave(): void {
        for (const key of SETTINGS_KEYS) {
            this.stopHandles.push(
                watch(
                    () => this.state[key],
                    () => this.debouncedSave(),
                    { flush: 'post' },
                ),
            );
        }
    }

    /** Debounced save to avoid excessive writes */
    private debouncedSave(): void {
        if (this.saveTimeoutId !== null) {
            clearTimeout(this.saveTimeoutId);
        }
        this.saveTimeoutId = setTimeout(() => {
            this.saveTimeoutId = null;
            this.flush();
        }, SAVE_DEBOUNCE_MS);
    }

    /** Write the current state now */
    public flush(): void {
        if (this.filePath) saveSettings(this.filePath, this.state);
    }

    /** Reset all settings to defaults */
    public resetToDefaults(): void {
        Object.assign(this.state, DEFAULT_SETTINGS);
    }

    /** Get a copy of the default settings */
    public getDefaults(): InterpreterSettings {
        return { ...DEFAULT_SETTINGS };
    }

    /** Stop watching; a pending save is written immediately */
    public dispose(): void {
        for (const stop of this.stopHandles) stop();
        this.stopHandles.length = 0;
        if (this.saveTimeoutId !== null) {
            clearTimeout(this.saveTimeoutId);
            this.saveTimeoutId = null;
            this.flush();
        }
    }
}
