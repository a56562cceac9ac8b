import fs from 'fs';
import yaml from 'yaml';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { MAX_DURATION_MS } from '../core/CommandGateway';
import { EventBus, eventBus } from '../core/EventBus';
import { RawMappingEntry, RecognitionPolicyOptions, buildMapping } from '../core/RecognitionPolicy';
import { ConnectionConfig, RecognitionSource } from '../core/types';

export const CONFIG_FILE_NAME = 'botlink.config.yaml';

const MappingEntrySchema = z.union([
    z.string().min(1),
    z.object({
        command: z.string().min(1),
        durationMs: z.number().int().positive().max(MAX_DURATION_MS).optional()
    })
]);

const MappingSchema = z.record(z.string(), MappingEntrySchema);

export const BotConfigSchema = z.object({
    connectionKind: z.enum(['serial', 'socket', 'virtual']),
    serialPath: z.string().min(1),
    baudRate: z.number().int().positive(),
    socketHost: z.string().min(1),
    socketPort: z.number().int().min(1).max(65535),
    connectTimeoutMs: z.number().int().positive(),
    writeTimeoutMs: z.number().int().positive(),
    virtualLatencyMs: z.number().int().nonnegative(),
    wireHistoryLimit: z.number().int().positive(),

    voiceThreshold: z.number().min(0).max(1),
    voiceCooldownMs: z.number().int().nonnegative(),
    voiceCommandDurationMs: z.number().int().positive().max(MAX_DURATION_MS),
    voiceMapping: MappingSchema,

    gestureThreshold: z.number().min(0).max(1),
    gestureCooldownMs: z.number().int().nonnegative(),
    gestureSuppressRepeats: z.boolean(),
    gestureToggleDirectionOnStop: z.boolean(),
    gestureMapping: MappingSchema,

    keyboardDuringAutomaticModes: z.enum(['suppressed', 'live']),
    keyboardReleaseMs: z.number().int().positive(),
    stopOnModeSwitch: z.boolean(),

    reconnectAttempts: z.number().int().min(1),
    reconnectDelayMs: z.number().int().nonnegative(),

    monitorEnabled: z.boolean(),
    monitorHost: z.string().min(1),
    monitorPort: z.number().int().min(0).max(65535),
    activityHistoryLimit: z.number().int().positive()
});

export type BotConfig = z.infer<typeof BotConfigSchema>;

const PartialConfigSchema = BotConfigSchema.partial();
type PartialConfig = z.infer<typeof PartialConfigSchema>;

export const DEFAULT_VOICE_MAPPING: Record<string, RawMappingEntry> = {
    forward: 'F',
    backward: 'B',
    left: 'L',
    right: 'R',
    up: 'Z',
    down: 'A',
    '2up': 'X',
    '2down': 'S',
    clockwise: 'C',
    anti: 'V',
    clap: 'Q',
    stop: '!'
};

export const DEFAULT_GESTURE_MAPPING: Record<string, RawMappingEntry> = {
    start: 'start',
    stop: 'stop'
};

export function defaultConfig(): BotConfig {
    return {
        connectionKind: 'serial',
        serialPath: '/dev/rfcomm0',
        baudRate: 9600,
        socketHost: '127.0.0.1',
        socketPort: 9000,
        connectTimeoutMs: 8000,
        writeTimeoutMs: 2000,
        virtualLatencyMs: 0,
        wireHistoryLimit: 1000,
        voiceThreshold: 0.7,
        voiceCooldownMs: 1000,
        voiceCommandDurationMs: 3000,
        voiceMapping: { ...DEFAULT_VOICE_MAPPING },
        gestureThreshold: 0.7,
        gestureCooldownMs: 1000,
        gestureSuppressRepeats: true,
        gestureToggleDirectionOnStop: true,
        gestureMapping: { ...DEFAULT_GESTURE_MAPPING },
        keyboardDuringAutomaticModes: 'suppressed',
        keyboardReleaseMs: 250,
        stopOnModeSwitch: true,
        reconnectAttempts: 3,
        reconnectDelayMs: 2000,
        monitorEnabled: false,
        monitorHost: '127.0.0.1',
        monitorPort: 3110,
        activityHistoryLimit: 500
    };
}

export interface ConfigManagerOptions {
    /** Directory for the global config file. Defaults to BOTLINK_DATA_DIR or ~/.botlink. */
    dataHome?: string;
    /** Directory searched for a local config file. Defaults to process.cwd(). */
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    /** Reload and emit `config:changed` when the file changes on disk. */
    watch?: boolean;
    bus?: EventBus;
}

export class ConfigManager {
    private configPath: string;
    private config: BotConfig;
    private readonly dataHome: string;
    private readonly cwd: string;
    private readonly env: NodeJS.ProcessEnv;
    private readonly bus: EventBus;
    private watcher: fs.FSWatcher | null = null;
    private debounceTimer: NodeJS.Timeout | null = null;

    constructor(private readonly customPath?: string, options: ConfigManagerOptions = {}) {
        this.env = options.env ?? process.env;
        this.bus = options.bus ?? eventBus;
        this.cwd = options.cwd ?? process.cwd();
        this.dataHome = options.dataHome ?? this.env.BOTLINK_DATA_DIR ?? path.join(os.homedir(), '.botlink');

        const envConfigPath = this.env.BOTLINK_CONFIG_PATH;
        const localPath = path.join(this.cwd, CONFIG_FILE_NAME);
        this.configPath = customPath
            ?? envConfigPath
            ?? (fs.existsSync(localPath) ? localPath : path.join(this.dataHome, CONFIG_FILE_NAME));

        this.config = this.loadConfig();
        if (options.watch) this.startWatcher();
    }

    public getConfigPath(): string {
        return this.configPath;
    }

    private startWatcher() {
        if (!fs.existsSync(this.configPath)) {
            logger.debug(`ConfigManager: ${this.configPath} does not exist yet, not watching`);
            return;
        }

        this.watcher = fs.watch(this.configPath, (eventType) => {
            if (eventType !== 'change') return;
            if (this.debounceTimer) clearTimeout(this.debounceTimer);
            this.debounceTimer = setTimeout(() => {
                this.debounceTimer = null;
                this.reload();
            }, 100);
        });
    }

    /** Re-reads every source and emits `config:changed`. */
    public reload(): BotConfig {
        logger.info('ConfigManager: Config file changed on disk, reloading...');
        const oldConfig = { ...this.config };
        this.config = this.loadConfig(true);
        this.bus.emit('config:changed', { oldConfig, newConfig: this.getAll() });
        return this.getAll();
    }

    public close() {
        if (this.debounceTimer) {
            clearTimeout(this.debounceTimer);
            this.debounceTimer = null;
        }
        if (this.watcher) {
            this.watcher.close();
            this.watcher = null;
        }
    }

    private readLayer(filePath: string, label: string): PartialConfig {
        if (!fs.existsSync(filePath)) return {};

        let raw: unknown;
        try {
            raw = yaml.parse(fs.readFileSync(filePath, 'utf8'));
        } catch (e) {
            logger.warn(`Error loading ${label} config from ${filePath}: ${e}`);
            return {};
        }
        if (raw === null || raw === undefined) return {};

        const parsed = PartialConfigSchema.safeParse(raw);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
            logger.warn(`ConfigManager: Ignoring invalid ${label} config ${filePath} (${issues})`);
            return {};
        }
        return parsed.data;
    }

    private readEnv(): PartialConfig {
        const env: PartialConfig = {};
        const kind = this.env.BOTLINK_CONNECTION_KIND;
        if (kind === 'serial' || kind === 'socket' || kind === 'virtual') env.connectionKind = kind;
        if (this.env.BOTLINK_SERIAL_PORT) env.serialPath = this.env.BOTLINK_SERIAL_PORT;
        if (this.env.BOTLINK_SOCKET_HOST) env.socketHost = this.env.BOTLINK_SOCKET_HOST;

        const baud = Number(this.env.BOTLINK_BAUD_RATE);
        if (Number.isInteger(baud) && baud > 0) env.baudRate = baud;
        const port = Number(this.env.BOTLINK_SOCKET_PORT);
        if (Number.isInteger(port) && port > 0 && port <= 65535) env.socketPort = port;

        return env;
    }

    private loadConfig(silent: boolean = false): BotConfig {
        const globalPath = path.join(this.dataHome, CONFIG_FILE_NAME);
        const localPath = path.join(this.cwd, CONFIG_FILE_NAME);

        const globalConfig = this.readLayer(globalPath, 'global');
        const localConfig = localPath !== globalPath ? this.readLayer(localPath, 'local') : {};
        const customConfig = this.customPath ? this.readLayer(this.customPath, 'custom') : {};

        if (!silent) logger.info(`ConfigManager: Config path set to ${this.configPath}`);

        // Env vars sit above the defaults and below anything a file sets.
        const merged = {
            ...defaultConfig(),
            ...this.readEnv(),
            ...globalConfig,
            ...localConfig,
            ...customConfig
        };

        const result = BotConfigSchema.safeParse(merged);
        if (!result.success) {
            logger.warn(`ConfigManager: Merged configuration invalid, using defaults (${result.error.message})`);
            return defaultConfig();
        }
        return result.data;
    }

    public get<K extends keyof BotConfig>(key: K): BotConfig[K] {
        return this.config[key];
    }

    /** Validates, stores and persists a single key. Throws on an invalid value. */
    public set<K extends keyof BotConfig>(key: K, value: BotConfig[K]) {
        this.update({ [key]: value });
        logger.info(`ConfigManager: Config key '${key}' updated and config:changed event emitted`);
    }

    /**
     * Merges a partial configuration of unknown shape (e.g. parsed from the
     * command line), saves it and emits `config:changed`. Unknown keys and
     * invalid values throw a ZodError and leave the configuration untouched.
     */
    public update(patch: unknown) {
        const parsed = PartialConfigSchema.strict().parse(patch);
        const oldConfig = { ...this.config };
        this.config = BotConfigSchema.parse({ ...this.config, ...parsed });
        this.saveConfig();
        this.bus.emit('config:changed', { oldConfig, newConfig: this.getAll() });
    }

    public saveConfig() {
        try {
            fs.mkdirSync(path.dirname(this.configPath), { recursive: true });
            fs.writeFileSync(this.configPath, yaml.stringify(this.config));
            logger.info(`Configuration saved to ${this.configPath}`);
        } catch (error) {
            logger.error(`Error saving config: ${error}`);
        }
    }

    public getAll(): BotConfig {
        return { ...this.config };
    }
}

export function isConfigKey(key: string): key is keyof BotConfig {
    return Object.prototype.hasOwnProperty.call(BotConfigSchema.shape, key);
}

export function toConnectionConfig(config: BotConfig): ConnectionConfig {
    switch (config.connectionKind) {
        case 'serial':
            return {
                kind: 'serial',
                path: config.serialPath,
                baudRate: config.baudRate,
                connectTimeoutMs: config.connectTimeoutMs,
                writeTimeoutMs: config.writeTimeoutMs
            };
        case 'socket':
            return {
                kind: 'socket',
                host: config.socketHost,
                port: config.socketPort,
                connectTimeoutMs: config.connectTimeoutMs,
                writeTimeoutMs: config.writeTimeoutMs
            };
        case 'virtual':
            return {
                kind: 'virtual',
                latencyMs: config.virtualLatencyMs,
                historyLimit: config.wireHistoryLimit
            };
    }
}

export function toPolicyOptions(config: BotConfig, source: RecognitionSource): RecognitionPolicyOptions {
    if (source === 'voice') {
        return {
            source,
            mapping: buildMapping(config.voiceMapping),
            threshold: config.voiceThreshold,
            cooldownMs: config.voiceCooldownMs,
            defaultDurationMs: config.voiceCommandDurationMs
        };
    }
    return {
        source,
        mapping: buildMapping(config.gestureMapping),
        threshold: config.gestureThreshold,
        cooldownMs: config.gestureCooldownMs,
        suppressRepeats: config.gestureSuppressRepeats,
        toggleDirectionOnStop: config.gestureToggleDirectionOnStop
    };
}
