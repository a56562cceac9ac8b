import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'yaml';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
    BotConfig,
    CONFIG_FILE_NAME,
    ConfigManager,
    defaultConfig,
    isConfigKey,
    toConnectionConfig,
    toPolicyOptions
} from '../src/config/ConfigManager';
import { EventBus } from '../src/core/EventBus';

describe('ConfigManager', () => {
    let root: string;
    let dataHome: string;
    let cwd: string;
    let bus: EventBus;

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'botlink-config-'));
        dataHome = path.join(root, 'home');
        cwd = path.join(root, 'project');
        fs.mkdirSync(dataHome);
        fs.mkdirSync(cwd);
        bus = new EventBus();
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    const writeYaml = (dir: string, content: string, name = CONFIG_FILE_NAME) => {
        const file = path.join(dir, name);
        fs.writeFileSync(file, content);
        return file;
    };

    const managerWith = (env: NodeJS.ProcessEnv = {}, customPath?: string) =>
        new ConfigManager(customPath, { dataHome, cwd, env, bus });

    it('falls back to the defaults with no files', () => {
        const manager = managerWith();

        expect(manager.getAll()).toEqual(defaultConfig());
        expect(manager.getConfigPath()).toBe(path.join(dataHome, CONFIG_FILE_NAME));
    });

    it('layers environment, global and local settings', () => {
        writeYaml(dataHome, 'baudRate: 115200\nvoiceThreshold: 0.8\n');
        const local = writeYaml(cwd, 'baudRate: 57600\n');

        const manager = managerWith({ BOTLINK_SERIAL_PORT: '/dev/ttyUSB0', BOTLINK_BAUD_RATE: '19200' });

        expect(manager.get('baudRate')).toBe(57600);
        expect(manager.get('voiceThreshold')).toBe(0.8);
        expect(manager.get('serialPath')).toBe('/dev/ttyUSB0');
        expect(manager.getConfigPath()).toBe(local);
    });

    it('lets an explicit file override the others', () => {
        writeYaml(cwd, 'connectionKind: socket\nsocketPort: 9100\n');
        const custom = writeYaml(root, 'socketPort: 9200\n', 'robot.yaml');

        const manager = managerWith({}, custom);

        expect(manager.get('connectionKind')).toBe('socket');
        expect(manager.get('socketPort')).toBe(9200);
        expect(manager.getConfigPath()).toBe(custom);
    });

    it('ignores a layer that fails validation', () => {
        writeYaml(dataHome, 'baudRate: 115200\n');
        writeYaml(cwd, 'baudRate: fast\nvoiceThreshold: 0.9\n');

        const manager = managerWith();

        expect(manager.get('baudRate')).toBe(115200);
        expect(manager.get('voiceThreshold')).toBe(0.7);
    });

    it('ignores environment values that do not parse', () => {
        const manager = managerWith({ BOTLINK_CONNECTION_KIND: 'carrier-pigeon', BOTLINK_SOCKET_PORT: '70000' });

        expect(manager.get('connectionKind')).toBe('serial');
        expect(manager.get('socketPort')).toBe(9000);
    });

    it('persists a key and announces the change', () => {
        const changes: Array<[number, number]> = [];
        bus.on('config:changed', ({ oldConfig, newConfig }) => changes.push([oldConfig.voiceThreshold, newConfig.voiceThreshold]));
        const manager = managerWith();

        manager.set('voiceThreshold', 0.85);

        const saved: unknown = yaml.parse(fs.readFileSync(manager.getConfigPath(), 'utf8'));
        expect(saved).toMatchObject({ voiceThreshold: 0.85 });
        expect(changes).toEqual([[0.7, 0.85]]);
        expect(managerWith().get('voiceThreshold')).toBe(0.85);
    });

    it('rejects unknown keys and invalid values without changing anything', () => {
        const manager = managerWith();
        const before: BotConfig = manager.getAll();

        expect(() => manager.update({ turbo: true })).toThrow();
        expect(() => manager.update({ voiceThreshold: 1.5 })).toThrow();
        expect(() => manager.update({ monitorPort: -1 })).toThrow();
        expect(() => manager.update({ voiceCommandDurationMs: 2147483648 })).toThrow();
        expect(() => manager.update({ voiceMapping: { go: { command: 'F', durationMs: 2147483648 } } })).toThrow();

        expect(manager.getAll()).toEqual(before);
        expect(fs.existsSync(manager.getConfigPath())).toBe(false);
    });

    it('re-reads the file on reload', () => {
        const file = writeYaml(cwd, 'keyboardReleaseMs: 300\n');
        const manager = managerWith();
        const seen: number[] = [];
        bus.on('config:changed', ({ newConfig }) => seen.push(newConfig.keyboardReleaseMs));

        fs.writeFileSync(file, 'keyboardReleaseMs: 400\n');
        const reloaded = manager.reload();

        expect(reloaded.keyboardReleaseMs).toBe(400);
        expect(seen).toEqual([400]);
        manager.close();
    });
});

describe('config helpers', () => {
    it('recognizes configuration keys', () => {
        expect(isConfigKey('baudRate')).toBe(true);
        expect(isConfigKey('gestureMapping')).toBe(true);
        expect(isConfigKey('turbo')).toBe(false);
        expect(isConfigKey('toString')).toBe(false);
    });

    it('turns the flat configuration into a connection description', () => {
        const config = { ...defaultConfig(), connectionKind: 'socket' as const, socketHost: 'robot.local' };
        expect(toConnectionConfig(config)).toEqual({
            kind: 'socket',
            host: 'robot.local',
            port: 9000,
            connectTimeoutMs: 8000,
            writeTimeoutMs: 2000
        });

        expect(toConnectionConfig({ ...defaultConfig(), connectionKind: 'virtual', virtualLatencyMs: 5 })).toEqual({
            kind: 'virtual',
            latencyMs: 5,
            historyLimit: 1000
        });

        expect(toConnectionConfig(defaultConfig())).toMatchObject({ kind: 'serial', path: '/dev/rfcomm0', baudRate: 9600 });
    });

    it('builds policy options for each recognition source', () => {
        const voice = toPolicyOptions(defaultConfig(), 'voice');
        expect(voice).toMatchObject({ source: 'voice', threshold: 0.7, cooldownMs: 1000, defaultDurationMs: 3000 });
        expect(voice.mapping.get('2up')).toEqual({ command: 'X' });
        expect(voice.mapping.get('stop')).toEqual({ command: '!' });

        const gesture = toPolicyOptions({ ...defaultConfig(), gestureCooldownMs: 250 }, 'gesture');
        expect(gesture).toMatchObject({
            source: 'gesture',
            cooldownMs: 250,
            suppressRepeats: true,
            toggleDirectionOnStop: true
        });
        expect(Array.from(gesture.mapping.keys())).toEqual(['start', 'stop']);
    });
});
