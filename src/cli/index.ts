#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import dotenv from 'dotenv';
import yaml from 'yaml';
import path from 'path';
import os from 'os';
import readline from 'readline';
import { logger } from '../utils/logger';
import { BotConfig, ConfigManager, isConfigKey, toConnectionConfig } from '../config/ConfigManager';
import { BotLink } from '../core/BotLink';
import { DEFAULT_KEY_BINDINGS } from '../core/KeyboardController';
import { decode } from '../core/Protocol';
import { ScriptedClassifier, loadRecognitionScript } from '../core/ScriptedClassifier';
import { ConnectionConfig, RecognitionSource } from '../core/types';
import { SerialTransport } from '../transports/SerialTransport';
import { describeConnection } from '../transports/TransportFactory';
import { VirtualTransport } from '../transports/VirtualTransport';

dotenv.config({ path: path.join(os.homedir(), '.botlink', '.env') }); // Global .env

process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled Promise rejection (non-fatal): ${reason}`);
});

/** Auto-repeat usually starts later than it then repeats. */
const INITIAL_REPEAT_DELAY_MS = 550;

interface LinkOptions {
    config?: string;
    virtual?: boolean;
    serial?: string;
    baud?: number;
    socket?: string;
}

interface RunOptions extends LinkOptions {
    monitor?: boolean;
    voiceScript?: string;
    gestureScript?: string;
}

interface ReplayOptions {
    config?: string;
    wait: boolean;
}

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

export function resolveConnection(options: LinkOptions, config: BotConfig): ConnectionConfig {
    if (options.virtual) {
        return toConnectionConfig({ ...config, connectionKind: 'virtual' });
    }
    if (options.socket) {
        const match = /^(.+):(\d+)$/.exec(options.socket);
        const port = match ? Number(match[2]) : NaN;
        if (!match || port < 1 || port > 65535) {
            throw new Error(`Invalid --socket value "${options.socket}" (expected host:port)`);
        }
        return toConnectionConfig({ ...config, connectionKind: 'socket', socketHost: match[1], socketPort: port });
    }
    if (options.serial || options.baud) {
        return toConnectionConfig({
            ...config,
            connectionKind: 'serial',
            serialPath: options.serial ?? config.serialPath,
            baudRate: options.baud ?? config.baudRate
        });
    }
    return toConnectionConfig(config);
}

function withLinkOptions(command: Command): Command {
    return command
        .option('-c, --config <path>', 'Path to a botlink.config.yaml')
        .option('--virtual', 'Use the in-memory virtual link')
        .option('--serial <path>', 'Serial device, e.g. /dev/rfcomm0 or COM5')
        .option('--baud <n>', 'Serial baud rate', parsePositiveInt)
        .option('--socket <host:port>', 'TCP bridge address');
}

function waitUntil(condition: () => boolean, intervalMs: number = 50): Promise<void> {
    return new Promise(resolve => {
        const check = () => {
            if (condition()) return resolve();
            setTimeout(check, intervalMs);
        };
        check();
    });
}

function printWireLog(link: BotLink) {
    const transport = link.connections.getTransport();
    if (!(transport instanceof VirtualTransport)) return;
    console.log('--- Wire log ---');
    for (const record of transport.getHistory()) {
        console.log(`${record.timestamp}  ${record.char}`);
    }
    console.log('----------------');
}

function printBindings() {
    console.log('Keys:');
    for (const [key, binding] of DEFAULT_KEY_BINDINGS) {
        const label = binding.kind === 'command'
            ? `${binding.target} ${binding.action}`
            : binding.kind === 'mode' ? `toggle ${binding.mode} mode` : 'EMERGENCY STOP';
        console.log(`  ${key.padEnd(7)} ${label}`);
    }
    console.log('  ctrl+c  quit');
}

const program = new Command();

program
    .name('botlink')
    .description('Keyboard, voice and gesture control for a serial-linked robot')
    .version('1.0.0');

withLinkOptions(
    program
        .command('run')
        .description('Interactive keyboard session')
        .option('--monitor', 'Start the monitor server')
        .option('--voice-script <file>', 'Scripted voice recognizer (YAML)')
        .option('--gesture-script <file>', 'Scripted gesture recognizer (YAML)')
).action(async (options: RunOptions) => {
    const configManager = new ConfigManager(options.config, { watch: true });
    const config = configManager.getAll();
    const link = new BotLink(config);

    const scripts: Array<[RecognitionSource, string | undefined]> = [
        ['voice', options.voiceScript],
        ['gesture', options.gestureScript]
    ];
    for (const [source, file] of scripts) {
        if (!file) continue;
        const script = loadRecognitionScript(file);
        const scripted = new ScriptedClassifier(script.events);
        link.addRecognizer(source, scripted, scripted);
    }

    const connection = resolveConnection(options, config);
    console.log(`Connecting: ${describeConnection(connection)}`);
    try {
        await link.start({ connection, monitor: options.monitor });
    } catch (error) {
        console.error(`Connection failed: ${error instanceof Error ? error.message : error}`);
        configManager.close();
        await link.shutdown();
        process.exit(1);
    }

    printBindings();

    const releaseMs = config.keyboardReleaseMs;
    const held = new Map<string, NodeJS.Timeout>();
    const report = (error: unknown) => logger.error(`Keyboard: ${error}`);

    const quit = async () => {
        held.forEach(timer => clearTimeout(timer));
        held.clear();
        if (process.stdin.isTTY) process.stdin.setRawMode(false);
        process.stdin.pause();
        configManager.close();
        await link.shutdown();
        process.exit(0);
    };

    readline.emitKeypressEvents(process.stdin);
    if (process.stdin.isTTY) process.stdin.setRawMode(true);
    process.stdin.on('keypress', (str: string | undefined, key: readline.Key | undefined) => {
        if (key?.ctrl && key.name === 'c') {
            quit().catch(report);
            return;
        }
        const name = key?.name ?? str;
        if (!name || !link.keyboard.bindingFor(name)) return;

        // Terminals report presses only; a key counts as released once its
        // auto-repeat stops arriving.
        const pending = held.get(name);
        if (pending) {
            clearTimeout(pending);
        } else {
            link.keyboard.press(name).catch(report);
        }
        held.set(name, setTimeout(() => {
            held.delete(name);
            link.keyboard.release(name).catch(report);
        }, pending ? releaseMs : Math.max(releaseMs, INITIAL_REPEAT_DELAY_MS)));
    });
    process.stdin.resume();
});

program
    .command('ports')
    .description('List serial ports')
    .action(async () => {
        const ports = await SerialTransport.listPorts();
        if (ports.length === 0) {
            console.log('No serial ports found.');
            return;
        }
        for (const port of ports) {
            console.log(port.manufacturer ? `${port.path}  (${port.manufacturer})` : port.path);
        }
    });

withLinkOptions(
    program
        .command('send')
        .description('Send a sequence of command characters, e.g. "F" or "ZZ!"')
        .argument('<chars>', 'Command characters')
).action(async (chars: string, options: LinkOptions) => {
    const configManager = new ConfigManager(options.config);
    const config = configManager.getAll();
    const link = new BotLink(config);

    try {
        await link.start({ connection: resolveConnection(options, config), monitor: false });
    } catch (error) {
        console.error(`Connection failed: ${error instanceof Error ? error.message : error}`);
        await link.shutdown();
        process.exitCode = 1;
        return;
    }

    for (const char of chars) {
        const entry = decode(char);
        if (!entry) {
            console.error(`Skipping unknown command '${char}'`);
            continue;
        }
        const result = entry.group === null
            ? await link.gateway.emergencyStop('remote')
            : await link.gateway.submit({ producer: 'remote', target: entry.group, action: entry.action });
        console.log(result.ok
            ? `${char}: ${result.outcome} [${result.written.join(' ')}]`
            : `${char}: ${result.error.code} - ${result.error.message}`);
    }

    printWireLog(link);
    await link.shutdown();
});

program
    .command('replay')
    .description('Feed scripted recognition events through a policy on a virtual link')
    .argument('<file>', 'Recognition script (YAML)')
    .option('-c, --config <path>', 'Path to a botlink.config.yaml')
    .option('--no-wait', 'Do not wait for pending timed stops')
    .action(async (file: string, options: ReplayOptions) => {
        const script = loadRecognitionScript(file);
        const config = new ConfigManager(options.config).getAll();
        const link = new BotLink(config);

        const scripted = new ScriptedClassifier(script.events);
        const loop = link.addRecognizer(script.source, scripted, scripted, { intervalMs: 20, idleDelayMs: 10 });

        await link.start({ connection: toConnectionConfig({ ...config, connectionKind: 'virtual' }), monitor: false });
        await loop.start();
        await waitUntil(() => scripted.isExhausted());
        await loop.stop();
        await link.gateway.idle();
        if (options.wait) {
            await waitUntil(() => link.gateway.pendingDeferredStops().length === 0);
            await link.gateway.idle();
        }

        printWireLog(link);
        await link.shutdown();
    });

const configCommand = program
    .command('config')
    .description('Show or change configuration');

configCommand
    .command('show')
    .option('-c, --config <path>', 'Path to a botlink.config.yaml')
    .action((options: { config?: string }) => {
        const manager = new ConfigManager(options.config);
        console.log(`# ${manager.getConfigPath()}`);
        console.log(yaml.stringify(manager.getAll()));
    });

configCommand
    .command('get <key>')
    .option('-c, --config <path>', 'Path to a botlink.config.yaml')
    .action((key: string, options: { config?: string }) => {
        if (!isConfigKey(key)) {
            console.error(`Unknown configuration key: ${key}`);
            process.exitCode = 1;
            return;
        }
        const value = new ConfigManager(options.config).get(key);
        console.log(`${key}: ${typeof value === 'object' ? JSON.stringify(value) : value}`);
    });

configCommand
    .command('set <key> <value>')
    .option('-c, --config <path>', 'Path to a botlink.config.yaml')
    .action((key: string, value: string, options: { config?: string }) => {
        if (!isConfigKey(key)) {
            console.error(`Unknown configuration key: ${key}`);
            process.exitCode = 1;
            return;
        }
        try {
            new ConfigManager(options.config).update({ [key]: yaml.parse(value) });
            console.log(`Configuration updated: ${key} = ${value}`);
        } catch (error) {
            console.error(`Invalid value for ${key}: ${error instanceof Error ? error.message : error}`);
            process.exitCode = 1;
        }
    });

if (require.main === module) {
    program.parseAsync(process.argv).catch((error: unknown) => {
        logger.error(`botlink: ${error instanceof Error ? error.message : error}`);
        process.exitCode = 1;
    });
}
