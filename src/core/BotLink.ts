import { ActivityLog } from './ActivityLog';
import { CommandGateway } from './CommandGateway';
import { ConnectionManager } from './ConnectionManager';
import { EventBus, eventBus } from './EventBus';
import { InputModeCoordinator } from './InputModeCoordinator';
import { KeyboardController } from './KeyboardController';
import { Classifier, FrameSource, RecognitionLoop, RecognitionLoopOptions } from './RecognitionLoop';
import { RecognitionPolicy, buildMapping } from './RecognitionPolicy';
import { ConnectionConfig, RecognitionSource } from './types';
import { BotConfig, toConnectionConfig, toPolicyOptions } from '../config/ConfigManager';
import { MonitorServer } from '../gateway/MonitorServer';
import { CreateTransport } from '../transports/TransportFactory';
import { logger } from '../utils/logger';

export interface BotLinkOptions {
    bus?: EventBus;
    createTransport?: CreateTransport;
}

export interface StartOptions {
    /** Overrides the link derived from the configuration. */
    connection?: ConnectionConfig;
    monitor?: boolean;
}

/**
 * Wires one gateway, its producers and the optional monitor around a shared
 * event bus.
 */
export class BotLink {
    public readonly bus: EventBus;
    public readonly gateway: CommandGateway;
    public readonly connections: ConnectionManager;
    public readonly coordinator: InputModeCoordinator;
    public readonly keyboard: KeyboardController;
    public readonly activity: ActivityLog;

    private policies = new Map<RecognitionSource, RecognitionPolicy>();
    private monitor: MonitorServer | null = null;

    private readonly onConfigChanged = ({ newConfig }: { newConfig: BotConfig }) => {
        this.config = newConfig;
        this.policies.get('voice')?.setMapping(buildMapping(newConfig.voiceMapping));
        this.policies.get('gesture')?.setMapping(buildMapping(newConfig.gestureMapping));
    };

    constructor(private config: BotConfig, options: BotLinkOptions = {}) {
        this.bus = options.bus ?? eventBus;
        this.gateway = new CommandGateway({ bus: this.bus });
        this.connections = new ConnectionManager(this.gateway, {
            bus: this.bus,
            createTransport: options.createTransport,
            reconnectAttempts: config.reconnectAttempts,
            reconnectDelayMs: config.reconnectDelayMs
        });
        this.coordinator = new InputModeCoordinator(this.gateway, {
            keyboardDuringAutomaticModes: config.keyboardDuringAutomaticModes,
            stopOnSwitch: config.stopOnModeSwitch,
            bus: this.bus
        });
        this.keyboard = new KeyboardController(this.gateway, this.coordinator);
        this.activity = new ActivityLog({ bus: this.bus, historyLimit: config.activityHistoryLimit }).start();
        this.bus.on('config:changed', this.onConfigChanged);
    }

    public getPolicy(source: RecognitionSource): RecognitionPolicy | undefined {
        return this.policies.get(source);
    }

    public getMonitor(): MonitorServer | null {
        return this.monitor;
    }

    /** Builds the policy and loop for one recognizer and hands the loop to the coordinator. */
    public addRecognizer(
        source: RecognitionSource,
        frames: FrameSource,
        classifier: Classifier,
        loopOptions: RecognitionLoopOptions = {}
    ): RecognitionLoop {
        const policy = new RecognitionPolicy(this.gateway, { ...toPolicyOptions(this.config, source), bus: this.bus });
        const loop = new RecognitionLoop(policy, frames, classifier, loopOptions);
        this.policies.set(source, policy);
        this.coordinator.register(loop, policy);
        return loop;
    }

    public async start(options: StartOptions = {}): Promise<void> {
        await this.connections.connect(options.connection ?? toConnectionConfig(this.config));

        if (options.monitor ?? this.config.monitorEnabled) {
            this.monitor = new MonitorServer(
                {
                    gateway: this.gateway,
                    connections: this.connections,
                    coordinator: this.coordinator,
                    activity: this.activity,
                    bus: this.bus
                },
                { host: this.config.monitorHost, port: this.config.monitorPort }
            );
            await this.monitor.start();
        }
    }

    /** Stops every producer, sends a final emergency stop and closes the link. */
    public async shutdown(): Promise<void> {
        logger.info('BotLink: Shutting down...');
        await this.coordinator.shutdown();
        this.keyboard.reset();

        if (this.gateway.isConnected()) {
            const result = await this.gateway.emergencyStop('system');
            if (!result.ok) logger.warn(`BotLink: Final stop not sent (${result.error.message})`);
        }
        await this.connections.disconnect();

        if (this.monitor) {
            await this.monitor.stop();
            this.monitor = null;
        }
        this.activity.stop();
        this.connections.dispose();
        this.bus.off('config:changed', this.onConfigChanged);
    }
}
