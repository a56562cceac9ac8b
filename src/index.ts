export * from './core/Protocol';
export * from './core/types';
export { EventBus, eventBus } from './core/EventBus';
export type { BusEvents, BusEventName } from './core/EventBus';
export { ActuatorStateTracker } from './core/ActuatorStateTracker';
export { CommandGateway, GatewayError, describeRequest } from './core/CommandGateway';
export type { GatewayErrorCode, SubmitOutcome, SubmitResult } from './core/CommandGateway';
export { RecognitionPolicy, buildMapping } from './core/RecognitionPolicy';
export type {
    CommandSink,
    LabelMapping,
    MappingTemplate,
    PolicyDecision,
    PolicyState,
    RawMappingEntry,
    RecognitionPolicyOptions
} from './core/RecognitionPolicy';
export { RecognitionLoop } from './core/RecognitionLoop';
export type { CaptureLoop, Classifier, FrameSource, RecognitionLoopOptions } from './core/RecognitionLoop';
export { ScriptedClassifier, loadRecognitionScript } from './core/ScriptedClassifier';
export { InputModeCoordinator } from './core/InputModeCoordinator';
export type { KeyboardPolicy, InputModeCoordinatorOptions } from './core/InputModeCoordinator';
export { KeyboardController, DEFAULT_KEY_BINDINGS } from './core/KeyboardController';
export type { KeyBinding, KeyOutcome } from './core/KeyboardController';
export { ConnectionManager } from './core/ConnectionManager';
export { ActivityLog } from './core/ActivityLog';
export type { ActivityEntry, ActivityLevel } from './core/ActivityLog';
export { ErrorClassifier } from './core/ErrorClassifier';
export { BotLink } from './core/BotLink';
export {
    ConfigManager,
    BotConfigSchema,
    defaultConfig,
    toConnectionConfig,
    toPolicyOptions
} from './config/ConfigManager';
export type { BotConfig } from './config/ConfigManager';
export type { Transport } from './transports/ITransport';
export { ConnectionError, ConnErrorKind, WriteError, WriteErrorKind } from './transports/TransportErrors';
export { SerialTransport } from './transports/SerialTransport';
export { SocketTransport } from './transports/SocketTransport';
export { VirtualTransport } from './transports/VirtualTransport';
export { createTransportFactory, describeConnection } from './transports/TransportFactory';
export { MonitorServer } from './gateway/MonitorServer';
export { ErrorHandler } from './utils/ErrorHandler';
export { logger } from './utils/logger';
