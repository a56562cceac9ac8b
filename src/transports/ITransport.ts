import type { CommandChar } from '../core/Protocol';
import type { ConnectionKind } from '../core/types';

export interface Transport {
    readonly kind: ConnectionKind;
    /** Human-readable target, e.g. `/dev/rfcomm0` or `192.168.4.1:8080`. */
    readonly address: string;
    /** Resolves once the link is usable. Rejects with `ConnectionError`. */
    open(): Promise<void>;
    /** Sends one byte. Rejects with `WriteError`. */
    write(char: CommandChar): Promise<void>;
    /** Idempotent. */
    close(): Promise<void>;
    isOpen(): boolean;
    lastError(): Error | null;
    /**
     * Called when the link drops without `close()` being asked for.
     * Transports never reconnect on their own.
     */
    onUnexpectedClose(listener: (reason: string) => void): void;
}
