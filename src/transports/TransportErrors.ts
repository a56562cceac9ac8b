export enum ConnErrorKind {
    NOT_FOUND = 'not_found',
    PERMISSION_DENIED = 'permission_denied',
    TIMEOUT = 'timeout',
    ALREADY_IN_USE = 'already_in_use',
    UNKNOWN = 'unknown'
}

export enum WriteErrorKind {
    TIMEOUT = 'timeout',
    LINK_FAILURE = 'link_failure',
    NOT_OPEN = 'not_open'
}

/** Raised by `Transport.open` when the link cannot be established. */
export class ConnectionError extends Error {
    public readonly kind: ConnErrorKind;

    constructor(kind: ConnErrorKind, message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'ConnectionError';
        this.kind = kind;
    }
}

/** Raised by `Transport.write`; the device's true state is unknown afterwards. */
export class WriteError extends Error {
    public readonly kind: WriteErrorKind;

    constructor(kind: WriteErrorKind, message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'WriteError';
        this.kind = kind;
    }
}
