import {
    ConnErrorKind,
    ConnectionError,
    WriteError,
    WriteErrorKind
} from '../transports/TransportErrors';

/**
 * Maps raw errors from `net`, `serialport` and its bindings onto the
 * transport error taxonomy.
 */
export class ErrorClassifier {
    public static classifyConnection(error: unknown, address: string): ConnectionError {
        if (error instanceof ConnectionError) return error;

        const code = this.codeOf(error);
        const errorMsg = this.messageOf(error).toLowerCase();

        if (this.isTimeout(code, errorMsg)) {
            return new ConnectionError(ConnErrorKind.TIMEOUT, `Timed out connecting to ${address}`, error);
        }

        if (this.isPermissionDenied(code, errorMsg)) {
            return new ConnectionError(ConnErrorKind.PERMISSION_DENIED, `Permission denied opening ${address}`, error);
        }

        if (this.isBusy(code, errorMsg)) {
            return new ConnectionError(ConnErrorKind.ALREADY_IN_USE, `${address} is already in use`, error);
        }

        if (this.isNotFound(code, errorMsg)) {
            return new ConnectionError(ConnErrorKind.NOT_FOUND, `${address} not found or not reachable`, error);
        }

        return new ConnectionError(
            ConnErrorKind.UNKNOWN,
            `Failed to open ${address}: ${this.messageOf(error) || 'unknown error'}`,
            error
        );
    }

    public static classifyWrite(error: unknown): WriteError {
        if (error instanceof WriteError) return error;

        const code = this.codeOf(error);
        const errorMsg = this.messageOf(error).toLowerCase();

        if (this.isTimeout(code, errorMsg)) {
            return new WriteError(WriteErrorKind.TIMEOUT, 'Write timed out', error);
        }

        if (errorMsg.includes('not open') || errorMsg.includes('port is not open')) {
            return new WriteError(WriteErrorKind.NOT_OPEN, 'Link is not open', error);
        }

        return new WriteError(
            WriteErrorKind.LINK_FAILURE,
            `Link failure: ${this.messageOf(error) || 'unknown error'}`,
            error
        );
    }

    private static isTimeout(code: string, msg: string): boolean {
        return code === 'ETIMEDOUT' ||
            msg.includes('timed out') ||
            msg.includes('timeout');
    }

    private static isPermissionDenied(code: string, msg: string): boolean {
        return code === 'EACCES' ||
            code === 'EPERM' ||
            msg.includes('permission denied') ||
            msg.includes('access denied');
    }

    private static isBusy(code: string, msg: string): boolean {
        return code === 'EBUSY' ||
            code === 'EADDRINUSE' ||
            msg.includes('resource busy') ||
            msg.includes('cannot lock port') ||
            msg.includes('already open');
    }

    private static isNotFound(code: string, msg: string): boolean {
        return code === 'ENOENT' ||
            code === 'ENOTFOUND' ||
            code === 'ECONNREFUSED' ||
            code === 'EHOSTUNREACH' ||
            msg.includes('no such file') ||
            msg.includes('does not exist') ||
            msg.includes('file not found');
    }

    private static codeOf(error: unknown): string {
        if (typeof error === 'object' && error !== null && 'code' in error) {
            const code = error.code;
            return typeof code === 'string' ? code : '';
        }
        return '';
    }

    private static messageOf(error: unknown): string {
        if (error instanceof Error) return error.message;
        return String(error ?? '');
    }
}
