// AGI error taxonomy
export enum AgiErrorCode {
    TRANSPORT = 'TRANSPORT',
    PARSE = 'PARSE',
    TIMEOUT = 'TIMEOUT',
    STATUS = 'STATUS',
    BIND = 'BIND',
    ACCEPT = 'ACCEPT',
}

export interface AgiErrorOptions {
    cause?: unknown;
    status?: number;
    raw?: string;
}

export class AgiError extends Error {
    readonly code: AgiErrorCode;
    readonly status?: number;
    readonly raw?: string;

    constructor(code: AgiErrorCode, message: string, opts: AgiErrorOptions = {}) {
        super(message, opts.cause !== undefined ? { cause: opts.cause } : undefined);
        this.name = 'AgiError';
        this.code = code;
        this.status = opts.status;
        this.raw = opts.raw;
    }
}

export function isAgiError(err: unknown): err is AgiError {
    return err instanceof AgiError;
}

export function normalizeError(err: unknown): Error {
    if (err instanceof Error) {
        return err;
    }
    if (typeof err === 'string') {
        return new Error(err);
    }
    try {
        return new Error(JSON.stringify(err));
    } catch {
        return new Error(String(err));
    }
}
