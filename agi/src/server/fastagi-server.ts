import { createServer } from 'net';
import type { AddressInfo, Server, Socket } from 'net';
import { AgiSession } from '../session/session';
import { DEFAULT_AGI_HOST, DEFAULT_AGI_PORT } from '../utils/config';
import { AgiError, AgiErrorCode, normalizeError } from '../utils/errors';
import { createSilentLogger, Logger } from '../utils/logger';
import { AgiTelemetry } from './telemetry';

export type SessionHandler = (session: AgiSession) => void | Promise<void>;

export interface FastAgiServerOptions {
    host?: string;
    port?: number;
    logger?: Logger;
    telemetry?: AgiTelemetry;
}

/**
 * FastAGI listener: every accepted connection becomes an {@link AgiSession}
 * (handshake first) handed to `handler`. Handlers run concurrently; the
 * session is closed when its handler settles.
 */
export class FastAgiServer {
    readonly host: string;
    readonly port: number;
    readonly telemetry: AgiTelemetry;
    private readonly server: Server;
    private readonly logger: Logger;
    private readonly sockets = new Set<Socket>();
    private finished: Promise<void> | null = null;

    constructor(private readonly handler: SessionHandler, opts: FastAgiServerOptions = {}) {
        this.host = opts.host || DEFAULT_AGI_HOST;
        this.port = opts.port ?? DEFAULT_AGI_PORT;
        this.logger = opts.logger ?? createSilentLogger();
        this.telemetry = opts.telemetry ?? new AgiTelemetry();
        this.server = createServer((sock) => this.accept(sock));
    }

    /** Binds the listening socket. Rejects with a BIND error. */
    async start(): Promise<AddressInfo> {
        if (this.finished) {
            throw new AgiError(AgiErrorCode.BIND, 'failed to bind server: already started');
        }
        // wrapped: resolving with the promise itself would adopt its state
        const { done } = await new Promise<{ done: Promise<void> }>((resolve, reject) => {
            const onError = (err: Error) => {
                this.server.off('listening', onListening);
                reject(new AgiError(AgiErrorCode.BIND, `failed to bind server: ${err.message}`, { cause: err }));
            };
            const onListening = () => {
                this.server.off('error', onError);
                resolve({ done: this.watchListener() });
            };
            this.server.once('error', onError);
            this.server.once('listening', onListening);
            this.server.listen(this.port, this.host);
        });
        this.finished = done;
        const addr = this.address();
        if (!addr) throw new AgiError(AgiErrorCode.BIND, 'failed to bind server: address unavailable');
        this.logger.info(`FastAGI listening on ${addr.address}:${addr.port}`);
        return addr;
    }

    /**
     * Accepts connections until {@link close} is called (resolves) or the
     * listener fails (rejects with a BIND or ACCEPT error).
     */
    async serve(): Promise<void> {
        if (!this.finished) {
            await this.start();
        }
        const finished = this.finished;
        if (!finished) {
            throw new AgiError(AgiErrorCode.BIND, 'failed to bind server: not listening');
        }
        return finished;
    }

    // settles when the listening socket closes (resolve) or fails after bind (reject)
    private watchListener(): Promise<void> {
        const finished = new Promise<void>((resolve, reject) => {
            this.server.once('close', () => resolve());
            this.server.once('error', (err: Error) => {
                reject(new AgiError(AgiErrorCode.ACCEPT, `failed to accept TCP connection: ${err.message}`, { cause: err }));
                this.server.close();
            });
        });
        finished.catch((err: unknown) => {
            this.logger.error(`FastAGI listener stopped: ${normalizeError(err).message}`);
        });
        return finished;
    }

    address(): AddressInfo | null {
        const addr = this.server.address();
        return addr && typeof addr === 'object' ? addr : null;
    }

    get connections(): number {
        return this.sockets.size;
    }

    /** Stops accepting and closes every open session. */
    async close(): Promise<void> {
        for (const sock of this.sockets) {
            sock.destroy();
        }
        if (!this.server.listening) return;
        await new Promise<void>((resolve) => this.server.close(() => resolve()));
    }

    private accept(socket: Socket): void {
        const remote = `${socket.remoteAddress ?? '?'}:${socket.remotePort ?? '?'}`;
        this.sockets.add(socket);
        socket.once('close', () => this.sockets.delete(socket));
        this.telemetry.markAccepted();
        this.logger.debug(`FastAGI connection accepted from ${remote}`);
        this.runSession(socket, remote).catch((err: unknown) => {
            this.logger.error(`FastAGI session error (${remote}): ${normalizeError(err).stack}`);
        });
    }

    private async runSession(socket: Socket, remote: string): Promise<void> {
        let session: AgiSession;
        try {
            session = await AgiSession.fromSocket(socket, { logger: this.logger });
        } catch (err) {
            this.telemetry.markHandshakeFailure();
            this.logger.warn(`FastAGI handshake failed (${remote}): ${normalizeError(err).message}`);
            socket.destroy();
            return;
        }
        this.telemetry.hook(session);
        this.telemetry.markSessionOpen();
        const uniqueId = session.variable('agi_uniqueid') ?? '-';
        this.logger.info(`AGI session started (${remote}) uniqueid=${uniqueId} vars=${session.variables.size}`);
        try {
            await this.handler(session);
        } catch (err) {
            this.telemetry.markHandlerError();
            this.logger.error(`AGI handler failed (${remote}) uniqueid=${uniqueId}: ${normalizeError(err).stack}`);
        } finally {
            session.close();
            this.telemetry.markSessionClosed();
            this.logger.debug(`AGI session closed (${remote}) uniqueid=${uniqueId}`);
        }
    }
}

/** Parses "host:port", "host" or ":port"; missing parts take the FastAGI defaults. */
export function parseListenAddress(addr: string | undefined): { host: string; port: number } {
    if (!addr) {
        return { host: DEFAULT_AGI_HOST, port: DEFAULT_AGI_PORT };
    }
    const c = addr.lastIndexOf(':');
    if (c === -1) {
        return { host: addr, port: DEFAULT_AGI_PORT };
    }
    const host = addr.substring(0, c).replace(/^\[(.*)\]$/, '$1') || DEFAULT_AGI_HOST;
    const port = Number(addr.substring(c + 1));
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new AgiError(AgiErrorCode.BIND, `failed to bind server: invalid address ${addr}`);
    }
    return { host, port };
}

/**
 * Binds `addr` (default "localhost:4573") and serves sessions to `handler`
 * until the listener fails.
 */
export async function listen(
    addr: string | undefined,
    handler: SessionHandler,
    opts: Omit<FastAgiServerOptions, 'host' | 'port'> = {},
): Promise<void> {
    const server = new FastAgiServer(handler, { ...opts, ...parseListenAddress(addr) });
    await server.serve();
}
