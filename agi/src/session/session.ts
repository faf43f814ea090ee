import { EventEmitter } from 'events';
import { createReadStream } from 'fs';
import type { Socket } from 'net';
import type { Readable, Writable } from 'stream';
import { classifyReplyLine, parseReplyLine, AgiResponse } from '../protocol/response';
import { AgiError, AgiErrorCode, isAgiError, normalizeError } from '../utils/errors';
import { createSilentLogger, Logger } from '../utils/logger';
import { CommandQueue } from './command-queue';
import { readHandshake } from './handshake';
import { LineReader } from './line-reader';

export const EAGI_FD = 3;

// setTimeout fires at once for delays above this
export const MAX_TIMER_MS = 2147483647;

export interface SessionOptions {
    /** auxiliary inbound audio stream of an EAGI session */
    eagi?: Readable;
    /** owning socket of a FastAGI session; destroyed on close() */
    socket?: Socket;
    /** receives failures of 'response' and 'hangup' listeners */
    logger?: Logger;
}

export interface CommandInfo {
    command: string;
    durationMs: number;
}

/**
 * One AGI conversation: the handshake variables plus a command channel that
 * carries at most one command at a time.
 */
export class AgiSession extends EventEmitter {
    readonly variables: ReadonlyMap<string, string>;
    private readonly reader: LineReader;
    private readonly output: Writable;
    private readonly eagiStream?: Readable;
    private readonly socket?: Socket;
    private readonly logger: Logger;
    private readonly queue = new CommandQueue();
    private closed = false;
    private hangupSeen = false;
    private outputError: Error | null = null;

    private constructor(
        reader: LineReader,
        output: Writable,
        variables: Map<string, string>,
        opts: SessionOptions,
        peerGone: boolean,
    ) {
        super();
        this.reader = reader;
        this.output = output;
        this.variables = variables;
        this.eagiStream = opts.eagi;
        this.socket = opts.socket;
        this.logger = opts.logger ?? createSilentLogger();
        this.closed = peerGone;
        // 출력 스트림 오류는 다음 write 에서 transport 오류로 보고
        output.on('error', (err: Error) => {
            this.outputError = err;
        });
        const markClosed = () => {
            this.closed = true;
        };
        this.socket?.once('end', markClosed);
        this.socket?.once('close', markClosed);
    }

    /** Wraps a transport and reads the handshake block before resolving. */
    static async create(input: Readable, output: Writable, opts: SessionOptions = {}): Promise<AgiSession> {
        const socket = opts.socket;
        // 핸드셰이크 도중 peer 가 끊는 경우도 closed 로 보고
        let peerGone = socket?.destroyed ?? false;
        const onGone = () => {
            peerGone = true;
        };
        socket?.once('end', onGone);
        socket?.once('close', onGone);
        try {
            const reader = new LineReader(input);
            const variables = await readHandshake(reader);
            return new AgiSession(reader, output, variables, opts, peerGone || (socket?.destroyed ?? false));
        } finally {
            socket?.off('end', onGone);
            socket?.off('close', onGone);
        }
    }

    static fromSocket(socket: Socket, opts: Omit<SessionOptions, 'socket'> = {}): Promise<AgiSession> {
        return AgiSession.create(socket, socket, { ...opts, socket });
    }

    static fromStdio(opts: Pick<SessionOptions, 'logger'> = {}): Promise<AgiSession> {
        return AgiSession.create(process.stdin, process.stdout, opts);
    }

    /** stdio session with the EAGI audio stream on file descriptor 3 */
    static fromEagi(opts: Pick<SessionOptions, 'logger'> = {}): Promise<AgiSession> {
        const eagi = createReadStream('/dev/stdeagi', { fd: EAGI_FD, autoClose: false });
        return AgiSession.create(process.stdin, process.stdout, { ...opts, eagi });
    }

    get eagi(): Readable | undefined {
        return this.eagiStream;
    }

    /** commands queued or running on this session */
    get pendingCommands(): number {
        return this.queue.size;
    }

    /** true once a HANGUP notification was skipped while reading a reply */
    get hangupReceived(): boolean {
        return this.hangupSeen;
    }

    variable(key: string): string | undefined {
        return this.variables.get(key);
    }

    isClosed(): boolean {
        return this.closed;
    }

    close(): void {
        this.closed = true;
        if (this.socket && !this.socket.destroyed) {
            this.socket.destroy();
        }
    }

    /**
     * Sends `tokens` joined by spaces as one command line and resolves with the
     * reply. Never rejects: every failure is reported in `response.error`.
     * With `timeoutMs > 0` the wait for the reply is bounded; a reply arriving
     * after the timeout stays buffered and is read by the next command.
     * Timeouts above {@link MAX_TIMER_MS} wait that long.
     */
    execute(timeoutMs: number, ...tokens: string[]): Promise<AgiResponse> {
        const command = tokens.join(' ');
        return this.queue.run(async () => {
            const started = Date.now();
            const response = await this.runCommand(timeoutMs, command);
            const info: CommandInfo = { command, durationMs: Date.now() - started };
            this.notify('response', response, info);
            return response;
        });
    }

    private async runCommand(timeoutMs: number, command: string): Promise<AgiResponse> {
        if (this.closed) {
            return AgiResponse.fromError(new AgiError(AgiErrorCode.TRANSPORT, 'failed to send command: session closed'));
        }
        try {
            await this.write(`${command}\n`);
        } catch (e) {
            const err = normalizeError(e);
            return AgiResponse.fromError(
                new AgiError(AgiErrorCode.TRANSPORT, `failed to send command: ${err.message}`, { cause: err }),
            );
        }
        if (timeoutMs > 0) {
            return this.readReplyWithTimeout(timeoutMs);
        }
        return this.readReply();
    }

    private write(data: string): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            if (this.outputError) {
                reject(this.outputError);
                return;
            }
            if (this.output.destroyed || this.output.writableEnded) {
                reject(new Error('output stream closed'));
                return;
            }
            this.output.write(data, (err?: Error | null) => (err ? reject(err) : resolve()));
        });
    }

    private async readReplyWithTimeout(timeoutMs: number): Promise<AgiResponse> {
        const abort = new AbortController();
        let timer: NodeJS.Timeout | undefined;
        const expired = new Promise<AgiResponse>((resolve) => {
            timer = setTimeout(() => {
                const err = new AgiError(AgiErrorCode.TIMEOUT, `timeout after ${timeoutMs}ms`);
                resolve(AgiResponse.fromError(err));
                // 대기 중인 읽기를 철회: 늦게 도착한 응답은 버퍼에 남는다
                abort.abort(err);
            }, Math.min(timeoutMs, MAX_TIMER_MS));
        });
        try {
            return await Promise.race([this.readReply(abort.signal), expired]);
        } finally {
            clearTimeout(timer);
        }
    }

    // Only the first structured line is the reply; multi-line replies (520 usage text) are not reassembled.
    private async readReply(signal?: AbortSignal): Promise<AgiResponse> {
        for (;;) {
            let line: string | null;
            try {
                line = await this.reader.readLine(signal);
            } catch (e) {
                if (isAgiError(e)) {
                    return AgiResponse.fromError(e);
                }
                const err = normalizeError(e);
                return AgiResponse.fromError(
                    new AgiError(AgiErrorCode.TRANSPORT, `failed to read reply: ${err.message}`, { cause: err }),
                );
            }
            if (line === null) {
                return AgiResponse.fromError(new AgiError(AgiErrorCode.TRANSPORT, 'end of stream before reply'));
            }
            switch (classifyReplyLine(line)) {
                case 'hangup':
                    this.hangupSeen = true;
                    this.notify('hangup', line);
                    continue;
                case 'empty':
                    return AgiResponse.fromError(new AgiError(AgiErrorCode.PARSE, 'empty reply line', { raw: line }));
                case 'invalid':
                    return AgiResponse.fromError(
                        new AgiError(AgiErrorCode.PARSE, `failed to parse result: ${line}`, { raw: line }),
                    );
                case 'reply':
                    return AgiResponse.fromReply(parseReplyLine(line));
            }
        }
    }

    // listener 예외가 execute 로 전파되지 않도록
    private notify(event: 'response' | 'hangup', ...args: unknown[]): void {
        try {
            this.emit(event, ...args);
        } catch (err) {
            this.logger.error(`AGI session '${event}' listener failed: ${normalizeError(err).message}`);
        }
    }
}
