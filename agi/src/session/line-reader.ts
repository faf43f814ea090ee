/*
  Newline framed reader over a byte stream.
  - 'data' 조각을 누적하고 '\n' 경계마다 한 줄씩 잘라 큐에 보관
  - trailing '\r' 제거, EOF 시 남은 조각은 마지막 줄로 취급
  - readLine() 은 FIFO 대기열로 제공, AbortSignal 로 대기 중인 읽기를 철회 가능
    (철회된 읽기는 이후 도착하는 줄을 소비하지 않는다)
  - 읽지 않은 줄이 maxBuffered 이상 쌓이면 stream 을 pause, 읽어서 줄어들면 resume
*/
import type { Readable } from 'stream';
import { TextDecoder } from 'util';
import { AgiError, AgiErrorCode } from '../utils/errors';

export const DEFAULT_MAX_BUFFERED_LINES = 1024;

export interface LineReaderOptions {
    /** unread lines at which the stream is paused */
    maxBuffered?: number;
}

interface PendingRead {
    resolve: (line: string | null) => void;
    reject: (err: Error) => void;
    detach: () => void;
}

export class LineReader {
    private buffer = '';
    private readonly lines: string[] = [];
    private readonly waiters: PendingRead[] = [];
    private readonly decoder = new TextDecoder('utf-8');
    private ended = false;
    private failure: AgiError | null = null;
    private paused = false;
    private readonly maxBuffered: number;

    constructor(private readonly stream: Readable, opts: LineReaderOptions = {}) {
        this.maxBuffered = Math.max(1, opts.maxBuffered ?? DEFAULT_MAX_BUFFERED_LINES);
        stream.on('data', (chunk: Buffer | string) => this.push(chunk));
        stream.on('end', () => this.finish());
        stream.on('close', () => this.finish());
        stream.on('error', (err: Error) => this.fail(err));
    }

    /** number of complete lines buffered and not yet read */
    get buffered(): number {
        return this.lines.length;
    }

    /** true while the stream is paused because too many lines are unread */
    get isPaused(): boolean {
        return this.paused;
    }

    get pendingReads(): number {
        return this.waiters.length;
    }

    get isEnded(): boolean {
        return this.ended && this.lines.length === 0;
    }

    /**
     * Resolves with the next line (without its terminator), or null at end of
     * stream. Rejects when the stream errors or the signal aborts.
     */
    readLine(signal?: AbortSignal): Promise<string | null> {
        const line = this.lines.shift();
        if (line !== undefined) {
            if (this.paused && this.lines.length < this.maxBuffered) {
                this.paused = false;
                this.stream.resume();
            }
            return Promise.resolve(line);
        }
        if (this.failure) {
            return Promise.reject(this.failure);
        }
        if (this.ended) {
            return Promise.resolve(null);
        }
        if (signal?.aborted) {
            return Promise.reject(abortReason(signal));
        }
        return new Promise<string | null>((resolve, reject) => {
            const onAbort = () => {
                const idx = this.waiters.indexOf(pending);
                if (idx !== -1) {
                    this.waiters.splice(idx, 1);
                }
                reject(abortReason(signal));
            };
            const pending: PendingRead = {
                resolve,
                reject,
                detach: () => signal?.removeEventListener('abort', onAbort),
            };
            signal?.addEventListener('abort', onAbort, { once: true });
            this.waiters.push(pending);
        });
    }

    private push(chunk: Buffer | string): void {
        this.buffer += typeof chunk === 'string' ? chunk : this.decoder.decode(chunk, { stream: true });
        let idx = this.buffer.indexOf('\n');
        while (idx !== -1) {
            this.enqueue(this.buffer.substring(0, idx));
            this.buffer = this.buffer.substring(idx + 1);
            idx = this.buffer.indexOf('\n');
        }
    }

    private enqueue(raw: string): void {
        const line = raw.endsWith('\r') ? raw.substring(0, raw.length - 1) : raw;
        const waiter = this.waiters.shift();
        if (waiter) {
            waiter.detach();
            waiter.resolve(line);
            return;
        }
        this.lines.push(line);
        if (!this.paused && !this.ended && this.lines.length >= this.maxBuffered) {
            this.paused = true;
            this.stream.pause();
        }
    }

    private finish(): void {
        if (this.ended) return;
        this.buffer += this.decoder.decode();
        if (this.buffer.length > 0) {
            this.enqueue(this.buffer);
            this.buffer = '';
        }
        this.ended = true;
        for (const waiter of this.waiters.splice(0)) {
            waiter.detach();
            waiter.resolve(null);
        }
    }

    private fail(err: Error): void {
        if (this.failure) return;
        this.failure = new AgiError(AgiErrorCode.TRANSPORT, `failed to read from stream: ${err.message}`, { cause: err });
        for (const waiter of this.waiters.splice(0)) {
            waiter.detach();
            waiter.reject(this.failure);
        }
    }
}

function abortReason(signal: AbortSignal | undefined): Error {
    const reason: unknown = signal?.reason;
    return reason instanceof Error ? reason : new Error('read aborted');
}
