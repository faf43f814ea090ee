import pino from 'pino';
import type { LevelWithSilent, Logger as PinoLogger, TransportTargetOptions } from 'pino';
import type { PrettyOptions } from 'pino-pretty';

// pino.Logger 의 부분집합. 테스트에서는 no-op 객체로 대체한다.
export interface Logger {
    fatal(msg: string): void;
    error(msg: string): void;
    warn(msg: string): void;
    info(msg: string): void;
    debug(msg: string): void;
    trace(msg: string): void;
}

export interface LoggerOptions {
    level?: string;
    pretty?: boolean;
    // stdio AGI 는 stdout 이 명령 채널이므로 2(stderr)를 사용
    destination?: 1 | 2;
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function parseLogLevel(val: string | undefined, fallback: LevelWithSilent): LevelWithSilent {
    if (!val) {
        return fallback;
    }
    const lower = val.toLowerCase();
    return LEVELS.find((l) => l === lower) ?? fallback;
}

export function createLogger(opts: LoggerOptions = {}): PinoLogger {
    const isDev = opts.pretty ?? process.env['NODE_ENV'] !== 'production';
    const level = parseLogLevel(opts.level, isDev ? 'debug' : 'info');
    const destination = opts.destination ?? 1;

    const targets: TransportTargetOptions[] = [];
    if (isDev) {
        // 개발: 예쁜 콘솔
        const pretty: PrettyOptions = {
            colorize: true,
            ignore: 'pid,hostname',
            translateTime: 'SYS:HH:MM:ss.l',
            destination,
        };
        targets.push({ target: 'pino-pretty', options: pretty, level });
    } else {
        // 프로덕션: JSON 콘솔
        targets.push({ target: 'pino/file', options: { destination }, level });
    }

    const transport = pino.transport({ targets });
    return pino({ level }, transport);
}

export function createSilentLogger(): Logger {
    return {
        fatal: () => undefined,
        error: () => undefined,
        warn: () => undefined,
        info: () => undefined,
        debug: () => undefined,
        trace: () => undefined,
    };
}
