import { EventEmitter } from 'events';
import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import dotenv from 'dotenv';

export const DEFAULT_AGI_HOST = 'localhost';
export const DEFAULT_AGI_PORT = 4573;

export type AgiConfigState = {
    listenHost: string;
    listenPort: number;
    // 0 = 무제한 대기
    commandTimeoutMs: number;
    metricsEnabled: boolean;
    metricsHost: string;
    metricsPort: number;
    logLevel: string | null;
};

const DEFAULTS: AgiConfigState = {
    listenHost: DEFAULT_AGI_HOST,
    listenPort: DEFAULT_AGI_PORT,
    commandTimeoutMs: 0,
    metricsEnabled: true,
    metricsHost: '127.0.0.1',
    metricsPort: 9573,
    logLevel: null,
};

function parseBoolean(val: string | undefined, defaultValue: boolean): boolean {
    if (val === undefined) {
        return defaultValue;
    }
    if (/^(1|true|yes|on)$/i.test(val)) {
        return true;
    }
    if (/^(0|false|no|off)$/i.test(val)) {
        return false;
    }
    return defaultValue;
}

function parseNumber(val: string | undefined): number | null {
    if (val === undefined || val === '') {
        return null;
    }
    const n = Number(val);
    return Number.isFinite(n) ? n : null;
}

type EnvSource = Record<string, string | undefined>;

function loadFromSource(src: EnvSource): Partial<AgiConfigState> {
    const res: Partial<AgiConfigState> = {};
    const host = src['AGI_LISTEN_HOST'];
    if (host !== undefined) {
        res.listenHost = host;
    }
    const port = parseNumber(src['AGI_LISTEN_PORT']);
    if (port !== null) {
        res.listenPort = port;
    }
    const timeout = parseNumber(src['AGI_COMMAND_TIMEOUT_MS']);
    if (timeout !== null) {
        res.commandTimeoutMs = timeout;
    }
    if (src['METRICS_ENABLED'] !== undefined) {
        res.metricsEnabled = parseBoolean(src['METRICS_ENABLED'], DEFAULTS.metricsEnabled);
    }
    const metricsHost = src['METRICS_HOST'];
    if (metricsHost !== undefined) {
        res.metricsHost = metricsHost;
    }
    const metricsPort = parseNumber(src['METRICS_PORT']);
    if (metricsPort !== null) {
        res.metricsPort = metricsPort;
    }
    const level = src['LOG_LEVEL'];
    if (level !== undefined) {
        res.logLevel = level;
    }
    return res;
}

function loadFromEnvFile(envPath: string): Partial<AgiConfigState> {
    try {
        if (!existsSync(envPath)) {
            return {};
        }
        return loadFromSource(dotenv.parse(readFileSync(envPath)));
    } catch {
        return {};
    }
}

function isValidPort(p: number): boolean {
    return Number.isInteger(p) && p >= 0 && p <= 65535;
}

// 설정 검증 및 정규화
function validateAndNormalize(input: AgiConfigState): AgiConfigState {
    const out: AgiConfigState = { ...input };
    if (!isValidPort(out.listenPort)) {
        console.warn(`[agi-config] Invalid listen port: ${String(out.listenPort)}. Falling back to ${DEFAULTS.listenPort}.`);
        out.listenPort = DEFAULTS.listenPort;
    }
    if (!isValidPort(out.metricsPort)) {
        console.warn(`[agi-config] Invalid metrics port: ${String(out.metricsPort)}. Falling back to ${DEFAULTS.metricsPort}.`);
        out.metricsPort = DEFAULTS.metricsPort;
    }
    if (!out.listenHost) {
        out.listenHost = DEFAULTS.listenHost;
    }
    if (!Number.isFinite(out.commandTimeoutMs) || out.commandTimeoutMs < 0) {
        out.commandTimeoutMs = 0;
    }
    return out;
}

export class AgiConfig extends EventEmitter {
    private state: AgiConfigState;

    constructor(envPath?: string) {
        super();
        const path = envPath ?? resolve(process.cwd(), '.env');
        // process.env 가 .env 파일보다 우선
        this.state = validateAndNormalize({
            ...DEFAULTS,
            ...loadFromEnvFile(path),
            ...loadFromSource(process.env),
        });
    }

    onUpdate(listener: (next: AgiConfigState, prev: AgiConfigState) => void): () => void {
        this.on('update', listener);
        return () => this.off('update', listener);
    }

    get listenHost(): string {
        return this.state.listenHost;
    }

    get listenPort(): number {
        return this.state.listenPort;
    }

    get commandTimeoutMs(): number {
        return this.state.commandTimeoutMs;
    }

    get metricsEnabled(): boolean {
        return this.state.metricsEnabled;
    }

    get metricsHost(): string {
        return this.state.metricsHost;
    }

    get metricsPort(): number {
        return this.state.metricsPort;
    }

    get logLevel(): string | null {
        return this.state.logLevel;
    }

    snapshot(): AgiConfigState {
        return { ...this.state };
    }

    // 테스트 및 런타임 오버라이드 지원: 반환된 함수를 호출하면 이전 상태로 복구합니다.
    applyOverrides(partial: Partial<AgiConfigState>): () => void {
        const prev = { ...this.state };
        const next = validateAndNormalize({ ...this.state, ...partial });
        this.state = next;
        this.emit('update', next, prev);
        return () => {
            const cur = { ...this.state };
            this.state = prev;
            this.emit('update', this.state, cur);
        };
    }
}

const agiConfig = new AgiConfig();
export default agiConfig;
