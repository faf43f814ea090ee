/* In-process counters for FastAGI sessions and their commands */
import type { AgiResponse } from '../protocol/response';
import type { AgiSession, CommandInfo } from '../session/session';
import { AgiErrorCode } from '../utils/errors';

export interface AgiTelemetrySnapshot {
    version: number;
    startedAt: number;
    sessionsAccepted: number;
    sessionsActive: number;
    handshakeFailures: number;
    handlerErrors: number;
    commandsTotal: number;
    commandErrors: Record<AgiErrorCode, number>;
    hangupNotifications: number;
    lastCommandLatencyMs?: number;
}

function emptyErrorCounts(): Record<AgiErrorCode, number> {
    return {
        [AgiErrorCode.TRANSPORT]: 0,
        [AgiErrorCode.PARSE]: 0,
        [AgiErrorCode.TIMEOUT]: 0,
        [AgiErrorCode.STATUS]: 0,
        [AgiErrorCode.BIND]: 0,
        [AgiErrorCode.ACCEPT]: 0,
    };
}

export class AgiTelemetry {
    private readonly startedAt = Date.now();
    private sessionsAccepted = 0;
    private sessionsActive = 0;
    private handshakeFailures = 0;
    private handlerErrors = 0;
    private commandsTotal = 0;
    private readonly commandErrors = emptyErrorCounts();
    private hangupNotifications = 0;
    private lastCommandLatencyMs: number | undefined;
    private readonly hooked = new WeakSet<AgiSession>();

    hook(session: AgiSession): void {
        if (this.hooked.has(session)) return; // prevent double counting
        this.hooked.add(session);
        session.on('response', (resp: AgiResponse, info: CommandInfo) => {
            this.commandsTotal++;
            this.lastCommandLatencyMs = info.durationMs;
            if (resp.error) this.commandErrors[resp.error.code]++;
        });
        session.on('hangup', () => {
            this.hangupNotifications++;
        });
    }

    markAccepted() { this.sessionsAccepted++; }
    markSessionOpen() { this.sessionsActive++; }
    markSessionClosed() { if (this.sessionsActive > 0) this.sessionsActive--; }
    markHandshakeFailure() { this.handshakeFailures++; }
    markHandlerError() { this.handlerErrors++; }

    snapshot(): AgiTelemetrySnapshot {
        return {
            version: 1,
            startedAt: this.startedAt,
            sessionsAccepted: this.sessionsAccepted,
            sessionsActive: this.sessionsActive,
            handshakeFailures: this.handshakeFailures,
            handlerErrors: this.handlerErrors,
            commandsTotal: this.commandsTotal,
            commandErrors: { ...this.commandErrors },
            hangupNotifications: this.hangupNotifications,
            lastCommandLatencyMs: this.lastCommandLatencyMs,
        };
    }
}
