import { AgiErrorCode } from '../utils/errors';
import type { AgiTelemetrySnapshot } from './telemetry';

type MetricType = 'counter' | 'gauge';

// Simple Prometheus exposition (no external deps)
export function renderMetrics(snap: AgiTelemetrySnapshot): string {
    const lines: string[] = [];
    const head = (name: string, help: string, type: MetricType) => {
        lines.push(`# HELP ${name} ${help}`);
        lines.push(`# TYPE ${name} ${type}`);
    };
    const push = (name: string, help: string, type: MetricType, value: number | undefined) => {
        if (value === undefined) return;
        head(name, help, type);
        lines.push(`${name} ${value}`);
    };
    push('agi_sessions_accepted_total', 'Total FastAGI connections accepted', 'counter', snap.sessionsAccepted);
    push('agi_sessions_active', 'Sessions whose handler is running', 'gauge', snap.sessionsActive);
    push('agi_handshake_failures_total', 'Connections that failed before the handshake completed', 'counter', snap.handshakeFailures);
    push('agi_handler_errors_total', 'Session handlers that threw', 'counter', snap.handlerErrors);
    push('agi_commands_total', 'Total commands executed', 'counter', snap.commandsTotal);
    head('agi_command_errors_total', 'Commands that completed with an error, by kind', 'counter');
    for (const code of [AgiErrorCode.TRANSPORT, AgiErrorCode.PARSE, AgiErrorCode.TIMEOUT, AgiErrorCode.STATUS]) {
        lines.push(`agi_command_errors_total{code="${code}"} ${snap.commandErrors[code]}`);
    }
    push('agi_hangup_notifications_total', 'HANGUP notifications skipped while reading replies', 'counter', snap.hangupNotifications);
    push('agi_last_command_latency_ms', 'Duration of the most recent command', 'gauge', snap.lastCommandLatencyMs);
    return lines.join('\n') + '\n';
}
