import Fastify from 'fastify';
import agiConfig from '../agi/src/utils/config';
import { createLogger } from '../agi/src/utils/logger';
import { normalizeError } from '../agi/src/utils/errors';
import { FastAgiServer } from '../agi/src/server/fastagi-server';
import { renderMetrics } from '../agi/src/server/metrics';
import { AgiTelemetry } from '../agi/src/server/telemetry';
import { createDemoHandler } from './demo-handler';

const rootLogger = createLogger({ level: agiConfig.logLevel ?? undefined });
const telemetry = new AgiTelemetry();

const agiServer = new FastAgiServer(createDemoHandler(rootLogger, agiConfig.commandTimeoutMs), {
    host: agiConfig.listenHost,
    port: agiConfig.listenPort,
    logger: rootLogger,
    telemetry,
});

async function startMetrics(): Promise<void> {
    if (!agiConfig.metricsEnabled) {
        return;
    }
    const http = Fastify({ logger: rootLogger });

    http.get('/healthz', async () => ({ status: 'ok' }));

    // /metrics (Prometheus exposition)
    http.get('/metrics', async (_req, reply) => {
        reply.header('Content-Type', 'text/plain; version=0.0.4');
        return renderMetrics(telemetry.snapshot());
    });

    await http.listen({ host: agiConfig.metricsHost, port: agiConfig.metricsPort });
}

async function main(): Promise<void> {
    await startMetrics();
    await agiServer.serve();
}

main().catch((err) => {
    rootLogger.fatal(`FastAGI service stopped: ${normalizeError(err).stack}`);
    process.exit(1);
});
