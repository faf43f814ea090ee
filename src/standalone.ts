// AGI(...) / EAGI(...) 로 실행되는 단독 모드: stdin/stdout 이 명령 채널
import agiConfig from '../agi/src/utils/config';
import { createLogger } from '../agi/src/utils/logger';
import { normalizeError } from '../agi/src/utils/errors';
import { AgiSession } from '../agi/src/session/session';
import { createDemoHandler } from './demo-handler';

const logger = createLogger({ level: agiConfig.logLevel ?? undefined, destination: 2 });

async function main(): Promise<void> {
    const useEagi = process.argv.includes('--eagi');
    const session = await (useEagi ? AgiSession.fromEagi({ logger }) : AgiSession.fromStdio({ logger }));
    logger.info(`AGI session started uniqueid=${session.variable('agi_uniqueid') ?? '-'} eagi=${useEagi}`);
    try {
        await createDemoHandler(logger, agiConfig.commandTimeoutMs)(session);
    } finally {
        session.close();
    }
}

main().then(
    () => process.exit(0),
    (err) => {
        logger.error(`AGI script failed: ${normalizeError(err).stack}`);
        process.exit(1);
    },
);
