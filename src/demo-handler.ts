import type { Logger } from '../agi/src/utils/logger';
import type { AgiSession } from '../agi/src/session/session';
import type { SessionHandler } from '../agi/src/server/fastagi-server';
import { ChannelState } from '../agi/src/protocol/constants';
import { answer, channelStatus, exec, hangup, streamFile, verbose } from '../agi/src/commands';

/**
 * Default call flow of the service: answer, play a greeting, hang up.
 * `commandTimeoutMs` bounds the dialplan application run (0 = no bound).
 */
export function createDemoHandler(logger: Logger, commandTimeoutMs: number): SessionHandler {
    return async (session: AgiSession) => {
        const channel = session.variable('agi_channel') ?? '?';
        const state = await channelStatus(session);
        if (state !== ChannelState.Up) {
            await answer(session);
        }
        await verbose(session, `greeting ${channel}`, 3);
        const digit = await streamFile(session, 'hello-world', '#');
        logger.info(`greeting played on ${channel} (digit=${digit || '-'})`);
        await exec(session, commandTimeoutMs, 'Wait', '1');
        await hangup(session);
    };
}
