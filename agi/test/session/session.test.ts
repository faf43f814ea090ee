import { PassThrough } from 'stream';
import { AgiSession, CommandInfo } from '../../src/session/session';
import { AgiResponse } from '../../src/protocol/response';
import { AgiErrorCode } from '../../src/utils/errors';
import { createFakePeer, createTestSession, DEFAULT_VARS, expectCommand, FakePeer, handshakeLines, sleep } from '../utils/fake-peer';
import { createSilentLogger, Logger } from '../../src/utils/logger';

describe('AgiSession handshake', () => {
  test('variables come from the handshake block', async () => {
    const { session } = await createTestSession({ agi_channel: 'SIP/1234-00000001', agi_language: 'en' });
    expect(session.variable('agi_channel')).toBe('SIP/1234-00000001');
    expect(session.variables.get('agi_language')).toBe('en');
    expect(session.variables.size).toBe(2);
  });

  test('create waits for the handshake to finish', async () => {
    const input = new PassThrough();
    let created = false;
    const p = AgiSession.create(input, new PassThrough()).then((s) => { created = true; return s; });
    input.write('agi_type: SIP\n');
    await sleep(10);
    expect(created).toBe(false);
    input.write('\n');
    const session = await p;
    expect(session.variable('agi_type')).toBe('SIP');
  });

  test('eagi stream is exposed when given', async () => {
    const input = new PassThrough();
    const eagi = new PassThrough();
    input.write(handshakeLines({ agi_enhanced: '1.0' }).join('\n') + '\n');
    const session = await AgiSession.create(input, new PassThrough(), { eagi });
    expect(session.eagi).toBe(eagi);
  });
});

describe('AgiSession.execute', () => {
  test('writes the space-joined command line and parses the reply', async () => {
    const { session, peer } = await createTestSession();
    const p = session.execute(0, 'GET VARIABLE', 'MYVAR');
    expect(await expectCommand(peer, '200 result=1 (hello)')).toBe('GET VARIABLE MYVAR');
    const r = await p;
    expect(r.error).toBeUndefined();
    expect(r.status).toBe(200);
    expect(r.result).toBe(1);
    expect(r.value).toBe('hello');
  });

  test('tokens are joined verbatim, including the empty-argument placeholder', async () => {
    const { session, peer } = await createTestSession();
    const p = session.execute(0, 'STREAM FILE', 'hello-world', '""', '0');
    expect(await expectCommand(peer, '200 result=0 endpos=8000')).toBe('STREAM FILE hello-world "" 0');
    expect((await p).value).toBe('endpos=8000');
  });

  test('HANGUP notification before the reply is skipped', async () => {
    const { session, peer } = await createTestSession();
    const hangups: string[] = [];
    session.on('hangup', (line: string) => hangups.push(line));
    const p = session.execute(0, 'ANSWER');
    await peer.nextCommand();
    peer.send('HANGUP', '200 result=0');
    const r = await p;
    expect(r.error).toBeUndefined();
    expect(r.result).toBe(0);
    expect(session.hangupReceived).toBe(true);
    expect(hangups).toEqual(['HANGUP']);
  });

  test('malformed line is a parse error and later lines stay unread', async () => {
    const { session, peer } = await createTestSession();
    const p = session.execute(0, 'ANSWER');
    await peer.nextCommand();
    peer.send('banana', '200 result=5');
    const r = await p;
    expect(r.error?.code).toBe(AgiErrorCode.PARSE);
    expect(r.error?.message).toBe('failed to parse result: banana');
    expect(r.resultString).toBe('');

    const next = await session.execute(0, 'NOOP');
    expect(next.result).toBe(5);
  });

  test('non-200 status is reported as an error and the session stays usable', async () => {
    const { session, peer } = await createTestSession();
    const p = session.execute(0, 'GET VARIABLE', 'X');
    await expectCommand(peer, '511 result=-1');
    const r = await p;
    expect(r.error?.code).toBe(AgiErrorCode.STATUS);
    expect(r.error?.message).toBe('Non-200 status code. 511 result=-1');
    expect(r.status).toBe(511);
    expect(r.resultString).toBe('-1');

    const q = session.execute(0, 'NOOP');
    await expectCommand(peer, '200 result=0');
    expect((await q).ok).toBe(true);
  });

  test('multi-line usage reply is reported on its first line', async () => {
    const { session, peer } = await createTestSession();
    const p = session.execute(0, 'SAY NUMBER');
    await expectCommand(peer, '520-Invalid command syntax.  Proper usage follows:');
    const r = await p;
    expect(r.error?.code).toBe(AgiErrorCode.PARSE);
    expect(r.error?.raw).toBe('520-Invalid command syntax.  Proper usage follows:');
  });

  test('non-integer result token is not an error', async () => {
    const { session, peer } = await createTestSession();
    const p = session.execute(0, 'GET VARIABLE', 'FLAG');
    await expectCommand(peer, '200 result=on');
    const r = await p;
    expect(r.error).toBeUndefined();
    expect(r.resultString).toBe('on');
    expect(r.result).toBeUndefined();
  });

  test('empty reply line is a parse error', async () => {
    const { session, peer } = await createTestSession();
    const p = session.execute(0, 'NOOP');
    await expectCommand(peer, '');
    expect((await p).error?.message).toBe('empty reply line');
  });

  test('end of stream before a reply is a transport error', async () => {
    const { session, peer } = await createTestSession();
    const p = session.execute(0, 'ANSWER');
    await peer.nextCommand();
    peer.input.end();
    const r = await p;
    expect(r.error?.code).toBe(AgiErrorCode.TRANSPORT);
    expect(r.error?.message).toBe('end of stream before reply');
  });

  test('write failure yields only a transport error and reads nothing', async () => {
    const { session, peer } = await createTestSession();
    peer.send('200 result=9');
    peer.output.destroy();
    await sleep(5);
    const r = await session.execute(0, 'ANSWER');
    expect(r.error?.code).toBe(AgiErrorCode.TRANSPORT);
    expect(r.error?.message.startsWith('failed to send command:')).toBe(true);
    expect(r.status).toBe(0);
    expect(r.raw).toBeUndefined();
  });

  test('closed session refuses commands', async () => {
    const { session } = await createTestSession();
    session.close();
    expect(session.isClosed()).toBe(true);
    const r = await session.execute(0, 'ANSWER');
    expect(r.error?.message).toBe('failed to send command: session closed');
  });

  test('emits a response event per command', async () => {
    const { session, peer } = await createTestSession();
    const seen: Array<[AgiResponse, CommandInfo]> = [];
    session.on('response', (r: AgiResponse, info: CommandInfo) => seen.push([r, info]));
    const p = session.execute(0, 'CHANNEL STATUS');
    await expectCommand(peer, '200 result=6');
    await p;
    expect(seen).toHaveLength(1);
    expect(seen[0][1].command).toBe('CHANNEL STATUS');
    expect(seen[0][0].result).toBe(6);
  });
});

describe('AgiSession.execute timeout', () => {
  test('silent peer produces a timeout no earlier than requested', async () => {
    const { session, peer } = await createTestSession();
    const started = Date.now();
    const p = session.execute(80, 'ANSWER');
    expect(await peer.nextCommand()).toBe('ANSWER');
    const r = await p;
    const elapsed = Date.now() - started;
    expect(r.error?.code).toBe(AgiErrorCode.TIMEOUT);
    expect(r.error?.message).toBe('timeout after 80ms');
    expect(elapsed).toBeGreaterThanOrEqual(75);
    expect(elapsed).toBeLessThan(1000);
  });

  test('reply within the bound wins the race', async () => {
    const { session, peer } = await createTestSession();
    const p = session.execute(1000, 'ANSWER');
    await expectCommand(peer, '200 result=0');
    expect((await p).ok).toBe(true);
  });

  test('late reply stays buffered and is read by the next command', async () => {
    const { session, peer } = await createTestSession();
    const first = session.execute(30, 'GET VARIABLE', 'SLOW');
    await peer.nextCommand();
    expect((await first).error?.code).toBe(AgiErrorCode.TIMEOUT);

    peer.send('200 result=1 (late)');
    const second = session.execute(0, 'GET VARIABLE', 'FAST');
    expect(await peer.nextCommand()).toBe('GET VARIABLE FAST');
    const r = await second;
    expect(r.value).toBe('late');
  });

  test('timeouts beyond the timer limit do not fire early', async () => {
    const { session, peer } = await createTestSession();
    let settled = false;
    const p = session.execute(2 ** 31, 'ANSWER').then((r) => {
      settled = true;
      return r;
    });
    await peer.nextCommand();
    await sleep(50);
    expect(settled).toBe(false);
    peer.send('200 result=0');
    expect((await p).ok).toBe(true);
  });

  test('zero timeout waits indefinitely', async () => {
    const { session, peer } = await createTestSession();
    const p = session.execute(0, 'WAIT FOR DIGIT', '-1');
    await peer.nextCommand();
    await sleep(60);
    peer.send('200 result=49');
    expect((await p).result).toBe(49);
  });
});

describe('AgiSession concurrency', () => {
  test('concurrent commands are serialized and never interleave', async () => {
    const { session, peer } = await createTestSession();
    const a = session.execute(0, 'GET VARIABLE', 'A');
    const b = session.execute(0, 'GET VARIABLE', 'B');
    expect(session.pendingCommands).toBe(2);

    expect(await peer.nextCommand()).toBe('GET VARIABLE A');
    await sleep(20);
    // B must not be written until A's reply is consumed
    const early = await Promise.race([peer.nextCommand().then(() => 'written'), sleep(20).then(() => 'pending')]);
    expect(early).toBe('pending');
    peer.send('200 result=1 (a)');
    expect((await a).value).toBe('a');

    peer.send('200 result=1 (b)');
    expect((await b).value).toBe('b');
  });

  test('a timed out command releases the lock for the next caller', async () => {
    const { session, peer } = await createTestSession();
    const a = session.execute(30, 'ANSWER');
    const b = session.execute(0, 'NOOP');
    expect(await peer.nextCommand()).toBe('ANSWER');
    expect((await a).error?.code).toBe(AgiErrorCode.TIMEOUT);
    expect(await expectCommand(peer, '200 result=0')).toBe('NOOP');
    expect((await b).ok).toBe(true);
  });
});

describe('AgiSession event listeners', () => {
  async function sessionWithLogger(): Promise<{ session: AgiSession; peer: FakePeer; errors: string[] }> {
    const errors: string[] = [];
    const logger: Logger = { ...createSilentLogger(), error: (msg: string) => errors.push(msg) };
    const peer = createFakePeer();
    peer.send(...handshakeLines(DEFAULT_VARS));
    const session = await AgiSession.create(peer.input, peer.output, { logger });
    return { session, peer, errors };
  }

  test('a throwing response listener does not reject execute', async () => {
    const { session, peer, errors } = await sessionWithLogger();
    session.on('response', () => {
      throw new Error('listener boom');
    });
    const p = session.execute(0, 'ANSWER');
    await expectCommand(peer, '200 result=0');
    const r = await p;
    expect(r.ok).toBe(true);
    expect(r.result).toBe(0);
    expect(errors).toEqual([`AGI session 'response' listener failed: listener boom`]);
  });

  test('a throwing hangup listener still yields the reply', async () => {
    const { session, peer, errors } = await sessionWithLogger();
    session.on('hangup', () => {
      throw new Error('hangup boom');
    });
    const p = session.execute(0, 'ANSWER');
    await peer.nextCommand();
    peer.send('HANGUP', '200 result=0');
    expect((await p).ok).toBe(true);
    expect(session.hangupReceived).toBe(true);
    expect(errors).toEqual([`AGI session 'hangup' listener failed: hangup boom`]);
  });

  test('later commands still run after a listener failure', async () => {
    const { session, peer } = await sessionWithLogger();
    session.once('response', () => {
      throw new Error('once');
    });
    const a = session.execute(0, 'ANSWER');
    await expectCommand(peer, '200 result=0');
    await a;
    const b = session.execute(0, 'NOOP');
    expect(await expectCommand(peer, '200 result=1')).toBe('NOOP');
    expect((await b).result).toBe(1);
  });
});
