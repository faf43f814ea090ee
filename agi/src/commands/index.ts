// Typed AGI commands built on AgiSession.execute
import { ChannelState, isChannelState } from '../protocol/constants';
import type { AgiSession } from '../session/session';
import { AgiError, AgiErrorCode } from '../utils/errors';

const SECOND = 1000;
const MINUTE = 60 * SECOND;

// An empty argument must still hold its place on the command line.
const EMPTY_ARG = '""';
const DEFAULT_DATETIME_FORMAT = "ABdY 'digits/at' IMp";

function escapeArg(digits: string): string {
    return digits === '' ? EMPTY_ARG : digits;
}

function toEpoch(when: Date): string {
    return String(Math.floor(when.getTime() / 1000));
}

function toMs(ms: number): string {
    return String(Math.round(ms));
}

function toSec(ms: number): string {
    return String(Math.floor(ms / 1000));
}

export async function answer(session: AgiSession): Promise<void> {
    (await session.execute(30 * SECOND, 'ANSWER')).throwIfError();
}

export async function hangup(session: AgiSession): Promise<void> {
    (await session.execute(1 * SECOND, 'HANGUP')).throwIfError();
}

export async function channelStatus(session: AgiSession): Promise<ChannelState> {
    const resp = (await session.execute(5 * SECOND, 'CHANNEL STATUS')).throwIfError();
    if (resp.result === undefined || !isChannelState(resp.result)) {
        throw new AgiError(AgiErrorCode.PARSE, `failed to parse state ${resp.resultString}`, { raw: resp.raw });
    }
    return resp.result;
}

/** Runs a dialplan application and returns its value. */
export async function exec(session: AgiSession, timeoutMs: number, app: string, ...args: string[]): Promise<string> {
    return (await session.execute(timeoutMs, 'EXEC', app, ...args)).val();
}

export async function getVariable(session: AgiSession, key: string): Promise<string> {
    return (await session.execute(5 * SECOND, 'GET VARIABLE', key)).val();
}

export async function setVariable(session: AgiSession, key: string, val: string): Promise<void> {
    (await session.execute(5 * SECOND, 'SET VARIABLE', key, val)).throwIfError();
}

/** Plays `sound` and collects up to `maxDigits` DTMF digits. */
export async function getData(session: AgiSession, sound: string, timeoutMs: number, maxDigits: number): Promise<string> {
    const file = sound === '' ? 'silence/1' : sound;
    return (await session.execute(0, 'GET DATA', file, toMs(timeoutMs), String(maxDigits))).res();
}

export interface RecordOptions {
    /** audio file format, default "wav" */
    format?: string;
    /** digits that end the recording, default "#"; may not be empty */
    escapeDigits?: string;
    /** maximum recording length, default 5 minutes */
    timeoutMs?: number;
    /** silence that ends the recording, second resolution; 0 disables */
    silenceMs?: number;
    /** play a beep before recording */
    beep?: boolean;
    /** samples to skip at the start of the recording */
    offset?: number;
}

export async function record(session: AgiSession, name: string, opts: RecordOptions = {}): Promise<void> {
    const args = [
        'RECORD FILE',
        name,
        opts.format || 'wav',
        opts.escapeDigits || '#',
        toMs(opts.timeoutMs || 5 * MINUTE),
    ];
    if (opts.offset && opts.offset > 0) {
        args.push(String(opts.offset));
    }
    if (opts.beep) {
        args.push('BEEP');
    }
    if (opts.silenceMs && opts.silenceMs > 0) {
        args.push(`s=${toSec(opts.silenceMs)}`);
    }
    (await session.execute(0, ...args)).throwIfError();
}

export async function sayAlpha(session: AgiSession, label: string, escapeDigits = ''): Promise<string> {
    return (await session.execute(0, 'SAY ALPHA', label, escapeArg(escapeDigits))).val();
}

export async function sayDigits(session: AgiSession, digits: string, escapeDigits = ''): Promise<string> {
    return (await session.execute(0, 'SAY DIGITS', digits, escapeArg(escapeDigits))).val();
}

export async function sayNumber(session: AgiSession, num: string, escapeDigits = ''): Promise<string> {
    return (await session.execute(0, 'SAY NUMBER', num, escapeArg(escapeDigits))).val();
}

export async function sayPhonetic(session: AgiSession, phrase: string, escapeDigits = ''): Promise<string> {
    return (await session.execute(0, 'SAY PHONETIC', phrase, escapeArg(escapeDigits))).val();
}

export async function sayDate(session: AgiSession, when: Date, escapeDigits = ''): Promise<string> {
    return (await session.execute(0, 'SAY DATE', toEpoch(when), escapeArg(escapeDigits))).val();
}

export async function sayTime(session: AgiSession, when: Date, escapeDigits = ''): Promise<string> {
    return (await session.execute(0, 'SAY TIME', toEpoch(when), escapeArg(escapeDigits))).val();
}

/**
 * Says a date using a voicemail.conf style format. `timezone` defaults to the
 * local IANA zone of this process.
 */
export async function sayDateTime(
    session: AgiSession,
    when: Date,
    escapeDigits = '',
    format = '',
    timezone: string = Intl.DateTimeFormat().resolvedOptions().timeZone,
): Promise<string> {
    return (
        await session.execute(
            0,
            'SAY DATETIME',
            toEpoch(when),
            escapeArg(escapeDigits),
            format || DEFAULT_DATETIME_FORMAT,
            timezone,
        )
    ).val();
}

export async function streamFile(session: AgiSession, name: string, escapeDigits = '', offset = 0): Promise<string> {
    return (await session.execute(60 * SECOND, 'STREAM FILE', name, escapeArg(escapeDigits), String(offset))).val();
}

/** Logs `msg` on the switch console at the given verbosity level. */
export async function verbose(session: AgiSession, msg: string, level = 9): Promise<void> {
    (await session.execute(0, 'VERBOSE', JSON.stringify(msg), String(level))).throwIfError();
}

/**
 * Waits for one DTMF digit. The switch returns the digit's character code,
 * 0 when none was pressed.
 */
export async function waitForDigit(session: AgiSession, timeoutMs: number): Promise<string> {
    const resp = (await session.execute(0, 'WAIT FOR DIGIT', toMs(timeoutMs))).throwIfError();
    const code = resp.result;
    if (code === undefined || code < 0x20 || code > 0x7e) {
        return '';
    }
    return String.fromCharCode(code);
}
