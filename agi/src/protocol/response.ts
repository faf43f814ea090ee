/*
 AGI reply line grammar:
   <status:3 digits> SP "result=" <token> [SP <value>]
 token is a possibly empty run of alphanumerics with an optional leading '-'.
 value is usually parenthesized, e.g. "200 result=-1 (timeout)", but some
 commands append bare key=value data ("200 result=1 endpos=1234").
*/
import { AgiError, AgiErrorCode } from '../utils/errors';
import { HANGUP_NOTIFICATION_PREFIX, StatusCode } from './constants';

const RESPONSE_RE = /^(\d{3})\sresult=(-?[A-Za-z0-9]*)(\s.*)?$/;
const INTEGER_RE = /^-?\d+$/;

export interface ParsedReply {
    status: number;
    result?: number;
    resultString: string;
    value: string;
    raw: string;
}

export type ReplyLineKind = 'reply' | 'hangup' | 'empty' | 'invalid';

export function classifyReplyLine(line: string): ReplyLineKind {
    if (line === '') return 'empty';
    if (line.startsWith(HANGUP_NOTIFICATION_PREFIX)) return 'hangup';
    return RESPONSE_RE.test(line) ? 'reply' : 'invalid';
}

function parseResultCode(token: string): number | undefined {
    if (!INTEGER_RE.test(token)) return undefined;
    const n = Number.parseInt(token, 10);
    return Number.isSafeInteger(n) ? n : undefined;
}

function unwrapValue(tail: string | undefined): string {
    let v = (tail ?? '').trim();
    if (v.startsWith('(')) v = v.substring(1);
    if (v.endsWith(')')) v = v.substring(0, v.length - 1);
    return v;
}

/**
 * Parse one reply line. Throws an {@link AgiError} with code PARSE when the
 * line does not match the grammar; a non-integer result token is not an error.
 */
export function parseReplyLine(raw: string): ParsedReply {
    const m = RESPONSE_RE.exec(raw);
    if (!m) {
        throw new AgiError(AgiErrorCode.PARSE, `failed to parse result: ${raw}`, { raw });
    }
    const resultString = m[2] ?? '';
    return {
        status: Number.parseInt(m[1] ?? '0', 10),
        result: parseResultCode(resultString),
        resultString,
        value: unwrapValue(m[3]),
        raw,
    };
}

export function formatReplyLine(reply: Pick<ParsedReply, 'status' | 'resultString' | 'value'>): string {
    const head = `${reply.status} result=${reply.resultString}`;
    return reply.value ? `${head} (${reply.value})` : head;
}

/** Outcome of one command. `error` is unset only for a fully parsed 200 reply. */
export class AgiResponse {
    status = 0;
    result?: number;
    resultString = '';
    value = '';
    raw?: string;
    error?: AgiError;

    static fromError(error: AgiError): AgiResponse {
        const r = new AgiResponse();
        r.error = error;
        return r;
    }

    static fromReply(reply: ParsedReply): AgiResponse {
        const r = new AgiResponse();
        r.status = reply.status;
        r.result = reply.result;
        r.resultString = reply.resultString;
        r.value = reply.value;
        r.raw = reply.raw;
        if (reply.status !== StatusCode.OK) {
            r.error = new AgiError(AgiErrorCode.STATUS, `Non-200 status code. ${reply.raw}`, {
                status: reply.status,
                raw: reply.raw,
            });
        }
        return r;
    }

    get ok(): boolean {
        return this.error === undefined;
    }

    throwIfError(): this {
        if (this.error) {
            throw this.error;
        }
        return this;
    }

    /** the parenthesized payload, or throws the response error */
    val(): string {
        return this.throwIfError().value;
    }

    /** the raw result token, or throws the response error */
    res(): string {
        return this.throwIfError().resultString;
    }
}
