// AGI reply status codes
export const StatusCode = {
    OK: 200,
    INVALID: 510,
    DEAD_CHANNEL: 511,
    END_USAGE: 520,
} as const;

/**
 * Asterisk channel states, numbered as the switch reports them in the result
 * of `CHANNEL STATUS`.
 */
export enum ChannelState {
    Down = 0,
    Reserved = 1,
    OffHook = 2,
    Dialing = 3,
    /** the channel is ringing */
    Ring = 4,
    /** the remote end is ringing (the channel receives ringback) */
    Ringing = 5,
    Up = 6,
    Busy = 7,
    DialingOffHook = 8,
    /** an incoming call was detected and is waiting for ring */
    PreRing = 9,
}

export function isChannelState(n: number): n is ChannelState {
    return Number.isInteger(n) && n >= ChannelState.Down && n <= ChannelState.PreRing;
}

export const HANGUP_NOTIFICATION_PREFIX = 'HANGUP';
