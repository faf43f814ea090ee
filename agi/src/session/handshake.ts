import type { LineReader } from './line-reader';

/**
 * Reads the `key: value` block the switch sends when a session starts, up to
 * and including the terminating empty line. Lines without a colon are skipped
 * and a repeated key keeps its last value. If the stream ends first, the
 * variables read so far are returned.
 *
 * There is no timeout: a peer that never sends the blank line keeps this
 * pending.
 */
export async function readHandshake(reader: LineReader): Promise<Map<string, string>> {
    const variables = new Map<string, string>();
    for (;;) {
        const line = await reader.readLine();
        if (line === null || line === '') {
            return variables;
        }
        const c = line.indexOf(':');
        if (c === -1) continue;
        variables.set(line.substring(0, c).trim(), line.substring(c + 1).trim());
    }
}
