/**
 * Input contract for the tunnel session.
 *
 * A key source hands out at most one key per poll. `null` means the poll timed
 * out with nothing pressed.
 */

export type KeyAction = 'left' | 'right' | 'quit';

export interface KeySource {
    /**
     * Wait for the next key press.
     * @param timeoutMs - How long to wait before giving up.
     * @returns Raw key name as reported by the terminal, or null on timeout.
     */
    nextKey(timeoutMs: number): Promise<string | null>;
}
