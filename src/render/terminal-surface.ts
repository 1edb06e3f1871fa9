import termKit from 'terminal-kit';
import type { TerminalSurface } from './contracts';

/**
 * The slice of a terminal-kit terminal the surface drives. terminal-kit's
 * `terminal` satisfies it; tests hand in a fake.
 */
export interface TerminalDriver {
    readonly width: number;
    readonly height: number;
    fullscreen(enable: boolean): unknown;
    hideCursor(hide?: boolean): unknown;
    grabInput(enable: boolean): unknown;
    clear(): unknown;
    moveTo(x: number, y: number): unknown;
    on(event: 'key', listener: (name: string) => void): unknown;
    removeAllListeners(event: 'key'): unknown;
}

export interface TextSink {
    write(chunk: string): unknown;
}

export interface TerminalKitSurfaceOptions {
    readonly driver?: TerminalDriver;
    readonly output?: TextSink;
}

const FALLBACK_COLUMNS = 80;
const FALLBACK_ROWS = 24;

const sanitizeSize = (value: number, fallback: number): number =>
    Number.isFinite(value) && value > 0 ? Math.floor(value) : fallback;

export const createTerminalKitSurface = (options: TerminalKitSurfaceOptions = {}): TerminalSurface => {
    const driver = options.driver ?? termKit.terminal;
    const output = options.output ?? process.stdout;
    const pendingKeys: string[] = [];
    let waiter: ((key: string | null) => void) | null = null;
    let isOpen = false;

    const deliver = (key: string | null) => {
        const resolve = waiter;
        waiter = null;
        resolve?.(key);
    };

    const onKey = (name: string) => {
        if (waiter) {
            deliver(name);
            return;
        }
        pendingKeys.push(name);
    };

    const open = () => {
        if (isOpen) {
            return;
        }
        isOpen = true;
        driver.fullscreen(true);
        driver.hideCursor();
        driver.grabInput(true);
        driver.on('key', onKey);
    };

    const close = () => {
        if (!isOpen) {
            return;
        }
        isOpen = false;
        deliver(null);
        pendingKeys.length = 0;
        driver.removeAllListeners('key');
        driver.grabInput(false);
        driver.hideCursor(false);
        driver.fullscreen(false);
    };

    const nextKey = (timeoutMs: number): Promise<string | null> => {
        const queued = pendingKeys.shift();
        if (queued !== undefined) {
            return Promise.resolve(queued);
        }
        if (!isOpen) {
            return Promise.resolve(null);
        }

        return new Promise((resolve) => {
            const timer = setTimeout(() => {
                waiter = null;
                resolve(null);
            }, Math.max(0, timeoutMs));
            waiter = (key) => {
                clearTimeout(timer);
                resolve(key);
            };
        });
    };

    // terminal-kit positions are one based.
    const writeAt = (x: number, y: number, text: string) => {
        driver.moveTo(x + 1, y + 1);
        output.write(text);
    };

    return {
        get columns() {
            return sanitizeSize(driver.width, FALLBACK_COLUMNS);
        },
        get rows() {
            return sanitizeSize(driver.height, FALLBACK_ROWS);
        },
        open,
        close,
        clear: () => {
            driver.clear();
        },
        writeAt,
        nextKey,
    };
};
