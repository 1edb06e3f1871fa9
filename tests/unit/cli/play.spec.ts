import { describe, expect, it, vi } from 'vitest';
import { runPlay } from 'cli/play';
import type { TerminalSurface } from 'render/contracts';
import type { LogEntry } from 'util/log';

const createSurfaceMock = (keys: readonly (string | null)[] = []) => {
    const events: string[] = [];
    const queue = [...keys];
    const surface: TerminalSurface = {
        columns: 7,
        rows: 6,
        open: vi.fn(() => {
            events.push('open');
        }),
        close: vi.fn(() => {
            events.push('close');
        }),
        clear: vi.fn(),
        writeAt: vi.fn(),
        nextKey: vi.fn(async () => queue.shift() ?? null),
    };
    return { surface, events };
};

describe('runPlay', () => {
    it('plays a keyboard game on the surface and flushes logs after closing it', async () => {
        const { surface, events } = createSurfaceMock(['q']);
        const entries: LogEntry[] = [];
        const logWriter = (entry: LogEntry) => {
            events.push(`log:${entry.message}`);
            entries.push(entry);
        };

        const result = await runPlay({ demo: false, seed: 12 }, { surface, logWriter });

        expect(result).toEqual({
            outcome: 'quit',
            score: 0,
            message: 'Quitting because player pressed quit key ...',
            seed: 12,
        });
        expect(events).toEqual([
            'open',
            'close',
            'log:tunnel created',
            'log:session started',
            'log:session finished',
        ]);
        expect(entries[0].context).toEqual({ seed: 12, rows: 6, columns: 7 });
        expect(entries[1].subsystem).toBe('play:session');
        expect(surface.clear).toHaveBeenCalledTimes(1);
        expect(surface.writeAt).toHaveBeenLastCalledWith(0, 5, '\x1b[32m0\x1b[0m');
    });

    it('runs the demo at the requested tick rate', async () => {
        const { surface } = createSurfaceMock();
        const sleep = vi.fn(async () => undefined);

        const result = await runPlay({ demo: true, seed: 3, tickMs: 25 }, { surface, sleep, logWriter: () => undefined });

        expect(['collision', 'demo-complete']).toContain(result.outcome);
        expect(sleep).toHaveBeenCalledWith(25);
        expect(surface.nextKey).not.toHaveBeenCalled();
        expect(surface.close).toHaveBeenCalledTimes(1);
    });

    it('restores the terminal and flushes logs when drawing fails', async () => {
        const { surface, events } = createSurfaceMock();
        vi.mocked(surface.clear).mockImplementation(() => {
            throw new Error('terminal gone');
        });
        const logWriter = (entry: LogEntry) => {
            events.push(`log:${entry.message}`);
        };

        await expect(runPlay({ demo: false }, { surface, logWriter })).rejects.toThrow('terminal gone');

        expect(events).toEqual(['open', 'close', 'log:tunnel created', 'log:session started']);
    });
});
