import { describe, expect, it } from 'vitest';
import { runHeadlessSimulation } from 'cli/simulate';
import { createLogger, type LogEntry } from 'util/log';

const quiet = { logger: createLogger('test', { writer: () => undefined }) };

describe('runHeadlessSimulation', () => {
    it('produces deterministic results for the same seed', async () => {
        const input = { seed: 21, width: 20, height: 12, maxTicks: 40 };

        const first = await runHeadlessSimulation(input, quiet);
        const second = await runHeadlessSimulation(input, quiet);

        expect(second).toEqual(first);
        expect(first.seed).toBe(21);
        expect(first.finalFrame).toHaveLength(9);
    });

    it('returns the starting frame when no ticks are allowed', async () => {
        const result = await runHeadlessSimulation({ seed: 3, width: 7, height: 6, maxTicks: 0 }, quiet);

        expect(result).toMatchObject({
            ok: true,
            seed: 3,
            width: 7,
            height: 6,
            score: 0,
            outcome: 'demo-complete',
            collided: false,
        });
        expect(result.finalFrame).toHaveLength(3);
        expect(result.finalFrame[0]).toBe('O  v  O');
        expect(result.finalFrame[1]).toBe('O    OO');
        expect(['OO   OO', 'O   OOO']).toContain(result.finalFrame[2]);
    });

    it('clamps dimensions into the index range', async () => {
        const negative = await runHeadlessSimulation({ width: -5, height: 3, maxTicks: 0 }, quiet);
        const huge = await runHeadlessSimulation({ width: 1e9, height: 3, maxTicks: 0 }, quiet);

        expect(negative.width).toBe(0);
        expect(negative.finalFrame).toEqual([]);
        expect(huge.width).toBe(65535);
        expect(huge.finalFrame).toEqual([]);
    });

    it('falls back to the configured defaults', async () => {
        const result = await runHeadlessSimulation({ maxTicks: 0 }, quiet);

        expect(result.seed).toBe(1);
        expect(result.width).toBe(80);
        expect(result.height).toBe(24);
        expect(result.finalFrame).toHaveLength(21);
    });

    it('logs through the injected logger', async () => {
        const entries: LogEntry[] = [];
        const logger = createLogger('sim', { writer: (entry) => entries.push(entry) });

        await runHeadlessSimulation({ width: 7, height: 6, maxTicks: 0 }, { logger });

        expect(entries[0]).toMatchObject({
            subsystem: 'sim:session',
            message: 'session started',
            context: { mode: 'demo', width: 7, rows: 3 },
        });
    });
});
