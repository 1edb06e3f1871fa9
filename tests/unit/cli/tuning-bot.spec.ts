import { describe, expect, it } from 'vitest';
import { runTuningBot } from 'cli/tuning-bot';
import { createLogger } from 'util/log';

const logger = createLogger('test', { writer: () => undefined });

describe('runTuningBot', () => {
    it('plays consecutive seeds and summarises them', async () => {
        const result = await runTuningBot({ runs: 3, seed: 4, width: 7, height: 6, maxTicks: 0, logger });

        expect(result.runs.map((run) => run.seed)).toEqual([4, 5, 6]);
        expect(result.summary).toEqual({
            runCount: 3,
            averageScore: 0,
            bestScore: 0,
            worstScore: 0,
            collisionRate: 0,
            scoreStdDev: 0,
            deterministicCheck: true,
        });
    });

    it('confirms longer runs reproduce', async () => {
        const result = await runTuningBot({ runs: 2, seed: 11, width: 24, height: 10, maxTicks: 30, logger });

        expect(result.summary.runCount).toBe(2);
        expect(result.summary.deterministicCheck).toBe(true);
        expect(result.summary.bestScore).toBeGreaterThanOrEqual(result.summary.worstScore);
        expect(result.summary.bestScore).toBeLessThanOrEqual(30);
    });

    it('clamps the run count', async () => {
        const tiny = { width: 5, height: 3, maxTicks: 0, logger };

        const none = await runTuningBot({ runs: 0, ...tiny });
        const many = await runTuningBot({ runs: 500, ...tiny });
        const invalid = await runTuningBot({ runs: Number.NaN, ...tiny });

        expect(none.summary.runCount).toBe(1);
        expect(many.summary.runCount).toBe(50);
        expect(invalid.summary.runCount).toBe(1);
    });
});
