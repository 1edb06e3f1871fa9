import { gameConfig } from 'config/game';
import type { Logger } from 'util/log';
import { runHeadlessSimulation, type SimulationInput, type SimulationResult } from './simulate';

export interface TuningBotOptions {
    readonly runs: number;
    readonly seed?: number;
    readonly width?: number;
    readonly height?: number;
    readonly maxTicks?: number;
    readonly logger?: Logger;
}

export interface TuningBotSummary {
    readonly runCount: number;
    readonly averageScore: number;
    readonly bestScore: number;
    readonly worstScore: number;
    readonly collisionRate: number;
    readonly scoreStdDev: number;
    readonly deterministicCheck: boolean;
}

export interface TuningBotResult {
    readonly summary: TuningBotSummary;
    readonly runs: readonly SimulationResult[];
}

const clampRuns = (value: number): number => {
    if (!Number.isFinite(value) || value <= 0) {
        return 1;
    }
    return Math.min(gameConfig.tune.maxRuns, Math.max(1, Math.floor(value)));
};

const computeStdDev = (values: readonly number[]): number => {
    if (values.length <= 1) {
        return 0;
    }
    const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
    const variance = values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / values.length;
    return Math.sqrt(variance);
};

/**
 * Plays consecutive seeds with the demo heuristic and summarises how far it
 * gets, then replays the first seed to confirm the run reproduces.
 */
export const runTuningBot = async (options: TuningBotOptions): Promise<TuningBotResult> => {
    const runCount = clampRuns(options.runs);
    const startSeed = typeof options.seed === 'number' ? options.seed : gameConfig.simulation.seed;
    const dependencies = { logger: options.logger };
    const runs: SimulationResult[] = [];
    let firstRunInput: SimulationInput | null = null;

    for (let index = 0; index < runCount; index += 1) {
        const input: SimulationInput = {
            seed: startSeed + index,
            width: options.width,
            height: options.height,
            maxTicks: options.maxTicks,
        };
        if (index === 0) {
            firstRunInput = input;
        }
        runs.push(await runHeadlessSimulation(input, dependencies));
    }

    const scores = runs.map((run) => run.score);
    const totalScore = scores.reduce((sum, score) => sum + score, 0);
    const collisions = runs.filter((run) => run.collided).length;

    let deterministicCheck = true;
    if (firstRunInput) {
        const baseline = await runHeadlessSimulation(firstRunInput, dependencies);
        deterministicCheck = JSON.stringify(baseline) === JSON.stringify(runs[0]);
    }

    const summary: TuningBotSummary = {
        runCount: runs.length,
        averageScore: Number((totalScore / runs.length).toFixed(2)),
        bestScore: Math.max(...scores),
        worstScore: Math.min(...scores),
        collisionRate: Number((collisions / runs.length).toFixed(3)),
        scoreStdDev: Number(computeStdDev(scores).toFixed(2)),
        deterministicCheck,
    } satisfies TuningBotSummary;

    return {
        summary,
        runs,
    } satisfies TuningBotResult;
};
