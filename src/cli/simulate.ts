import { gameConfig } from 'config/game';
import { createRandomRowGenerator } from 'game/row-generators';
import { runGameSession, type SessionOutcome } from 'game/session';
import { buildFrameLines } from 'render/frame';
import { uint16 } from 'tunnel/index-type';
import { Tunnel } from 'tunnel/tunnel';
import { createLogger, stderrLogWriter, type Logger } from 'util/log';
import { createRandomManager } from 'util/random';

export interface SimulationInput {
    readonly seed?: number;
    readonly width?: number;
    readonly height?: number;
    readonly maxTicks?: number;
}

export interface SimulationResult {
    readonly ok: true;
    readonly seed: number;
    readonly width: number;
    readonly height: number;
    readonly score: number;
    readonly outcome: SessionOutcome;
    readonly collided: boolean;
    readonly finalFrame: readonly string[];
}

export interface SimulationDependencies {
    readonly logger?: Logger;
}

const normalizeDimension = (value: number | undefined, fallback: number): number => {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        return fallback;
    }
    return Math.min(uint16.max, Math.max(0, Math.floor(value)));
};

const normalizeTicks = (value: number | undefined): number => {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        return gameConfig.simulation.maxTicks;
    }
    return Math.max(0, Math.floor(value));
};

/**
 * Plays one demo game with no terminal attached. The same input always
 * produces the same result.
 */
export const runHeadlessSimulation = async (
    input: SimulationInput,
    dependencies: SimulationDependencies = {},
): Promise<SimulationResult> => {
    const random = createRandomManager(typeof input.seed === 'number' ? input.seed : gameConfig.simulation.seed);
    const width = normalizeDimension(input.width, gameConfig.simulation.width);
    const height = normalizeDimension(input.height, gameConfig.simulation.height);
    const logger = dependencies.logger ?? createLogger('simulate', { writer: stderrLogWriter });

    const generator = createRandomRowGenerator(uint16, random);
    const tunnel = new Tunnel(uint16, generator, height, width);

    const session = await runGameSession({
        tunnel,
        generator,
        control: { mode: 'demo' },
        sleep: async () => undefined,
        config: { demoScoreLimit: normalizeTicks(input.maxTicks) },
        logger,
    });

    return {
        ok: true,
        seed: random.seed(),
        width,
        height,
        score: session.score,
        outcome: session.outcome,
        collided: session.outcome === 'collision',
        finalFrame: buildFrameLines(uint16, tunnel.cells()),
    } satisfies SimulationResult;
};
