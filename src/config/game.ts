import type { CellKind } from 'tunnel/cell-cursor';

export interface GlyphConfig {
    readonly char: string;
    readonly color?: string;
}

export interface SessionConfig {
    readonly tickMs: number;
    readonly keyPollTimeoutMs: number;
    readonly demoScoreLimit: number;
}

interface SimulationConfig {
    readonly width: number;
    readonly height: number;
    readonly maxTicks: number;
    readonly seed: number;
}

interface TuneConfig {
    readonly defaultRuns: number;
    readonly maxRuns: number;
}

export interface GameConfig {
    readonly session: SessionConfig;
    readonly simulation: SimulationConfig;
    readonly tune: TuneConfig;
    readonly glyphs: Record<CellKind, GlyphConfig>;
    readonly scoreColor: string;
}

export const gameConfig = {
    session: {
        tickMs: 100,
        keyPollTimeoutMs: 1000,
        demoScoreLimit: 200,
    },
    simulation: {
        width: 80,
        height: 24,
        maxTicks: 1000,
        seed: 1,
    },
    tune: {
        defaultRuns: 5,
        maxRuns: 50,
    },
    glyphs: {
        player: { char: 'v', color: '\x1b[32m' },
        floor: { char: ' ' },
        wall: { char: 'O' },
    },
    scoreColor: '\x1b[32m',
} as const satisfies GameConfig;

export const ANSI_RESET = '\x1b[0m';
