import { gameConfig } from 'config/game';
import { formatFinalLine } from 'game/session';
import { runPlay } from './play';
import { runHeadlessSimulation } from './simulate';
import { runTuningBot } from './tuning-bot';

export interface CliCommand {
    readonly execute: () => Promise<number>;
}

interface ParsedPlayOptions {
    demo: boolean;
    seed?: number;
    tickMs?: number;
}

interface ParsedSimulateOptions {
    seed?: number;
    width?: number;
    height?: number;
    maxTicks?: number;
}

interface ParsedTuneOptions extends ParsedSimulateOptions {
    runs: number;
}

const USAGE = 'Usage: tunnel-runner [play|simulate|tune] [options]';

const parseInteger = (value: string): number | undefined => {
    const parsed = parseInt(value, 10);
    return Number.isFinite(parsed) ? parsed : undefined;
};

const parsePlayArgs = (args: string[]): ParsedPlayOptions => {
    const options: ParsedPlayOptions = { demo: false };
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--demo') {
            options.demo = true;
        } else if (arg === '--seed' && i + 1 < args.length) {
            options.seed = parseInteger(args[i + 1]);
            i++;
        } else if (arg === '--tick-ms' && i + 1 < args.length) {
            options.tickMs = parseInteger(args[i + 1]);
            i++;
        }
    }
    return options;
};

const parseSimulateArgs = (args: string[]): ParsedSimulateOptions => {
    const options: ParsedSimulateOptions = {};
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--seed' && i + 1 < args.length) {
            options.seed = parseInteger(args[i + 1]);
            i++;
        } else if (arg === '--width' && i + 1 < args.length) {
            options.width = parseInteger(args[i + 1]);
            i++;
        } else if (arg === '--height' && i + 1 < args.length) {
            options.height = parseInteger(args[i + 1]);
            i++;
        } else if (arg === '--max-ticks' && i + 1 < args.length) {
            options.maxTicks = parseInteger(args[i + 1]);
            i++;
        }
    }
    return options;
};

const parseTuneArgs = (args: string[]): ParsedTuneOptions => {
    let runs: number = gameConfig.tune.defaultRuns;
    const rest: string[] = [];

    for (let i = 0; i < args.length; i++) {
        if (args[i] === '--runs' && i + 1 < args.length) {
            runs = parseInteger(args[i + 1]) ?? runs;
            i++;
        } else {
            rest.push(args[i]);
        }
    }

    return {
        ...parseSimulateArgs(rest),
        runs,
    } satisfies ParsedTuneOptions;
};

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export function createCli(): CliCommand {
    const execute = async (): Promise<number> => {
        const args = process.argv.slice(2);
        const hasCommand = args.length > 0 && !args[0].startsWith('--');
        const command = hasCommand ? args[0] : 'play';
        const restArgs = hasCommand ? args.slice(1) : args;

        if (command === 'play') {
            try {
                const result = await runPlay(parsePlayArgs(restArgs));
                console.log(formatFinalLine(result));
                return 0;
            } catch (error) {
                console.error(`Play failed: ${describeError(error)}`);
                return 1;
            }
        }

        if (command === 'simulate') {
            try {
                const result = await runHeadlessSimulation(parseSimulateArgs(restArgs));
                console.log(JSON.stringify(result));
                return 0;
            } catch (error) {
                console.error(`Simulation failed: ${describeError(error)}`);
                return 1;
            }
        }

        if (command === 'tune') {
            try {
                const result = await runTuningBot(parseTuneArgs(restArgs));
                console.log(JSON.stringify(result.summary));
                return 0;
            } catch (error) {
                console.error(`Tuning bot failed: ${describeError(error)}`);
                return 1;
            }
        }

        console.error(USAGE);
        return 1;
    };

    return {
        execute,
    };
}
