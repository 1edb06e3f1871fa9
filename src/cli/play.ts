import { createRandomRowGenerator } from 'game/row-generators';
import { runGameSession, type SessionControl, type SessionResult } from 'game/session';
import type { TerminalSurface } from 'render/contracts';
import { createTunnelPainter } from 'render/frame';
import { createTerminalKitSurface } from 'render/terminal-surface';
import { uint16 } from 'tunnel/index-type';
import { Tunnel } from 'tunnel/tunnel';
import { createBufferedLogWriter, createLogger, type LogWriter } from 'util/log';
import { createRandomManager } from 'util/random';

export interface PlayOptions {
    readonly demo: boolean;
    readonly seed?: number;
    readonly tickMs?: number;
}

export interface PlayDependencies {
    readonly surface?: TerminalSurface;
    readonly sleep?: (ms: number) => Promise<void>;
    readonly logWriter?: LogWriter;
}

export interface PlayResult extends SessionResult {
    readonly seed: number;
}

/**
 * Takes over the terminal for one game. The tunnel is as tall and wide as the
 * terminal; the terminal is handed back and buffered logs flushed even when
 * the session throws.
 */
export const runPlay = async (options: PlayOptions, dependencies: PlayDependencies = {}): Promise<PlayResult> => {
    const surface = dependencies.surface ?? createTerminalKitSurface();
    const buffered = createBufferedLogWriter(dependencies.logWriter);
    const logger = createLogger('play', { writer: buffered.write });
    const random = createRandomManager(typeof options.seed === 'number' ? options.seed : null);
    const generator = createRandomRowGenerator(uint16, random);
    const control: SessionControl = options.demo ? { mode: 'demo' } : { mode: 'keyboard', keys: surface };

    surface.open();
    try {
        const tunnel = new Tunnel(uint16, generator, uint16.fromCount(surface.rows), uint16.fromCount(surface.columns));
        const painter = createTunnelPainter(surface, uint16);
        logger.debug('tunnel created', { seed: random.seed(), rows: surface.rows, columns: surface.columns });

        const result = await runGameSession({
            tunnel,
            generator,
            control,
            paint: painter.paint,
            sleep: dependencies.sleep,
            config: typeof options.tickMs === 'number' ? { tickMs: options.tickMs } : undefined,
            logger,
        });

        return { ...result, seed: random.seed() };
    } finally {
        surface.close();
        buffered.flush();
    }
};
