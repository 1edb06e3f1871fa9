import { setTimeout as delay } from 'node:timers/promises';
import { gameConfig, type SessionConfig } from 'config/game';
import type { KeySource } from 'input/contracts';
import { resolveKeyAction } from 'input/keyboard';
import type { TunnelCell } from 'tunnel/cell-cursor';
import type { RowGenerator } from 'tunnel/row';
import type { Tunnel } from 'tunnel/tunnel';
import { rootLogger, type Logger } from 'util/log';
import { chooseDemoMove } from './demo-player';

export type SessionOutcome = 'collision' | 'quit' | 'demo-complete' | 'empty-tunnel';

export type SessionControl = { readonly mode: 'demo' } | { readonly mode: 'keyboard'; readonly keys: KeySource };

export interface SessionResult {
    readonly outcome: SessionOutcome;
    readonly score: number;
    readonly message: string;
}

export interface GameSessionOptions<I> {
    readonly tunnel: Tunnel<I>;
    readonly generator: RowGenerator<I>;
    readonly control: SessionControl;
    readonly paint?: (cells: Iterable<TunnelCell<I>>, score: number) => void;
    readonly sleep?: (ms: number) => Promise<void>;
    readonly config?: Partial<SessionConfig>;
    readonly logger?: Logger;
}

const OUTCOME_MESSAGES: Record<SessionOutcome, string> = {
    collision: 'Game over!',
    quit: 'Quitting because player pressed quit key ...',
    'demo-complete': 'Demo complete!',
    'empty-tunnel': 'Tunnel too small to play!',
};

const defaultSleep = async (ms: number): Promise<void> => {
    await delay(ms);
};

export const formatFinalLine = (result: SessionResult): string => `${result.message} Final score: ${result.score}`;

/**
 * Runs ticks until the player collides, quits, or the demo hits its score
 * limit. Each tick paints, takes one input, then scrolls the tunnel a row.
 */
export const runGameSession = async <I>(options: GameSessionOptions<I>): Promise<SessionResult> => {
    const { tunnel, generator, control, paint } = options;
    const sleep = options.sleep ?? defaultSleep;
    const config: SessionConfig = { ...gameConfig.session, ...options.config };
    const logger = (options.logger ?? rootLogger).child('session');
    let score = 0;

    const finish = (outcome: SessionOutcome): SessionResult => {
        const result: SessionResult = { outcome, score, message: OUTCOME_MESSAGES[outcome] };
        logger.info('session finished', { outcome, score });
        return result;
    };

    logger.info('session started', {
        mode: control.mode,
        width: tunnel.index.toNumber(tunnel.corridorWidth),
        rows: tunnel.rowCount,
    });

    for (;;) {
        paint?.(tunnel.cells(), score);

        if (control.mode === 'demo') {
            await sleep(config.tickMs);
            if (score >= config.demoScoreLimit) {
                return finish('demo-complete');
            }
            const decision = chooseDemoMove(tunnel.index, tunnel.cells());
            if (decision === 'left') {
                tunnel.movePlayerLeft();
            } else if (decision === 'right') {
                tunnel.movePlayerRight();
            }
        } else {
            const action = resolveKeyAction(await control.keys.nextKey(config.keyPollTimeoutMs));
            if (action === 'quit') {
                return finish('quit');
            }
            if (action === 'left') {
                tunnel.movePlayerLeft();
            } else if (action === 'right') {
                tunnel.movePlayerRight();
            }
        }

        tunnel.step(generator);
        if (tunnel.rowCount === 0) {
            return finish('empty-tunnel');
        }
        if (tunnel.isCollision()) {
            return finish('collision');
        }

        score += 1;
    }
};
