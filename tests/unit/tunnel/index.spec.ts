import { describe, expect, it } from 'vitest';
import { LOOKAHEAD_BIAS, Tunnel, createRowBuffer, uint32, type RowGenerator } from 'tunnel/index';

describe('tunnel barrel', () => {
    it('exposes everything needed to build and scroll a tunnel', () => {
        const generator: RowGenerator<number> = {
            chooseInitialPlayerOffset: (width) => uint32.half(width),
            chooseNextMove: () => 'narrow-from-right',
        };
        const tunnel = new Tunnel(uint32, generator, 10, 30);

        expect(tunnel.rowCount).toBe(10 - LOOKAHEAD_BIAS);
        expect(tunnel.playerColumn).toBe(15);
        expect(createRowBuffer<number>().size()).toBe(0);
    });
});
