import { describe, expect, it } from 'vitest';
import { resolveKeyAction } from 'input/index';

describe('input barrel', () => {
    it('re-exports the key bindings', () => {
        expect(resolveKeyAction('LEFT')).toBe('left');
    });
});
