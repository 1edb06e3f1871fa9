import type { KeyAction } from './contracts';

const KEY_BINDINGS: Readonly<Record<string, KeyAction>> = {
    LEFT: 'left',
    RIGHT: 'right',
    q: 'quit',
    c: 'quit',
    CTRL_C: 'quit',
};

export const resolveKeyAction = (keyName: string | null): KeyAction | null => {
    if (keyName === null) {
        return null;
    }
    return Object.hasOwn(KEY_BINDINGS, keyName) ? KEY_BINDINGS[keyName] : null;
};
