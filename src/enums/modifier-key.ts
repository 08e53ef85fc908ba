import { keyLabel } from '../core/key-labels';
import { defineFamily } from '../core/family';

/**
 * Keys usable as the screen reader modifier ("Select modifier keys" in keyboard settings).
 * The config stores a bitwise combination of one or more of these values.
 */
export const ModifierKey = defineFamily({
    name: 'ModifierKey',
    kind: 'integerFlags',
    members: {
        CAPS_LOCK: 1,
        NUMPAD_INSERT: 2,
        EXTENDED_INSERT: 4,
    },
    labels: {
        CAPS_LOCK: keyLabel('capslock'),
        NUMPAD_INSERT: keyLabel('numpadinsert'),
        EXTENDED_INSERT: keyLabel('insert'),
    },
});
