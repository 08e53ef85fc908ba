import { defineFamily } from '../core/family';
import { label } from '../core/translation';

/** Typing echo for characters and words (keyboard settings) */
export const TypingEcho = defineFamily({
    name: 'TypingEcho',
    kind: 'integer',
    members: { OFF: 0, EDIT_CONTROLS: 1, ALWAYS: 2 },
    labels: {
        OFF: label('Off'),
        EDIT_CONTROLS: label('Only in edit controls'),
        ALWAYS: label('Always'),
    },
});
