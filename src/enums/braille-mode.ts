import { defineFamily } from '../core/family';
import { label } from '../core/translation';

export const BrailleMode = defineFamily({
    name: 'BrailleMode',
    kind: 'string',
    members: {
        FOLLOW_CURSORS: 'followCursors',
        SPEECH_OUTPUT: 'speechOutput',
    },
    labels: {
        FOLLOW_CURSORS: label('follow cursors'),
        SPEECH_OUTPUT: label('display speech output'),
    },
});
