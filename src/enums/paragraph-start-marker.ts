import { defineFamily } from '../core/family';
import { contextLabel } from '../core/translation';

const CONTEXT = 'paragraphMarker';

/** Text inserted in braille at the start of each paragraph */
export const ParagraphStartMarker = defineFamily({
    name: 'ParagraphStartMarker',
    kind: 'string',
    members: {
        NONE: '',
        SPACE: ' ',
        PILCROW: '¶',
    },
    labels: {
        NONE: contextLabel(CONTEXT, 'No paragraph start marker (default)'),
        SPACE: contextLabel(CONTEXT, 'Double space (  )'),
        PILCROW: contextLabel(CONTEXT, 'Pilcrow (¶)'),
    },
});
