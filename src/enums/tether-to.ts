import { defineFamily } from '../core/family';
import { label } from '../core/translation';

/** What braille follows: the focus, the review cursor, or whichever moved last */
export const TetherTo = defineFamily({
    name: 'TetherTo',
    kind: 'string',
    members: {
        AUTO: 'auto',
        FOCUS: 'focus',
        REVIEW: 'review',
    },
    labels: {
        AUTO: label('automatically'),
        FOCUS: label('to focus'),
        REVIEW: label('to review'),
    },
});
