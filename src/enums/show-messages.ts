import { defineFamily } from '../core/family';
import { label } from '../core/translation';

/** How long braille messages stay on the display */
export const ShowMessages = defineFamily({
    name: 'ShowMessages',
    kind: 'integer',
    members: { DISABLED: 0, USE_TIMEOUT: 1, SHOW_INDEFINITELY: 2 },
    labels: {
        // messages are never shown
        DISABLED: label('Disabled'),
        USE_TIMEOUT: label('Use timeout'),
        SHOW_INDEFINITELY: label('Show indefinitely'),
    },
});
