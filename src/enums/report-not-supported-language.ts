import { defineFamily } from '../core/family';
import { contextLabel } from '../core/translation';

const CONTEXT = 'reportLanguage';

/** How to signal text in a language the current synthesizer cannot speak */
export const ReportNotSupportedLanguage = defineFamily({
    name: 'ReportNotSupportedLanguage',
    kind: 'string',
    members: {
        SPEECH: 'speech',
        BEEP: 'beep',
        OFF: 'off',
    },
    labels: {
        SPEECH: contextLabel(CONTEXT, 'Speech'),
        BEEP: contextLabel(CONTEXT, 'Beep'),
        OFF: contextLabel(CONTEXT, 'Off'),
    },
});
