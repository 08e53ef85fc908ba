import { defineFamily } from '../core/family';
import { contextLabel } from '../core/translation';

const CONTEXT = 'line indentation setting';

/**
 * Line indentation reporting (document formatting).
 * SPEECH_AND_TONES is a value of its own here, not a flag combination.
 */
export const ReportLineIndentation = defineFamily({
    name: 'ReportLineIndentation',
    kind: 'integer',
    members: { OFF: 0, SPEECH: 1, TONES: 2, SPEECH_AND_TONES: 3 },
    labels: {
        OFF: contextLabel(CONTEXT, 'Off'),
        SPEECH: contextLabel(CONTEXT, 'Speech'),
        TONES: contextLabel(CONTEXT, 'Tones'),
        SPEECH_AND_TONES: contextLabel(CONTEXT, 'Both Speech and Tones'),
    },
});
