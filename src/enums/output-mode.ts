import { defineFamily } from '../core/family';
import { label } from '../core/translation';

const SPEECH = 0b01;
const BRAILLE = 0b10;

/**
 * Where to report information such as font attributes.
 * The config stores a bitmask; test single outputs with `OutputMode.hasFlag`.
 */
export const OutputMode = defineFamily({
    name: 'OutputMode',
    kind: 'integerFlags',
    members: {
        OFF: 0b00,
        SPEECH,
        BRAILLE,
        SPEECH_AND_BRAILLE: SPEECH | BRAILLE,
    },
    labels: {
        OFF: label('Off'),
        SPEECH: label('Speech'),
        BRAILLE: label('Braille'),
        SPEECH_AND_BRAILLE: label('Speech and braille'),
    },
});
