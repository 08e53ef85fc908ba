import type { DisplayKey } from '../enums/types';
import { label } from './translation';

/** Localizable names of keyboard keys, keyed by the key identifier used in gestures */
const KEY_LABELS = {
    capslock: label('caps lock'),
    numpadinsert: label('numpad insert'),
    insert: label('insert'),
} as const satisfies Record<string, DisplayKey>;

export type KeyIdentifier = keyof typeof KEY_LABELS;

export function keyLabel(key: KeyIdentifier): DisplayKey {
    return KEY_LABELS[key];
}
