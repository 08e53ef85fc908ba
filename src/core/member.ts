import type { DisplayKey, MemberLike, StorageValue } from '../enums/types';
import { translate } from './translation';

/**
 * One value of an option family. Created once when the family is defined and
 * frozen; lookups always hand back the same instance.
 *
 * Use `member.value` to persist or compare with the config and
 * `member.displayString` for the label shown in settings UI.
 */
export class OptionMember<N extends string = string, V extends StorageValue = StorageValue> implements MemberLike {
    constructor(
        public readonly family: string,
        public readonly name: N,
        public readonly value: V,
        public readonly displayKey: DisplayKey,
        /** Flags only: the value ORs together more than one declared bit */
        public readonly composite: boolean,
    ) {
        Object.freeze(this);
    }

    /** Localized label, resolved through the translation installed at call time */
    get displayString(): string {
        return translate(this.displayKey);
    }

    toString(): string {
        return `${this.family}.${this.name}`;
    }
}
