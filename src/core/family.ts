import type {
    FamilyDefinition,
    MemberSource,
    StorageKind,
    StorageValue,
    StorageValueOf,
    StoredValueOf,
} from '../enums/types';
import { isFlagKind } from './constants';
import { DebugManager } from './debug';
import { UnknownMemberError } from './errors';
import { OptionMember } from './member';
import { isSingleBit, typedKeys } from './utils';
import {
    isComposite,
    verifyComposites,
    verifyContinuous,
    verifyLabels,
    verifyNames,
    verifyUnique,
    verifyValues,
    type MemberEntry,
} from './validation';

export type MemberOf<K extends StorageKind, N extends string> = OptionMember<N, StorageValueOf<K>>;

export type MemberRecord<K extends StorageKind, N extends string> = {
    readonly [P in N]: OptionMember<P, StorageValueOf<K>>;
};

/** A family with its members also reachable as properties, e.g. `OutputMode.SPEECH` */
export type EnumFamily<K extends StorageKind, N extends string> = OptionFamily<K, N> & MemberRecord<K, N>;

export type AnyOptionFamily = OptionFamily<StorageKind, string>;

export type MemberNameOf<F extends { allMembers(): ReadonlyArray<{ name: string }> }> =
    ReturnType<F['allMembers']>[number]['name'];

const MAX_FLAG_MASK = 0x7fffffff;

/**
 * A closed, ordered set of option members sharing one storage kind.
 * Built by {@link defineFamily}; immutable afterwards.
 */
export class OptionFamily<K extends StorageKind, N extends string>
    implements Iterable<MemberOf<K, N>>, MemberSource<MemberOf<K, N>>
{
    private readonly ordered: ReadonlyArray<MemberOf<K, N>>;
    private readonly byValue: ReadonlyMap<StorageValue, MemberOf<K, N>>;
    private readonly byName: ReadonlyMap<string, MemberOf<K, N>>;

    constructor(
        public readonly name: string,
        public readonly kind: K,
        members: ReadonlyArray<MemberOf<K, N>>,
        public readonly continuous: boolean,
    ) {
        this.ordered = Object.freeze([...members]);
        this.byValue = new Map<StorageValue, MemberOf<K, N>>(members.map((m) => [m.value, m]));
        this.byName = new Map<string, MemberOf<K, N>>(members.map((m) => [m.name, m]));
    }

    get size(): number {
        return this.ordered.length;
    }

    /** Members in declaration order; the same frozen array on every call */
    allMembers(): ReadonlyArray<MemberOf<K, N>> {
        return this.ordered;
    }

    [Symbol.iterator](): Iterator<MemberOf<K, N>> {
        return this.ordered[Symbol.iterator]();
    }

    /**
     * Member for a raw stored value. Flags families match whole values only;
     * test single bits with {@link OptionFamily.hasFlag}.
     * @throws UnknownMemberError when no member carries the value
     */
    fromValue(raw: StoredValueOf<K>): MemberOf<K, N> {
        const member = this.tryFromValue(raw);
        if (!member) throw new UnknownMemberError(this.name, 'value', raw);
        return member;
    }

    tryFromValue(raw: unknown): MemberOf<K, N> | undefined {
        const value = this.normalize(raw);
        return value === undefined ? undefined : this.byValue.get(value);
    }

    has(raw: unknown): boolean {
        return this.tryFromValue(raw) !== undefined;
    }

    /** @throws UnknownMemberError when no member has that name */
    fromName(name: string): MemberOf<K, N> {
        const member = this.byName.get(name);
        if (!member) throw new UnknownMemberError(this.name, 'name', name);
        return member;
    }

    displayLabel(member: MemberOf<K, N>): string {
        if (this.byName.get(member.name) !== member) throw new UnknownMemberError(this.name, 'name', member.name);
        return member.displayString;
    }

    /** Bitwise OR of the given flags; for boolean flags, whether any is set */
    combine(this: OptionFamily<'integerFlags', N>, ...flags: OptionMember<N, number>[]): number;
    combine(this: OptionFamily<'booleanFlag', N>, ...flags: OptionMember<N, boolean>[]): boolean;
    combine(...flags: OptionMember<N, StorageValue>[]): number | boolean {
        if (this.kind === 'booleanFlag') return flags.some((f) => f.value === true);
        let mask = 0;
        for (const { value } of flags) {
            if (typeof value === 'number') mask |= value;
        }
        return mask;
    }

    /** Whether every bit of a non-zero flag is set in the raw value */
    hasFlag(this: OptionFamily<'integerFlags', N>, raw: number, flag: OptionMember<N, number>): boolean;
    hasFlag(this: OptionFamily<'booleanFlag', N>, raw: boolean | 0 | 1, flag: OptionMember<N, boolean>): boolean;
    hasFlag(raw: StorageValue, flag: OptionMember<N, StorageValue>): boolean {
        if (typeof flag.value === 'boolean') return flag.value && (raw === true || raw === 1);
        if (typeof flag.value !== 'number' || typeof raw !== 'number' || flag.value === 0) return false;
        return (raw & flag.value) === flag.value;
    }

    /**
     * Single-bit members set in a raw bitmask, in declaration order.
     * @throws UnknownMemberError when the mask carries an undeclared bit
     */
    decompose(this: OptionFamily<'integerFlags', N>, raw: number): OptionMember<N, number>[] {
        const singles = this.ordered.filter((m) => isSingleBit(m.value));
        const declared = singles.reduce((mask, m) => mask | m.value, 0);
        if (!Number.isInteger(raw) || raw < 0 || raw > MAX_FLAG_MASK || (raw & ~declared) !== 0) {
            throw new UnknownMemberError(this.name, 'value', raw);
        }
        return singles.filter((m) => (raw & m.value) !== 0);
    }

    toString(): string {
        return this.name;
    }

    private normalize(raw: unknown): StorageValue | undefined {
        switch (this.kind) {
            case 'string':
                return typeof raw === 'string' ? raw : undefined;
            case 'booleanFlag':
                if (typeof raw === 'boolean') return raw;
                return raw === 0 || raw === 1 ? raw === 1 : undefined;
            default:
                return typeof raw === 'number' && Number.isInteger(raw) ? raw : undefined;
        }
    }
}

/**
 * Validate a catalog definition and build its family.
 * @throws FamilyDefinitionError for any defect in the definition
 */
export function defineFamily<K extends StorageKind, N extends string>(
    definition: FamilyDefinition<K, N>,
): EnumFamily<K, N> {
    const { name, kind } = definition;
    const names = typedKeys(definition.members);
    const entries: MemberEntry[] = names.map((member) => ({ name: member, value: definition.members[member] }));

    verifyNames(name, names);
    verifyValues(name, kind, entries);
    verifyLabels(name, names, definition.labels);
    verifyUnique(name, entries);
    if (isFlagKind(kind)) verifyComposites(name, entries);
    if (definition.continuous) verifyContinuous(name, kind, entries);

    const members = names.map(
        (member) =>
            new OptionMember(
                name,
                member,
                definition.members[member],
                definition.labels[member],
                isComposite(kind, definition.members[member]),
            ),
    );
    const family = new OptionFamily<K, N>(name, kind, members, definition.continuous ?? false);
    const byName = Object.fromEntries(members.map((m): [string, MemberOf<K, N>] => [m.name, m])) as MemberRecord<K, N>;
    const enumFamily = Object.assign(family, byName);
    Object.freeze(enumFamily);

    DebugManager.logDefinition(enumFamily);
    return enumFamily;
}
