import type { INodePropertyOptions } from 'n8n-workflow';

/** How a family's values are persisted and compared */
export type StorageKind = 'integer' | 'string' | 'integerFlags' | 'booleanFlag';

export type FlagKind = Extract<StorageKind, 'integerFlags' | 'booleanFlag'>;

export type StorageValue = number | string | boolean;

export type StorageValueOf<K extends StorageKind> =
    K extends 'string' ? string : K extends 'booleanFlag' ? boolean : number;

/** Raw values accepted by lookups; boolean flags are also persisted as 0/1 */
export type StoredValueOf<K extends StorageKind> =
    K extends 'booleanFlag' ? boolean | 0 | 1 : StorageValueOf<K>;

export type DisplayKey = Readonly<{
    /** Untranslated source string, e.g. "Only in edit controls" */
    message: string;
    /** Optional disambiguation context, e.g. "line indentation setting" */
    context?: string;
}>;

/**
 * Catalog entry for one option family. `labels` must name every key of
 * `members`, so a member without a label does not compile.
 */
export type FamilyDefinition<K extends StorageKind, N extends string> = Readonly<{
    name: string;
    kind: K;
    members: { readonly [P in N]: StorageValueOf<K> };
    labels: { readonly [P in N]: DisplayKey };
    /** Require non-composite values to form a gapless run */
    continuous?: boolean;
}>;

/** Minimal view of a member used by adapters outside the family */
export interface MemberLike {
    readonly name: string;
    readonly value: StorageValue;
    readonly displayString: string;
}

/** Anything with a name and an ordered member list */
export interface MemberSource<M extends MemberLike = MemberLike> {
    readonly name: string;
    allMembers(): ReadonlyArray<M>;
}

/** Convert a family to n8n dropdown options, in declaration order */
export function toOptions(family: MemberSource): INodePropertyOptions[] {
    return family.allMembers().map((m) => ({
        name: m.displayString,
        value: m.value,
        description: m.name,
    }));
}
