import type { MemberSource, StorageValue } from '../enums/types';
import { DefinitionErrorFactory } from './errors';
import type { OptionMember } from './member';

/**
 * Build a total conversion from a family's members to another subsystem's values.
 * `table` is typed over every member name; a gap or a stray entry also fails here,
 * at definition time, so the returned function never misses.
 *
 * @param target Name of the target domain, used in error messages
 */
export function defineConversion<N extends string, V extends StorageValue, T>(
    family: MemberSource<OptionMember<N, V>>,
    target: string,
    table: { readonly [P in N]: T },
): (member: OptionMember<N, V>) => T {
    const declared = new Set<string>(family.allMembers().map((m) => m.name));
    const mapped = new Set(Object.keys(table));
    const missing = [...declared].filter((name) => !mapped.has(name));
    const unknown = [...mapped].filter((name) => !declared.has(name));
    if (missing.length || unknown.length) {
        throw DefinitionErrorFactory.nonExhaustiveMapping(family.name, target, missing, unknown);
    }

    const frozen = Object.freeze({ ...table });
    return (member) => frozen[member.name];
}
