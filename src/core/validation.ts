import type { DisplayKey, StorageKind, StorageValue } from '../enums/types';
import { MEMBER_NAME_PATTERN } from './constants';
import { DefinitionErrorFactory } from './errors';
import { bitIndex, gapsInRun, isSingleBit } from './utils';

/*
 * Definition-time checks, run once per family while the catalog module loads.
 * Every failure is a FamilyDefinitionError: a defect in the catalog, never bad input.
 */

export type MemberEntry = Readonly<{ name: string; value: StorageValue }>;

// Bitwise operators work on 32-bit signed integers
const MAX_FLAG_VALUE = 0x7fffffff;

export function verifyNames(family: string, names: ReadonlyArray<string>): void {
    for (const name of names) {
        if (!MEMBER_NAME_PATTERN.test(name)) throw DefinitionErrorFactory.invalidName(family, name);
    }
}

export function verifyValues(family: string, kind: StorageKind, entries: ReadonlyArray<MemberEntry>): void {
    for (const { name, value } of entries) {
        switch (kind) {
            case 'string':
                if (typeof value !== 'string') throw DefinitionErrorFactory.invalidValue(family, name, 'a string', value);
                break;
            case 'booleanFlag':
                if (typeof value !== 'boolean') throw DefinitionErrorFactory.invalidValue(family, name, 'a boolean', value);
                break;
            case 'integer':
                if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
                    throw DefinitionErrorFactory.invalidValue(family, name, 'a non-negative integer', value);
                }
                break;
            case 'integerFlags':
                if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > MAX_FLAG_VALUE) {
                    throw DefinitionErrorFactory.invalidValue(family, name, 'a 31-bit flag mask', value);
                }
                break;
        }
    }
}

export function verifyLabels(
    family: string,
    names: ReadonlyArray<string>,
    labels: Readonly<Record<string, DisplayKey | undefined>>,
): void {
    const missing = names.filter((name) => {
        const key = labels[name];
        return key === undefined || key.message === '';
    });
    if (missing.length) throw DefinitionErrorFactory.missingLabel(family, missing);
}

export function verifyUnique(family: string, entries: ReadonlyArray<MemberEntry>): void {
    const seen = new Map<StorageValue, string>();
    for (const { name, value } of entries) {
        const previous = seen.get(value);
        if (previous !== undefined) throw DefinitionErrorFactory.duplicateValue(family, [previous, name], value);
        seen.set(value, name);
    }
}

/**
 * Non-composite values must form a step-1 run from their minimum.
 * Flags are checked by bit position, so 1, 2, 4 is continuous and 1, 4 is not.
 */
export function verifyContinuous(family: string, kind: StorageKind, entries: ReadonlyArray<MemberEntry>): void {
    const numeric: number[] = [];
    for (const { value } of entries) {
        if (typeof value === 'boolean') numeric.push(value ? 1 : 0);
        else if (typeof value === 'number') numeric.push(value);
    }
    switch (kind) {
        case 'string':
            throw DefinitionErrorFactory.notContinuable(family);
        case 'integerFlags': {
            const missing = gapsInRun(numeric.filter(isSingleBit).map(bitIndex));
            if (missing.length) throw DefinitionErrorFactory.discontinuous(family, missing.map((bit) => 2 ** bit), 'bit');
            return;
        }
        default: {
            const missing = gapsInRun(numeric);
            if (missing.length) throw DefinitionErrorFactory.discontinuous(family, missing, 'value');
        }
    }
}

/** Every bit of a composite flag must come from a declared single-bit member. */
export function verifyComposites(family: string, entries: ReadonlyArray<MemberEntry>): void {
    let declared = 0;
    for (const { value } of entries) {
        if (typeof value === 'number' && isSingleBit(value)) declared |= value;
    }
    for (const { name, value } of entries) {
        if (typeof value !== 'number' || isSingleBit(value)) continue;
        const stray = value & ~declared;
        if (stray !== 0) throw DefinitionErrorFactory.strayCompositeBits(family, name, stray);
    }
}

export const isComposite = (kind: StorageKind, value: StorageValue): boolean =>
    kind === 'integerFlags' && typeof value === 'number' && value !== 0 && !isSingleBit(value);
