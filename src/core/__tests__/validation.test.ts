/**
 * @fileoverview Definition-time checks: every catalog defect aborts defineFamily.
 * @module core/__tests__/validation.test
 */

import type { DisplayKey } from '../../enums/types';
import { FamilyDefinitionError } from '../errors';
import { defineFamily } from '../family';
import { label } from '../translation';

function captureDefinitionError(define: () => unknown): FamilyDefinitionError {
    try {
        define();
    } catch (err) {
        if (err instanceof FamilyDefinitionError) return err;
        throw err;
    }
    throw new Error('expected defineFamily to fail');
}

describe('defineFamily validation', () => {
    describe('continuity', () => {
        it('should accept a gapless integer run', () => {
            const Mode = defineFamily({
                name: 'Mode',
                kind: 'integer',
                continuous: true,
                members: { FOLLOWER: 0, LEADER: 1 },
                labels: { FOLLOWER: label('Follower'), LEADER: label('Leader') },
            });
            expect(Mode.continuous).toBe(true);
        });

        it('should reject a gap in an integer run', () => {
            const err = captureDefinitionError(() =>
                defineFamily({
                    name: 'Mode',
                    kind: 'integer',
                    continuous: true,
                    members: { FOLLOWER: 0, LEADER: 2 },
                    labels: { FOLLOWER: label('Follower'), LEADER: label('Leader') },
                }),
            );
            expect(err.fault).toBe('discontinuous');
            expect(err.family).toBe('Mode');
            expect(err.message).toBe('[Mode] discontinuous: missing value 1');
        });

        it('should allow runs that start above zero', () => {
            expect(() =>
                defineFamily({
                    name: 'Level',
                    kind: 'integer',
                    continuous: true,
                    members: { ONE: 1, TWO: 2, THREE: 3 },
                    labels: { ONE: label('One'), TWO: label('Two'), THREE: label('Three') },
                }),
            ).not.toThrow();
        });

        it('should check flag families by bit position, ignoring composites', () => {
            expect(() =>
                defineFamily({
                    name: 'Keys',
                    kind: 'integerFlags',
                    continuous: true,
                    members: { NONE: 0, A: 1, B: 2, C: 4, ALL: 7 },
                    labels: {
                        NONE: label('None'),
                        A: label('A'),
                        B: label('B'),
                        C: label('C'),
                        ALL: label('All'),
                    },
                }),
            ).not.toThrow();

            const err = captureDefinitionError(() =>
                defineFamily({
                    name: 'Keys',
                    kind: 'integerFlags',
                    continuous: true,
                    members: { A: 1, C: 4 },
                    labels: { A: label('A'), C: label('C') },
                }),
            );
            expect(err.message).toBe('[Keys] discontinuous: missing bit 2');
        });

        it('should treat boolean flags as 0 and 1', () => {
            expect(() =>
                defineFamily({
                    name: 'Server',
                    kind: 'booleanFlag',
                    continuous: true,
                    members: { EXISTING: false, LOCAL: true },
                    labels: { EXISTING: label('Existing'), LOCAL: label('Local') },
                }),
            ).not.toThrow();
        });

        it('should refuse continuity for string families', () => {
            const err = captureDefinitionError(() =>
                defineFamily({
                    name: 'Tokens',
                    kind: 'string',
                    continuous: true,
                    members: { A: 'a' },
                    labels: { A: label('A') },
                }),
            );
            expect(err.message).toBe('[Tokens] discontinuous: string families cannot be continuous');
        });
    });

    describe('uniqueness', () => {
        it('should reject two members sharing a value', () => {
            const err = captureDefinitionError(() =>
                defineFamily({
                    name: 'Dup',
                    kind: 'integer',
                    members: { A: 1, B: 1 },
                    labels: { A: label('A'), B: label('B') },
                }),
            );
            expect(err.fault).toBe('duplicateValue');
            expect(err.members).toEqual(['A', 'B']);
            expect(err.message).toBe('[Dup] duplicateValue: A, B share the value 1');
        });

        it('should reject duplicate strings', () => {
            const err = captureDefinitionError(() =>
                defineFamily({
                    name: 'Dup',
                    kind: 'string',
                    members: { ON: 'on', ENABLED: 'on' },
                    labels: { ON: label('On'), ENABLED: label('Enabled') },
                }),
            );
            expect(err.message).toBe('[Dup] duplicateValue: ON, ENABLED share the value "on"');
        });
    });

    describe('labels', () => {
        it('should reject members without a label', () => {
            const labels: Record<string, DisplayKey> = { A: label('A') };
            const err = captureDefinitionError(() =>
                defineFamily<'integer', string>({ name: 'Partial', kind: 'integer', members: { A: 0, B: 1, C: 2 }, labels }),
            );
            expect(err.fault).toBe('missingLabel');
            expect(err.members).toEqual(['B', 'C']);
            expect(err.message).toBe('[Partial] missingLabel: no display label for B, C');
        });

        it('should reject empty messages', () => {
            const err = captureDefinitionError(() =>
                defineFamily({
                    name: 'Blank',
                    kind: 'integer',
                    members: { A: 0 },
                    labels: { A: label('') },
                }),
            );
            expect(err.members).toEqual(['A']);
        });
    });

    describe('names and values', () => {
        it('should require UPPER_SNAKE_CASE member names', () => {
            const err = captureDefinitionError(() =>
                defineFamily({
                    name: 'Bad',
                    kind: 'integer',
                    members: { allMembers: 0 },
                    labels: { allMembers: label('All') },
                }),
            );
            expect(err.fault).toBe('invalidName');
            expect(err.members).toEqual(['allMembers']);
        });

        it('should reject negative and fractional integers', () => {
            expect(
                captureDefinitionError(() =>
                    defineFamily({ name: 'Neg', kind: 'integer', members: { A: -1 }, labels: { A: label('A') } }),
                ).message,
            ).toBe('[Neg] invalidValue: A must be a non-negative integer, got -1');
            expect(
                captureDefinitionError(() =>
                    defineFamily({ name: 'Frac', kind: 'integer', members: { A: 0.5 }, labels: { A: label('A') } }),
                ).fault,
            ).toBe('invalidValue');
        });

        it('should reject flag masks wider than 31 bits', () => {
            const err = captureDefinitionError(() =>
                defineFamily({ name: 'Wide', kind: 'integerFlags', members: { TOP: 2 ** 31 }, labels: { TOP: label('Top') } }),
            );
            expect(err.fault).toBe('invalidValue');
        });
    });

    describe('composites', () => {
        it('should reject composites with bits no single flag declares', () => {
            const err = captureDefinitionError(() =>
                defineFamily({
                    name: 'Output',
                    kind: 'integerFlags',
                    members: { SPEECH: 1, BRAILLE: 2, EVERYTHING: 5 },
                    labels: { SPEECH: label('Speech'), BRAILLE: label('Braille'), EVERYTHING: label('Everything') },
                }),
            );
            expect(err.fault).toBe('strayCompositeBits');
            expect(err.message).toBe(
                '[Output] strayCompositeBits: EVERYTHING sets bits 0b100 that no single-flag member declares',
            );
        });
    });
});
