import type { FlagKind, StorageKind } from '../enums/types';

// Members are also properties of the family object and must not collide with its camelCase API
export const MEMBER_NAME_PATTERN = /^[A-Z][A-Z0-9_]*$/;

export const FLAG_KINDS: ReadonlySet<StorageKind> = new Set<FlagKind>(['integerFlags', 'booleanFlag']);

export const isFlagKind = (kind: StorageKind): kind is FlagKind => FLAG_KINDS.has(kind);
