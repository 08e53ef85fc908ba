export type DefinitionFault =
  | 'invalidName'
  | 'invalidValue'
  | 'missingLabel'
  | 'duplicateValue'
  | 'discontinuous'
  | 'strayCompositeBits'
  | 'nonExhaustiveMapping';

export type LookupMode = 'value' | 'name';

/**
 * Raised when a raw stored value (or member name) matches no member of a family.
 * Recoverable: the caller decides whether to fall back to a default.
 */
export class UnknownMemberError extends Error {
  constructor(
    public readonly family: string,
    public readonly lookup: LookupMode,
    public readonly input: unknown,
  ) {
    super(formatErrorMessage(family, 'unknownMember', `no member with ${lookup} ${describeInput(input)}`));
    this.name = 'UnknownMemberError';
  }
}

/**
 * Raised while a family is being defined. Indicates a defect in the catalog,
 * never bad input, so it is not meant to be caught.
 */
export class FamilyDefinitionError extends Error {
  constructor(
    public readonly family: string,
    public readonly fault: DefinitionFault,
    public readonly members: ReadonlyArray<string>,
    detail: string,
  ) {
    super(formatErrorMessage(family, fault, detail));
    this.name = 'FamilyDefinitionError';
  }
}

function formatErrorMessage(family: string, fault: string, detail: string): string {
  return `[${family}] ${fault}: ${detail}`;
}

function describeInput(input: unknown): string {
  if (typeof input === 'string') return JSON.stringify(input);
  return String(input);
}

/**
 * Factory methods for the definition-time faults
 */
export class DefinitionErrorFactory {
  static invalidName(family: string, name: string): FamilyDefinitionError {
    return new FamilyDefinitionError(
      family,
      'invalidName',
      [name],
      `member name ${JSON.stringify(name)} must be UPPER_SNAKE_CASE`,
    );
  }

  static invalidValue(family: string, member: string, expected: string, value: unknown): FamilyDefinitionError {
    return new FamilyDefinitionError(
      family,
      'invalidValue',
      [member],
      `${member} must be ${expected}, got ${describeInput(value)}`,
    );
  }

  static missingLabel(family: string, members: ReadonlyArray<string>): FamilyDefinitionError {
    return new FamilyDefinitionError(
      family,
      'missingLabel',
      members,
      `no display label for ${members.join(', ')}`,
    );
  }

  static duplicateValue(family: string, members: ReadonlyArray<string>, value: unknown): FamilyDefinitionError {
    return new FamilyDefinitionError(
      family,
      'duplicateValue',
      members,
      `${members.join(', ')} share the value ${describeInput(value)}`,
    );
  }

  static discontinuous(family: string, missing: ReadonlyArray<number>, unit: 'value' | 'bit'): FamilyDefinitionError {
    return new FamilyDefinitionError(
      family,
      'discontinuous',
      [],
      `missing ${unit}${missing.length > 1 ? 's' : ''} ${missing.join(', ')}`,
    );
  }

  static notContinuable(family: string): FamilyDefinitionError {
    return new FamilyDefinitionError(
      family,
      'discontinuous',
      [],
      'string families cannot be continuous',
    );
  }

  static strayCompositeBits(family: string, member: string, bits: number): FamilyDefinitionError {
    return new FamilyDefinitionError(
      family,
      'strayCompositeBits',
      [member],
      `${member} sets bits 0b${bits.toString(2)} that no single-flag member declares`,
    );
  }

  static nonExhaustiveMapping(
    family: string,
    target: string,
    missing: ReadonlyArray<string>,
    unknown: ReadonlyArray<string>,
  ): FamilyDefinitionError {
    const parts: string[] = [];
    if (missing.length) parts.push(`unmapped ${missing.join(', ')}`);
    if (unknown.length) parts.push(`unknown ${unknown.join(', ')}`);
    return new FamilyDefinitionError(
      family,
      'nonExhaustiveMapping',
      [...missing, ...unknown],
      `conversion to ${target}: ${parts.join('; ')}`,
    );
  }
}
