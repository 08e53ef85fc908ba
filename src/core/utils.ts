/** Object.keys, keeping the record's key type */
export const typedKeys = <K extends string>(record: { readonly [P in K]: unknown }): K[] =>
    Object.keys(record) as K[];

export const isSingleBit = (value: number): boolean => value !== 0 && (value & (value - 1)) === 0;

export const bitIndex = (value: number): number => 31 - Math.clz32(value);

/** Values in [min, max] that are absent from the given set */
export function gapsInRun(values: ReadonlyArray<number>): number[] {
    if (values.length === 0) return [];
    const present = new Set(values);
    const min = Math.min(...values);
    const max = Math.max(...values);
    const missing: number[] = [];
    for (let v = min; v <= max; v++) {
        if (!present.has(v)) missing.push(v);
    }
    return missing;
}
