/**
 * A plain string-keyed object, as produced by the file decoders.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return false;
    }
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

/**
 * Any non-array object that fields can be written to, including class
 * instances handed in as the configuration target.
 */
export function isObjectTarget(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object'
        && value !== null
        && !Array.isArray(value)
        && !(value instanceof Uint8Array);
}

/**
 * Normalise the keys of a decoded map with the given function. Later keys win
 * when two keys normalise to the same string.
 */
export function mapKeys(input: Record<string, unknown>, fn: (key: string) => string): Record<string, unknown> {
    return Object.fromEntries(
        Object.entries(input).map(([key, value]) => [fn(key), value])
    );
}
