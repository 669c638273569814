import yn from 'yn';
import { CoercionError } from '../error/CoercionError';
import { BigIntKind, FloatKind, IntKind, SliceDescriptor, TypeDescriptor, typeName, UintKind } from '../structure/descriptor';
import { CsvError, readAsCsv } from './csv';

type IntegerKind = IntKind | UintKind | BigIntKind;

const SAFE_MAX = BigInt(Number.MAX_SAFE_INTEGER);

/** Inclusive bounds of every integer kind */
const INTEGER_BOUNDS: Record<IntegerKind, readonly [bigint, bigint]> = {
    int: [-SAFE_MAX, SAFE_MAX],
    int8: [-(2n ** 7n), 2n ** 7n - 1n],
    int16: [-(2n ** 15n), 2n ** 15n - 1n],
    int32: [-(2n ** 31n), 2n ** 31n - 1n],
    int64: [-(2n ** 63n), 2n ** 63n - 1n],
    uint: [0n, SAFE_MAX],
    uint8: [0n, 2n ** 8n - 1n],
    uint16: [0n, 2n ** 16n - 1n],
    uint32: [0n, 2n ** 32n - 1n],
    uint64: [0n, 2n ** 64n - 1n],
};

const SIGNED_PATTERN = /^[+-]?[0-9]+$/;
const UNSIGNED_PATTERN = /^[0-9]+$/;
const FLOAT_PATTERN = /^[+-]?(?:[0-9]+(?:\.[0-9]*)?|\.[0-9]+)(?:[eE][+-]?[0-9]+)?$/;
const FLOAT_SPECIAL_PATTERN = /^([+-]?)(?:inf|infinity|nan)$/i;
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const textEncoder = new TextEncoder();

export function isIntegerKind(kind: string): kind is IntegerKind {
    return kind in INTEGER_BOUNDS;
}

/**
 * Check an integer against the bounds of its declared kind and return it in
 * the kind's runtime representation.
 */
export function fitInteger(kind: IntegerKind, value: bigint, raw: unknown, path: string): number | bigint {
    const [min, max] = INTEGER_BOUNDS[kind];
    if (value < min || value > max) {
        if (typeof raw === 'string') {
            throw CoercionError.parse(raw, path, kind, 'value out of range');
        }
        throw new CoercionError(`value ${String(raw)} out of range for type ${kind}`, raw, path, kind);
    }
    return kind === 'int64' || kind === 'uint64' ? value : Number(value);
}

/**
 * Parse a base-10 integer. Unsigned kinds reject any sign.
 */
export function parseInteger(kind: IntegerKind, raw: string, path: string): number | bigint {
    const pattern = kind.startsWith('uint') ? UNSIGNED_PATTERN : SIGNED_PATTERN;
    if (!pattern.test(raw)) {
        throw CoercionError.parse(raw, path, kind, 'invalid syntax');
    }
    return fitInteger(kind, BigInt(raw), raw, path);
}

/**
 * Parse a decimal float at the declared precision. `inf`, `infinity` and
 * `nan` are accepted in any case; finite text that overflows the precision is
 * out of range.
 */
export function parseFloat(kind: FloatKind, raw: string, path: string): number {
    const special = FLOAT_SPECIAL_PATTERN.exec(raw);
    if (special) {
        if (/nan$/i.test(raw)) {
            return NaN;
        }
        return special[1] === '-' ? -Infinity : Infinity;
    }

    if (!FLOAT_PATTERN.test(raw)) {
        throw CoercionError.parse(raw, path, kind, 'invalid syntax');
    }

    const value = kind === 'float32' ? Math.fround(Number(raw)) : Number(raw);
    if (!Number.isFinite(value)) {
        throw CoercionError.parse(raw, path, kind, 'value out of range');
    }
    return value;
}

/**
 * Decode standard, padded base64.
 */
export function parseBytes(raw: string, path: string): Uint8Array {
    if (!BASE64_PATTERN.test(raw)) {
        throw CoercionError.parse(raw, path, 'bytes', 'illegal base64 data');
    }
    return Uint8Array.from(Buffer.from(raw, 'base64'));
}

/**
 * Parse a boolean from true/false, yes/no, y/n, 1/0 or on/off, in any case.
 */
export function parseBool(raw: string, path: string): boolean {
    const result = yn(raw);
    if (result === undefined) {
        throw CoercionError.parse(raw, path, 'bool', 'expected true/false, yes/no, y/n, 1/0 or on/off');
    }
    return result;
}

/**
 * Parse text into a value of any non-composite type: scalars, byte buffers
 * and text-decodable classes. Dynamic values keep the text as it is.
 */
export function parseSimpleValue(type: TypeDescriptor, raw: string, path: string): unknown {
    switch (type.kind) {
        case 'text': {
            const instance = new type.type();
            try {
                instance.unmarshalText(textEncoder.encode(raw));
            } catch (error) {
                const reason = error instanceof Error ? error.message : String(error);
                const where = path ? ` for option '${path}'` : '';
                throw new CoercionError(
                    `failed to unmarshal '${raw}' into type ${typeName(type)}${where}: ${reason}`,
                    raw,
                    path,
                    typeName(type)
                );
            }
            return instance;
        }
        case 'bytes':
            return parseBytes(raw, path);
        case 'string':
        case 'any':
            return raw;
        case 'bool':
            return parseBool(raw, path);
        case 'float32':
        case 'float64':
            return parseFloat(type.kind, raw, path);
        case 'slice':
        case 'map':
        case 'struct':
            throw CoercionError.parse(raw, path, typeName(type), 'not a simple value');
        default:
            if (isIntegerKind(type.kind)) {
                return parseInteger(type.kind, raw, path);
            }
            throw CoercionError.parse(raw, path, typeName(type), 'type not supported');
    }
}

/**
 * Split comma separated text (see {@link readAsCsv}) and parse every element.
 * One bad element fails the whole slice.
 */
export function parseSlice(type: SliceDescriptor, raw: string, path: string): unknown[] {
    let values: string[];
    try {
        values = readAsCsv(raw);
    } catch (error) {
        if (error instanceof CsvError) {
            throw CoercionError.parse(raw, path, typeName(type), `error parsing comma separated value: ${error.message}`);
        }
        throw error;
    }
    return values.map((value) => parseSimpleValue(type.element, value, path));
}

/**
 * Parse text into a value of `type`, the way every text source (defaults,
 * environment, flags) does.
 */
export function parseValueFromText(type: TypeDescriptor, raw: string, path: string): unknown {
    if (type.kind === 'slice') {
        return parseSlice(type, raw, path);
    }
    return parseSimpleValue(type, raw, path);
}
