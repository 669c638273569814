import { CoercionError } from '../error/CoercionError';
import { createOptionsFromStruct } from '../structure/builder';
import { FloatKind, SliceDescriptor, StructDescriptor, TypeDescriptor, typeName } from '../structure/descriptor';
import { toKebabCase } from '../structure/naming';
import { fullId, Option } from '../structure/option';
import { isRecord, mapKeys } from '../util/record';
import { fitInteger, isIntegerKind, parseSimpleValue, parseSlice } from './parser';

export interface ApplyMapOptions {
    /** Fail on keys that match no option instead of ignoring them */
    strict?: boolean;
}

function convertFloat(kind: FloatKind, value: number, path: string): number {
    if (kind === 'float64') {
        return value;
    }
    const narrowed = Math.fround(value);
    if (Number.isFinite(value) && !Number.isFinite(narrowed)) {
        throw new CoercionError(`value ${value} out of range for type float32`, value, path, kind);
    }
    return narrowed;
}

function convertSlice(type: SliceDescriptor, values: unknown[], path: string): unknown[] {
    return values.map((element) => convertValue(type.element, element, path));
}

/**
 * Decode a string-keyed map into a fresh object of the given struct type, as
 * found in decoded lists of tables. Every key must match an option.
 */
export function decodeMapIntoStruct(type: StructDescriptor, from: Record<string, unknown>, path: string): Record<string, unknown> {
    const target: Record<string, unknown> = {};
    const { opts } = createOptionsFromStruct(type, target);
    applyMapToOptions(from, opts, { strict: true }, path);
    return target;
}

/**
 * Convert a dynamically typed value, as produced by a file decoder, into a
 * value of `type`.
 *
 * Values of the right runtime type are taken as they are and numbers are
 * converted between numeric kinds within range. A number beyond the safe
 * integer range is refused for 64-bit kinds, since it may have been rounded.
 * Strings fall back to text parsing, which is the only way into a byte buffer.
 * Lists convert element by element; maps inside a list of structs decode into
 * fresh struct objects.
 *
 * @throws {CoercionError} When the value cannot be represented in `type`
 */
export function convertValue(type: TypeDescriptor, value: unknown, path: string): unknown {
    switch (type.kind) {
        case 'any':
            return value;
        case 'text':
            if (value instanceof type.type) {
                return value;
            }
            break;
        case 'bytes':
            if (value instanceof Uint8Array) {
                return value;
            }
            break;
        case 'bool':
            if (typeof value === 'boolean') {
                return value;
            }
            break;
        case 'string':
            if (typeof value === 'string') {
                return value;
            }
            break;
        case 'float32':
        case 'float64':
            if (typeof value === 'number') {
                return convertFloat(type.kind, value, path);
            }
            if (typeof value === 'bigint') {
                return convertFloat(type.kind, Number(value), path);
            }
            break;
        case 'slice':
            if (Array.isArray(value)) {
                return convertSlice(type, value, path);
            }
            if (typeof value === 'string') {
                return parseSlice(type, value, path);
            }
            break;
        case 'map':
            if (isRecord(value)) {
                return { ...value };
            }
            break;
        case 'struct':
            if (isRecord(value)) {
                return decodeMapIntoStruct(type, value, path);
            }
            break;
        default:
            if (isIntegerKind(type.kind)) {
                if (typeof value === 'bigint') {
                    return fitInteger(type.kind, value, value, path);
                }
                if (typeof value === 'number') {
                    if (!Number.isInteger(value)) {
                        throw new CoercionError(`value ${value} is not an integer`, value, path, type.kind);
                    }
                    if ((type.kind === 'int64' || type.kind === 'uint64') && !Number.isSafeInteger(value)) {
                        throw new CoercionError(`value ${value} is not exact for type ${type.kind}`, value, path, type.kind);
                    }
                    return fitInteger(type.kind, BigInt(value), value, path);
                }
            }
            break;
    }

    if (typeof value === 'string') {
        return parseSimpleValue(type, value, path);
    }

    throw CoercionError.inconvertible(value, path, typeName(type));
}

/**
 * Convert `value` and write it into the option's field.
 */
export function setValue(opt: Option, value: unknown): void {
    opt.handle.set(convertValue(opt.type, value, fullId(opt)));
}

/**
 * The map held by a map option, allocated in place when missing.
 */
export function mapOf(opt: Option): Record<string, unknown> {
    const current = opt.handle.get();
    if (isRecord(current)) {
        return current;
    }
    const fresh: Record<string, unknown> = {};
    opt.handle.set(fresh);
    return fresh;
}

/**
 * Write the entries of a decoded map into the options matching its keys,
 * descending into nested structs. Keys are compared in kebab-case, so
 * `maxRetries` and `max_retries` both address the option `max-retries`.
 *
 * A struct option given anything but a map is an error. A `null` value leaves
 * the option untouched. Map options receive the decoded entries on top of the
 * ones they already hold.
 *
 * @param from - Decoded map
 * @param opts - Options of one struct level
 * @param options - `strict` rejects keys without an option
 * @param context - Path of the struct being filled, for error messages
 */
export function applyMapToOptions(
    from: Record<string, unknown>,
    opts: Option[],
    options: ApplyMapOptions = {},
    context = ''
): void {
    const values = mapKeys(from, toKebabCase);

    if (options.strict) {
        for (const key of Object.keys(values)) {
            if (!opts.some((opt) => opt.id === key)) {
                throw new CoercionError(
                    `found no option with id '${key}' in nested struct slice${context ? ` '${context}'` : ''}`,
                    from,
                    context,
                    'struct'
                );
            }
        }
    }

    for (const opt of opts) {
        if (!Object.prototype.hasOwnProperty.call(values, opt.id)) {
            continue;
        }
        const value = values[opt.id];
        if (value === null || value === undefined) {
            continue;
        }

        if (opt.kind === 'parent') {
            if (!isRecord(value)) {
                throw CoercionError.inconvertible(value, fullId(opt), 'struct');
            }
            applyMapToOptions(value, opt.children, options, fullId(opt));
            continue;
        }

        if (opt.kind === 'map' && opt.type.kind === 'map') {
            if (!isRecord(value)) {
                throw CoercionError.inconvertible(value, fullId(opt), typeName(opt.type));
            }
            const target = mapOf(opt);
            for (const [key, entry] of Object.entries(value)) {
                target[key] = convertValue(opt.type.value, entry, `${fullId(opt)}.${key}`);
            }
            continue;
        }

        setValue(opt, value);
    }
}
