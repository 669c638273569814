import { isExportedField, TypeDescriptor } from '../structure/descriptor';
import { isObjectTarget, isRecord } from '../util/record';

/**
 * The value a field holds before any source has set it. Text and dynamic
 * values start out undefined; structs start as an empty object that the
 * builder fills field by field.
 */
export function zeroValue(type: TypeDescriptor): unknown {
    switch (type.kind) {
        case 'bool':
            return false;
        case 'string':
            return '';
        case 'int64':
        case 'uint64':
            return 0n;
        case 'bytes':
            return new Uint8Array(0);
        case 'any':
        case 'text':
            return undefined;
        case 'slice':
            return [];
        case 'map':
        case 'struct':
            return {};
        default:
            return 0;
    }
}

/**
 * Whether `value` is still the zero value of `type`. Empty slices, byte
 * buffers and maps count as zero.
 */
export function isZero(type: TypeDescriptor, value: unknown): boolean {
    switch (type.kind) {
        case 'bytes':
            return !(value instanceof Uint8Array) || value.length === 0;
        case 'slice':
            return !Array.isArray(value) || value.length === 0;
        case 'map':
            return !isRecord(value) || Object.keys(value).length === 0;
        case 'struct': {
            if (!isObjectTarget(value)) {
                return true;
            }
            const record = value;
            return Object.entries(type.fields)
                .filter(([name]) => isExportedField(name))
                .every(([name, field]) => isZero(field, record[name]));
        }
        case 'text':
        case 'any':
            return value === undefined;
        default:
            return value === zeroValue(type);
    }
}

/**
 * Whether `value` has the runtime shape of `type`.
 */
export function matchesType(type: TypeDescriptor, value: unknown): boolean {
    switch (type.kind) {
        case 'bool':
            return typeof value === 'boolean';
        case 'string':
            return typeof value === 'string';
        case 'int64':
        case 'uint64':
            return typeof value === 'bigint';
        case 'bytes':
            return value instanceof Uint8Array;
        case 'any':
            return true;
        case 'text':
            return value === undefined || value instanceof type.type;
        case 'slice': {
            const element = type.element;
            return Array.isArray(value) && value.every((item) => matchesType(element, item));
        }
        case 'map':
            return isRecord(value);
        case 'struct': {
            if (!isObjectTarget(value)) {
                return false;
            }
            const record = value;
            return Object.entries(type.fields)
                .filter(([name]) => isExportedField(name))
                .every(([name, field]) => matchesType(field, record[name]));
        }
        default:
            return typeof value === 'number';
    }
}
