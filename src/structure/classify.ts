import { isExportedField, TypeDescriptor } from './descriptor';

export type SupportResult =
    | { supported: true }
    | { supported: false; reason: string };

const SUPPORTED: SupportResult = { supported: true };

const unsupported = (reason: string): SupportResult => ({ supported: false, reason });

/**
 * Returns whether a type descriptor can be loaded, and why not when it can't.
 *
 * Text-decodable classes are accepted first, whatever else they look like.
 * Structs and slices are accepted only when everything they contain is; maps
 * must be keyed by strings and hold dynamic values. A dynamic (`any`) value is
 * not accepted on its own.
 */
export function isSupportedType(type: TypeDescriptor): SupportResult {
    if (typeof type !== 'object' || type === null) {
        return unsupported('not a type descriptor');
    }

    switch (type.kind) {
        case 'text':
            if (typeof type.type !== 'function' || typeof type.type.prototype?.unmarshalText !== 'function') {
                return unsupported('text type does not implement unmarshalText');
            }
            return SUPPORTED;

        case 'bytes':
        case 'bool':
        case 'string':
        case 'int':
        case 'int8':
        case 'int16':
        case 'int32':
        case 'int64':
        case 'uint':
        case 'uint8':
        case 'uint16':
        case 'uint32':
        case 'uint64':
        case 'float32':
        case 'float64':
            return SUPPORTED;

        case 'struct': {
            if (typeof type.fields !== 'object' || type.fields === null) {
                return unsupported('struct without fields');
            }
            for (const [name, field] of Object.entries(type.fields)) {
                if (!isExportedField(name)) {
                    continue;
                }
                const result = isSupportedType(field);
                if (!result.supported) {
                    return unsupported(`struct with unsupported type: field ${name}: ${result.reason}`);
                }
            }
            return SUPPORTED;
        }

        case 'slice': {
            const result = isSupportedType(type.element);
            if (!result.supported) {
                return unsupported(`slice of unsupported type: ${result.reason}`);
            }
            return SUPPORTED;
        }

        case 'map':
            if (type.key?.kind !== 'string' || type.value?.kind !== 'any') {
                return unsupported('only maps of string keys to dynamic values are supported');
            }
            return SUPPORTED;

        default:
            return unsupported('type not supported');
    }
}
