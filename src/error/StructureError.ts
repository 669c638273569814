/**
 * Ways in which a configuration schema (or the target object handed to the
 * loader alongside it) can be wrong.
 */
export type StructureErrorType =
    | 'invalid_schema'
    | 'invalid_target'
    | 'unsupported_type'
    | 'duplicate_id'
    | 'duplicate_short'
    | 'nested_default'
    | 'invalid_default'
    | 'reserved_flag'
    | 'unknown_variable';

/**
 * A programmer error in the declared configuration structure.
 *
 * Raised while the option tree is built, before any source is consulted, and
 * never caused by end-user input. Loaders do not catch it: `safeLoad` rethrows
 * it instead of returning it.
 */
export class StructureError extends Error {
    public readonly errorType: StructureErrorType;
    /** Dotted path of the offending field, when there is one */
    public readonly field?: string;

    constructor(errorType: StructureErrorType, message: string, field?: string) {
        super(`error in config structure: ${message}`);
        this.name = 'StructureError';
        this.errorType = errorType;
        this.field = field;
    }

    static unsupportedType(field: string, reason: string): StructureError {
        return new StructureError('unsupported_type', `type of field ${field} is not supported: ${reason}`, field);
    }

    static duplicateId(id: string): StructureError {
        return new StructureError('duplicate_id', `duplicate config variable: ${id}`, id);
    }

    static duplicateShort(short: string, field: string): StructureError {
        return new StructureError('duplicate_short', `duplicate config variable shorthand: ${short}`, field);
    }

    static nestedDefault(field: string): StructureError {
        return new StructureError('nested_default', `default value specified for nested value '${field}'`, field);
    }

    static invalidDefault(field: string, reason: string): StructureError {
        return new StructureError('invalid_default', `error parsing default value for ${field}: ${reason}`, field);
    }
}
