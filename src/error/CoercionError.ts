import { ConfigurationError } from './ConfigurationError';

/**
 * Thrown when a raw value cannot be converted into the type of the option it
 * was addressed to.
 */
export class CoercionError extends ConfigurationError {
    /** The offending raw text or decoded value */
    public readonly value: unknown;
    /** Dotted full path of the option (empty for a value not yet bound to one) */
    public readonly path: string;
    /** Display name of the target type */
    public readonly targetType: string;

    constructor(message: string, value: unknown, path: string, targetType: string) {
        super('coercion', message, { value, path, targetType });
        this.name = 'CoercionError';
        this.value = value;
        this.path = path;
        this.targetType = targetType;
    }

    /**
     * Text that does not parse into the target type.
     */
    static parse(value: string, path: string, targetType: string, reason?: string): CoercionError {
        let message = `failed to parse '${value}' into type ${targetType}`;
        if (path) {
            message += ` for option '${path}'`;
        }
        if (reason) {
            message += `: ${reason}`;
        }
        return new CoercionError(message, value, path, targetType);
    }

    /**
     * A decoded value whose runtime type cannot be converted into the target type.
     */
    static inconvertible(value: unknown, path: string, targetType: string): CoercionError {
        const where = path ? ` for option '${path}'` : '';
        return new CoercionError(
            `incompatible type${where}: ${describeValueType(value)} not convertible to ${targetType}`,
            value,
            path,
            targetType
        );
    }
}

/**
 * Short runtime type name of a decoded value, used in error messages.
 */
export function describeValueType(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    if (value instanceof Uint8Array) return 'Uint8Array';
    if (typeof value === 'object') {
        const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
        if (typeof ctor === 'function' && ctor.name && ctor.name !== 'Object') {
            return ctor.name;
        }
        return 'object';
    }
    return typeof value;
}
