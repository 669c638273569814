import { FieldOpt, TypeDescriptor } from './descriptor';
import { fullIdOf } from './naming';

/**
 * How an option is addressed and coerced.
 * - `scalar`: bool, string and numeric kinds
 * - `text`: a class decoding itself from text
 * - `bytes`: base64 text
 * - `slice`: comma separated text or a decoded list
 * - `map`: string keys to dynamic values, addressed per key
 * - `parent`: a nested struct; its children are the options
 */
export type OptionKind = 'scalar' | 'text' | 'bytes' | 'slice' | 'map' | 'parent';

/**
 * Live read/write access to one field of the caller's target object.
 */
export interface FieldHandle {
    get(): unknown;
    set(value: unknown): void;
}

/**
 * One configuration field together with its metadata.
 */
export interface Option {
    /** Identifier, unique among siblings */
    id: string;
    /** Identifiers of all ancestors followed by this option's own */
    fullIdParts: string[];
    /** Shorthand flag, or '' */
    short: string;
    /** Default literal as declared */
    defaultLiteral: string;
    /** Whether a default was declared at all */
    defaultSet: boolean;
    /** The default literal already coerced into the option's type */
    defaultValue?: unknown;
    description: string;
    opts: FieldOpt[];
    kind: OptionKind;
    type: TypeDescriptor;
    handle: FieldHandle;
    /** Nested options, only for `parent` */
    children: Option[];
}

export function fullId(opt: Option): string {
    return fullIdOf(opt.fullIdParts);
}

export function hasFieldOpt(opt: Option, fieldOpt: FieldOpt): boolean {
    return opt.opts.includes(fieldOpt);
}

export function optionKindOf(type: TypeDescriptor): OptionKind {
    switch (type.kind) {
        case 'struct':
            return 'parent';
        case 'slice':
            return 'slice';
        case 'map':
            return 'map';
        case 'text':
            return 'text';
        case 'bytes':
            return 'bytes';
        default:
            return 'scalar';
    }
}

/**
 * Handle on `owner[key]`. The owner is never copied; every write lands in the
 * caller's object.
 */
export function fieldHandle(owner: Record<string, unknown>, key: string): FieldHandle {
    return {
        get: () => owner[key],
        set: (value: unknown) => {
            owner[key] = value;
        },
    };
}
