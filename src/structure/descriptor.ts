/**
 * Capability of a type that initialises itself from UTF-8 encoded text.
 * Implementations throw when the text is not acceptable.
 */
export interface TextUnmarshaler {
    unmarshalText(text: Uint8Array): void;
}

/**
 * Field options that can be listed in {@link FieldMeta.opts}.
 * - `hidden`: leave the option out of the help output
 */
export type FieldOpt = 'hidden';

/**
 * Metadata attached to a field of a struct descriptor.
 */
export interface FieldMeta {
    /** Identifier used for flags, file keys and env vars; derived from the field name when omitted */
    id?: string;
    /** Single-character alias for the command line */
    short?: string;
    /** Default literal, coerced like any other text input; `''` is a declared empty default */
    default?: string;
    /** Help text; a back-quoted word names the value in usage output */
    description?: string;
    opts?: FieldOpt[];
}

export type IntKind = 'int' | 'int8' | 'int16' | 'int32';
export type UintKind = 'uint' | 'uint8' | 'uint16' | 'uint32';
export type BigIntKind = 'int64' | 'uint64';
export type FloatKind = 'float32' | 'float64';
export type NumberKind = IntKind | UintKind | FloatKind;

export type ScalarKind = 'bool' | 'string' | NumberKind | BigIntKind | 'bytes' | 'any';

export interface ScalarDescriptor<K extends ScalarKind = ScalarKind> {
    kind: K;
    meta?: FieldMeta;
}

export interface TextDescriptor<T extends TextUnmarshaler = TextUnmarshaler> {
    kind: 'text';
    type: new () => T;
    meta?: FieldMeta;
}

export interface SliceDescriptor<E extends TypeDescriptor = TypeDescriptor> {
    kind: 'slice';
    element: E;
    meta?: FieldMeta;
}

export interface MapDescriptor<V extends TypeDescriptor = TypeDescriptor> {
    kind: 'map';
    key: TypeDescriptor;
    value: V;
    meta?: FieldMeta;
}

export interface StructFields {
    [name: string]: TypeDescriptor;
}

export interface StructDescriptor<F extends StructFields = StructFields> {
    kind: 'struct';
    fields: F;
    meta?: FieldMeta;
}

export type TypeDescriptor =
    | ScalarDescriptor
    | TextDescriptor
    | SliceDescriptor
    | MapDescriptor
    | StructDescriptor;

type ScalarValue<K> =
    K extends 'bool' ? boolean :
    K extends 'string' ? string :
    K extends BigIntKind ? bigint :
    K extends 'bytes' ? Uint8Array :
    K extends 'any' ? unknown :
    number;

/**
 * Runtime value type of a descriptor.
 *
 * @example
 * ```typescript
 * const schema = t.struct({ port: t.uint16(), tags: t.slice(t.string()) });
 * type Config = Infer<typeof schema>; // { port: number; tags: string[] }
 * ```
 */
export type Infer<D> =
    D extends { kind: 'struct'; fields: infer F } ? { -readonly [K in keyof F]: Infer<F[K]> } :
    D extends { kind: 'slice'; element: infer E } ? Infer<E>[] :
    D extends { kind: 'map'; value: infer V } ? Record<string, Infer<V>> :
    D extends { kind: 'text'; type: new () => infer T } ? T | undefined :
    D extends { kind: infer K extends ScalarKind } ? ScalarValue<K> :
    never;

/**
 * Deep-partial value accepted as the pre-populated target of a load.
 */
export type Seed<D> =
    D extends { kind: 'struct'; fields: infer F } ? { -readonly [K in keyof F]?: Seed<F[K]> } :
    Infer<D>;

const scalar = <K extends ScalarKind>(kind: K) =>
    (meta?: FieldMeta): ScalarDescriptor<K> => ({ kind, meta });

/**
 * Builders for type descriptors.
 *
 * @example
 * ```typescript
 * const schema = t.struct({
 *     count: t.int({ short: 'c', default: '10', description: 'number of `items`' }),
 *     server: t.struct({
 *         host: t.string({ default: 'localhost' }),
 *         port: t.uint16({ default: '8080' }),
 *     }),
 *     labels: t.map(),
 * });
 * ```
 */
export const t = {
    bool: scalar('bool'),
    string: scalar('string'),
    int: scalar('int'),
    int8: scalar('int8'),
    int16: scalar('int16'),
    int32: scalar('int32'),
    int64: scalar('int64'),
    uint: scalar('uint'),
    uint8: scalar('uint8'),
    uint16: scalar('uint16'),
    uint32: scalar('uint32'),
    uint64: scalar('uint64'),
    float32: scalar('float32'),
    float64: scalar('float64'),
    bytes: scalar('bytes'),
    /** Dynamic value; only valid as the value type of a map */
    any: scalar('any'),
    text: <T extends TextUnmarshaler>(type: new () => T, meta?: FieldMeta): TextDescriptor<T> =>
        ({ kind: 'text', type, meta }),
    slice: <E extends TypeDescriptor>(element: E, meta?: FieldMeta): SliceDescriptor<E> =>
        ({ kind: 'slice', element, meta }),
    /** String-keyed map of dynamic values */
    map: (meta?: FieldMeta): MapDescriptor<ScalarDescriptor<'any'>> =>
        ({ kind: 'map', key: { kind: 'string' }, value: { kind: 'any' }, meta }),
    struct: <F extends StructFields>(fields: F, meta?: FieldMeta): StructDescriptor<F> =>
        ({ kind: 'struct', fields, meta }),
};

/**
 * Whether a struct field takes part in configuration. Names starting with an
 * underscore are private to the caller.
 */
export function isExportedField(name: string): boolean {
    return !name.startsWith('_');
}

/**
 * Human readable name of a descriptor type, used in error messages.
 */
export function typeName(type: TypeDescriptor): string {
    switch (type.kind) {
        case 'text':
            return type.type.name || 'TextUnmarshaler';
        case 'slice':
            return `${typeName(type.element)}[]`;
        case 'map':
            return `Record<${typeName(type.key)}, ${typeName(type.value)}>`;
        case 'struct':
            return 'struct';
        default:
            return type.kind;
    }
}
