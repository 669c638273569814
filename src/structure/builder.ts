import { CoercionError } from '../error/CoercionError';
import { StructureError } from '../error/StructureError';
import { isObjectTarget } from '../util/record';
import { parseValueFromText } from '../values/parser';
import { matchesType, zeroValue } from '../values/zero';
import { isSupportedType } from './classify';
import { isExportedField, StructDescriptor, TypeDescriptor } from './descriptor';
import { fullIdOf, toKebabCase } from './naming';
import { fieldHandle, fullId, Option, optionKindOf } from './option';

/**
 * Options of one struct: its direct children, and every descendant in
 * declaration order.
 */
export interface OptionTree {
    /** Options of the struct's own fields */
    opts: Option[];
    /** All options, nested ones included */
    allOpts: Option[];
}

export interface InspectOptions {
    /** Reject options that would collide with `--help`/`-h` */
    reserveHelp?: boolean;
}

/**
 * Prepare `owner[name]` so it can be written through a handle: allocate missing
 * structs and maps, put zero values in missing leaves and reject values of the
 * wrong runtime type.
 */
function prepareField(owner: Record<string, unknown>, name: string, type: TypeDescriptor, path: string): void {
    const current = owner[name];
    if (current === undefined) {
        const zero = zeroValue(type);
        if (zero !== undefined) {
            owner[name] = zero;
        }
        return;
    }

    const ok = type.kind === 'struct' ? isObjectTarget(current) : matchesType(type, current);
    if (!ok) {
        throw new StructureError(
            'invalid_target',
            `field ${path} holds a value that does not match its declared type`,
            path
        );
    }
}

/**
 * Build one option from a struct field, without its children.
 */
function optionFromField(
    name: string,
    type: TypeDescriptor,
    owner: Record<string, unknown>,
    parent?: Option
): Option {
    const meta = type.meta ?? {};
    const id = meta.id ?? toKebabCase(name);
    const fullIdParts = parent ? [...parent.fullIdParts, id] : [id];
    const path = fullIdOf(fullIdParts);

    if (!id || id.includes('.')) {
        throw new StructureError('invalid_schema', `invalid identifier '${id}' for field ${name}`, path);
    }

    const short = meta.short ?? '';
    if (short.length > 1 || short === '-') {
        throw new StructureError('invalid_schema', `shorthand '${short}' of ${path} must be a single character`, path);
    }

    return {
        id,
        fullIdParts,
        short,
        defaultLiteral: meta.default ?? '',
        defaultSet: meta.default !== undefined,
        description: meta.description ?? '',
        opts: meta.opts ?? [],
        kind: optionKindOf(type),
        type,
        handle: fieldHandle(owner, name),
        children: [],
    };
}

/**
 * Coerce the declared default once, so that a literal that does not fit its
 * field fails while the structure is inspected rather than when it is used.
 */
function resolveDefault(opt: Option): void {
    if (!opt.defaultSet) {
        return;
    }
    if (opt.kind === 'parent') {
        throw StructureError.nestedDefault(fullId(opt));
    }
    try {
        opt.defaultValue = parseValueFromText(opt.type, opt.defaultLiteral, fullId(opt));
    } catch (error) {
        if (error instanceof CoercionError) {
            throw StructureError.invalidDefault(fullId(opt), error.message);
        }
        throw error;
    }
}

function checkShorts(allOpts: Option[]): void {
    const shorts = new Set<string>();
    for (const opt of allOpts) {
        if (!opt.short) {
            continue;
        }
        if (shorts.has(opt.short)) {
            throw StructureError.duplicateShort(opt.short, fullId(opt));
        }
        shorts.add(opt.short);
    }
}

/**
 * Structs inside lists are only instantiated when a file supplies the list.
 * Build their options once on a scratch object so that a malformed element
 * struct fails here, before any source is read.
 */
function checkElementStruct(type: TypeDescriptor, opt: Option): void {
    let element = type;
    while (element.kind === 'slice') {
        element = element.element;
    }
    if (element.kind === 'struct') {
        checkShorts(createOptionsFromStruct(element, {}, opt).allOpts);
    }
}

/**
 * Extract all options from a struct descriptor, recursively, binding each to
 * the matching field of `owner`.
 *
 * Sibling identifiers must be unique within each struct. Structs reached
 * through list elements are checked too, shorthands included.
 */
export function createOptionsFromStruct(
    schema: StructDescriptor,
    owner: Record<string, unknown>,
    parent?: Option
): OptionTree {
    const opts: Option[] = [];
    const allOpts: Option[] = [];

    for (const [name, type] of Object.entries(schema.fields)) {
        if (!isExportedField(name)) {
            continue;
        }

        const opt = optionFromField(name, type, owner, parent);

        const support = isSupportedType(type);
        if (!support.supported) {
            throw StructureError.unsupportedType(fullId(opt), support.reason);
        }

        prepareField(owner, name, type, fullId(opt));
        resolveDefault(opt);
        if (type.kind === 'slice') {
            checkElementStruct(type, opt);
        }

        let nested: Option[] = [];
        if (type.kind === 'struct') {
            const child = owner[name];
            if (!isObjectTarget(child)) {
                throw new StructureError('invalid_target', `field ${fullId(opt)} is not an object`, fullId(opt));
            }
            const subTree = createOptionsFromStruct(type, child, opt);
            opt.children = subTree.opts;
            nested = subTree.allOpts;
        }

        opts.push(opt);
        allOpts.push(opt, ...nested);
    }

    const seen = new Set<string>();
    for (const opt of opts) {
        if (seen.has(opt.id)) {
            throw StructureError.duplicateId(fullId(opt));
        }
        seen.add(opt.id);
    }

    return { opts, allOpts };
}

/**
 * Inspect a configuration schema against its target object and build the
 * option tree, performing every structural check.
 *
 * @param schema - Struct descriptor of the configuration
 * @param target - Object the options write into; missing parts are allocated in place
 * @throws {StructureError} When the schema or the target is malformed
 */
export function inspectConfigStructure(
    schema: StructDescriptor,
    target: unknown,
    options: InspectOptions = {}
): OptionTree {
    if (typeof schema !== 'object' || schema === null || schema.kind !== 'struct') {
        throw new StructureError('invalid_schema', 'config schema must be a struct descriptor');
    }
    if (!isObjectTarget(target)) {
        throw new StructureError('invalid_target', 'config target must be an object');
    }

    const tree = createOptionsFromStruct(schema, target);

    checkShorts(tree.allOpts);

    if (options.reserveHelp) {
        for (const opt of tree.allOpts) {
            if (opt.short === 'h' || fullId(opt) === 'help') {
                throw new StructureError(
                    'reserved_flag',
                    `option ${fullId(opt)} collides with the help flag`,
                    fullId(opt)
                );
            }
        }
    }

    return tree;
}
