import { StructureError } from '../error/StructureError';
import { fullId, Option } from '../structure/option';
import { mapOf } from './convert';
import { parseValueFromText } from './parser';

/**
 * Parse `raw` into the option's type and write it into the option's field.
 *
 * @throws {CoercionError} When the text does not parse
 */
export function setValueByString(opt: Option, raw: string): void {
    opt.handle.set(parseValueFromText(opt.type, raw, fullId(opt)));
}

/**
 * Parse `raw` into the element type of a map option and store it under `key`,
 * replacing any previous value for that key.
 *
 * @throws {CoercionError} When the text does not parse
 */
export function setMapValue(opt: Option, key: string, raw: string): void {
    if (opt.type.kind !== 'map') {
        throw new StructureError('invalid_schema', `option ${fullId(opt)} is not a map`, fullId(opt));
    }
    const value = parseValueFromText(opt.type.value, raw, `${fullId(opt)}.${key}`);
    mapOf(opt)[key] = value;
}
