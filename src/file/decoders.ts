import * as path from 'path';
import * as yaml from 'js-yaml';
import { parse as parseToml } from 'smol-toml';
import { DecodeError } from '../error/DecodeError';
import { isRecord } from '../util/record';

/**
 * Decoded configuration file: string keys to nested maps, lists and scalars.
 */
export type DecodedMap = Record<string, unknown>;

/**
 * Translates configuration file content into a {@link DecodedMap}.
 * Throws a {@link DecodeError} when the content is not in its format.
 */
export type FileDecoder = (content: string) => DecodedMap;

/**
 * Replace dates by their ISO text so that they reach the coercion layer as
 * strings, and check that the top level is a map.
 */
function normalizeDecoded(value: unknown): unknown {
    if (value instanceof Date) {
        return value.toISOString();
    }
    if (Array.isArray(value)) {
        return value.map(normalizeDecoded);
    }
    if (isRecord(value)) {
        const result: DecodedMap = {};
        for (const [key, entry] of Object.entries(value)) {
            result[key] = normalizeDecoded(entry);
        }
        return result;
    }
    return value;
}

function toDecodedMap(decoder: string, value: unknown): DecodedMap {
    const normalized = normalizeDecoded(value);
    if (!isRecord(normalized)) {
        throw new DecodeError(decoder, `error parsing ${decoder} config file: content is not a map`);
    }
    return normalized;
}

function failure(decoder: string, error: unknown): DecodeError {
    const message = error instanceof Error ? error.message : String(error);
    return new DecodeError(decoder, `error parsing ${decoder} config file: ${message}`);
}

export const decoderJson: FileDecoder = (content) => {
    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch (error) {
        throw failure('JSON', error);
    }
    return toDecodedMap('JSON', parsed);
};

/**
 * Integer text as a bigint: sign, underscores and the `0x`/`0o`/`0b` prefixes
 * of the core schema are accepted.
 */
function bigIntFromYaml(text: string): bigint {
    const digits = text.replace(/_/g, '');
    if (digits.startsWith('-')) {
        return -BigInt(digits.slice(1));
    }
    return BigInt(digits.startsWith('+') ? digits.slice(1) : digits);
}

const yamlInt = yaml.types.int;

/**
 * Core integers, except that those beyond the safe integer range load as
 * bigints instead of being rounded.
 */
const YAML_EXACT_INT = new yaml.Type('tag:yaml.org,2002:int', {
    kind: 'scalar',
    resolve: (data: unknown) => yamlInt.resolve(data),
    construct: (data: string): number | bigint => {
        const value: unknown = yamlInt.construct(data);
        if (typeof value === 'number' && Number.isSafeInteger(value)) {
            return value;
        }
        return bigIntFromYaml(data);
    },
});

const YAML_SCHEMA = yaml.CORE_SCHEMA.extend({ implicit: [YAML_EXACT_INT] });

/**
 * YAML decoder using the core schema, so that only JSON-compatible scalars
 * come out, with large integers as bigints. An empty document decodes to an
 * empty map.
 */
export const decoderYaml: FileDecoder = (content) => {
    let parsed: unknown;
    try {
        parsed = yaml.load(content, { schema: YAML_SCHEMA });
    } catch (error) {
        throw failure('YAML', error);
    }
    if (parsed === undefined || parsed === null) {
        return {};
    }
    return toDecodedMap('YAML', parsed);
};

/**
 * TOML decoder. Integers beyond the safe integer range come out as bigints.
 */
export const decoderToml: FileDecoder = (content) => {
    let parsed: unknown;
    try {
        parsed = parseToml(content, { integersAsBigInt: 'asNeeded' });
    } catch (error) {
        throw failure('TOML', error);
    }
    return toDecodedMap('TOML', parsed);
};

const TRY_ALL_DECODERS: FileDecoder[] = [decoderYaml, decoderToml, decoderJson];

/**
 * Try the YAML, TOML and JSON decoders in turn and keep the first result. When
 * all of them fail, the error lists each decoder's message.
 */
export const decoderTryAll: FileDecoder = (content) => {
    const messages: string[] = [];
    for (const decoder of TRY_ALL_DECODERS) {
        try {
            return decoder(content);
        } catch (error) {
            if (!(error instanceof DecodeError)) {
                throw error;
            }
            messages.push(error.message);
        }
    }
    throw new DecodeError(
        'try-all',
        `config file failed to decode with decoders for YAML, TOML and JSON: ["${messages.join('", "')}"]`
    );
};

/**
 * Choose a decoder from the file extension, falling back to trying them all.
 */
export function decoderForPath(filePath: string): FileDecoder {
    switch (path.extname(filePath).toLowerCase()) {
        case '.json':
            return decoderJson;
        case '.toml':
            return decoderToml;
        case '.yaml':
        case '.yml':
            return decoderYaml;
        default:
            return decoderTryAll;
    }
}
