import * as fs from 'fs';
import { DecodeError } from '../error/DecodeError';
import { FileSystemError } from '../error/FileSystemError';
import { Option } from '../structure/option';
import { Logger } from '../types';
import { applyMapToOptions } from '../values/convert';
import { DecodedMap, decoderForPath, FileDecoder } from './decoders';
import { ConfigFileLocation } from './locate';

export interface ReadFileOptions {
    /** Decoder to use instead of choosing one from the extension */
    decoder?: FileDecoder;
    encoding: BufferEncoding;
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Write a decoded map into the options matching its keys. Keys without an
 * option are ignored; see {@link applyMapToOptions}.
 */
export function applyFileMap(map: DecodedMap, opts: Option[]): void {
    applyMapToOptions(map, opts);
}

/**
 * Decode configuration content and apply it.
 *
 * @param content - File content
 * @param decoder - Decoder for the content's format
 * @param opts - Top-level options
 * @param source - File the content came from, for error messages
 */
export function applyFileContent(content: string, decoder: FileDecoder, opts: Option[], source?: string): void {
    let map: DecodedMap;
    try {
        map = decoder(content);
    } catch (error) {
        if (error instanceof DecodeError && source) {
            throw DecodeError.inFile(error, source);
        }
        throw error;
    }
    applyFileMap(map, opts);
}

/**
 * Read the located configuration file and apply its content.
 *
 * A missing file is skipped when it is the default file and an error when the
 * user named it.
 *
 * @returns Whether a file was read
 * @throws {FileSystemError} When an explicit file is missing or the file cannot be read
 * @throws {DecodeError} When the content cannot be decoded
 * @throws {CoercionError} When a value does not fit its option
 */
export function readConfigFile(
    location: ConfigFileLocation,
    opts: Option[],
    options: ReadFileOptions,
    logger?: Logger
): boolean {
    let content: string;
    try {
        content = fs.readFileSync(location.path, { encoding: options.encoding });
    } catch (error) {
        if (isNotFound(error)) {
            if (location.explicit) {
                throw FileSystemError.fileNotFound(location.path);
            }
            logger?.verbose(`Default configuration file ${location.path} not found, skipping`);
            return false;
        }
        if (error instanceof Error) {
            throw FileSystemError.operationFailed('read configuration file', location.path, error);
        }
        throw error;
    }

    logger?.verbose(`Loading configuration from ${location.path}`);
    applyFileContent(content, options.decoder ?? decoderForPath(location.path), opts, location.path);
    return true;
}
