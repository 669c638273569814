import { z } from 'zod';
import { ArgumentError } from './error/ArgumentError';
import { FileDecoder } from './file/decoders';
import { Logger, Options } from './types';

const ENCODINGS = [
    'ascii', 'utf8', 'utf-8', 'utf16le', 'utf-16le', 'ucs2', 'ucs-2',
    'base64', 'base64url', 'latin1', 'binary', 'hex',
] as const;

const LOGGER_METHODS = ['debug', 'info', 'warn', 'error', 'verbose', 'silly'] as const;

const isLogger = (value: unknown): value is Logger => {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    const candidate = value;
    return LOGGER_METHODS.every((method) => typeof Reflect.get(candidate, method) === 'function');
};

/**
 * Schema of the merged loader options. Unknown keys are rejected so that a
 * misspelt setting does not go unnoticed.
 */
export const OptionsSchema = z.strictObject({
    configFileVariable: z.string().min(1).optional(),
    file: z.strictObject({
        disable: z.boolean(),
        defaultFilename: z.string().min(1).optional(),
        decoder: z.custom<FileDecoder>((value) => typeof value === 'function', 'Expected a decoder function').optional(),
        baseDirectory: z.string().min(1).optional(),
        encoding: z.enum(ENCODINGS),
    }),
    env: z.strictObject({
        disable: z.boolean(),
        prefix: z.string(),
        source: z.record(z.string(), z.string().optional()).optional(),
    }),
    flags: z.strictObject({
        disable: z.boolean(),
        ignoreUnknown: z.boolean(),
        args: z.array(z.string()).optional(),
    }),
    help: z.strictObject({
        disable: z.boolean(),
        message: z.string().optional(),
        description: z.string(),
        programName: z.string().min(1).optional(),
        width: z.number().int().positive(),
    }),
    logger: z.custom<Logger>(isLogger, 'Expected a logger'),
});

/**
 * Validates merged loader options.
 *
 * @param options - Options with defaults merged in
 * @returns The same options
 * @throws {ArgumentError} When a setting has the wrong type, is out of range or is unknown
 *
 * @example
 * ```typescript
 * validateOptions({ ...DEFAULT_OPTIONS, help: { ...DEFAULT_OPTIONS.help, width: 0 } });
 * // throws ArgumentError: Invalid loader option help.width: ...
 * ```
 */
export const validateOptions = (options: Options): Options => {
    const result = OptionsSchema.safeParse(options);
    if (result.success) {
        return options;
    }

    const issue = result.error.issues[0];
    const argument = issue && issue.path.length > 0 ? issue.path.map(String).join('.') : 'options';
    const reason = issue ? issue.message : 'invalid value';
    throw new ArgumentError(argument, `Invalid loader option ${argument}: ${reason}`);
}
