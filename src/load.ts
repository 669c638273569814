import * as path from 'path';
import { ArgumentError } from './error/ArgumentError';
import { FlagError } from './error/FlagError';
import { HelpRequestedError } from './error/HelpRequestedError';
import { StructureError } from './error/StructureError';
import { applyEnv } from './env/resolver';
import { EnvOptions } from './env/types';
import { DecodedMap, decoderTryAll } from './file/decoders';
import { locateConfigFile } from './file/locate';
import { applyFileContent, applyFileMap, readConfigFile } from './file/resolver';
import { applyFlags, parseFlagsToMap } from './flags';
import { HelpOptions, renderHelp } from './help';
import { inspectConfigStructure } from './structure/builder';
import { applyDefaults } from './structure/defaults';
import { Infer, StructDescriptor } from './structure/descriptor';
import { Option } from './structure/option';
import { Options } from './types';
import { matchesType } from './values/zero';

/**
 * What takes the place of the configuration file in a load.
 * - `file`: locate and read a file
 * - `map`: an already decoded map
 * - `content`: file content to decode
 */
export type FileInput =
    | { kind: 'file' }
    | { kind: 'map'; vars: DecodedMap }
    | { kind: 'content'; content: string };

function envOptions(options: Options): EnvOptions {
    return { prefix: options.env.prefix, source: options.env.source ?? process.env };
}

function flagArgs(options: Options): string[] {
    return options.flags.args ?? process.argv.slice(2);
}

export function helpOptions(options: Options): HelpOptions {
    return {
        programName: options.help.programName ?? path.basename(process.argv[1] ?? 'app'),
        message: options.help.message,
        description: options.help.description,
        width: options.help.width,
        helpFlag: !options.help.disable,
        envPrefix: options.env.disable ? undefined : options.env.prefix,
    };
}

/**
 * Whether a loaded target has the shape its schema declares.
 */
export function isShaped<S extends StructDescriptor>(schema: S, value: unknown): value is Infer<S> {
    return matchesType(schema, value);
}

/**
 * Throw a help request when the command line asks for it. Parse errors are
 * left for the flag stage.
 */
function checkHelp(allOpts: Option[], options: Options): void {
    if (options.help.disable || options.flags.disable) {
        return;
    }
    let helpRequested = false;
    try {
        helpRequested = parseFlagsToMap(flagArgs(options), { helpEnabled: true }).helpRequested;
    } catch (error) {
        if (!(error instanceof FlagError)) {
            throw error;
        }
    }
    if (helpRequested) {
        throw new HelpRequestedError(renderHelp(allOpts, helpOptions(options)));
    }
}

function runFileStage(opts: Option[], input: FileInput, options: Options): void {
    const logger = options.logger;

    switch (input.kind) {
        case 'map':
            logger.verbose('Loading configuration from map');
            applyFileMap(input.vars, opts);
            return;
        case 'content':
            if (options.file.disable) {
                throw new ArgumentError('file.disable', 'Cannot load configuration content with the file source disabled');
            }
            logger.verbose('Loading configuration from content');
            applyFileContent(input.content, options.file.decoder ?? decoderTryAll, opts);
            return;
        case 'file': {
            if (options.file.disable) {
                return;
            }
            const location = locateConfigFile(opts, {
                configFileVariable: options.configFileVariable,
                defaultFilename: options.file.defaultFilename,
                baseDirectory: options.file.baseDirectory,
                args: options.flags.disable ? undefined : flagArgs(options),
                env: options.env.disable ? undefined : envOptions(options),
            });
            if (!location) {
                logger.verbose('No configuration file to read');
                return;
            }
            readConfigFile(location, opts, {
                decoder: options.file.decoder,
                encoding: options.file.encoding,
            }, logger);
            return;
        }
    }
}

/**
 * Populate `target` from every enabled source: defaults, then the file (or
 * its replacement), then the environment, then the command line.
 *
 * @param schema - Struct descriptor of the configuration
 * @param target - Object written in place
 * @param input - Source of the file stage
 * @param options - Validated loader options
 * @returns `target`, typed by the schema
 * @throws {StructureError} When the schema or the target is malformed
 * @throws {ConfigurationError} When an input cannot be applied
 */
export function runLoad<S extends StructDescriptor>(
    schema: S,
    target: unknown,
    input: FileInput,
    options: Options
): Infer<S> {
    const logger = options.logger;

    const { opts, allOpts } = inspectConfigStructure(schema, target, { reserveHelp: !options.help.disable });
    logger.verbose(`Found ${allOpts.length} configuration options`);

    const defaults = applyDefaults(allOpts, logger);
    logger.verbose(`Applied ${defaults} default values`);

    checkHelp(allOpts, options);

    runFileStage(opts, input, options);

    if (!options.env.disable) {
        const applied = applyEnv(allOpts, envOptions(options), logger);
        logger.verbose(`Applied ${applied} environment variables`);
    }

    if (!options.flags.disable) {
        const { values } = parseFlagsToMap(flagArgs(options));
        const applied = applyFlags(allOpts, values, { ignoreUnknown: options.flags.ignoreUnknown }, logger);
        logger.verbose(`Applied ${applied} command line flags`);
    }

    if (!isShaped(schema, target)) {
        throw new StructureError('invalid_target', 'loaded configuration does not match its schema');
    }
    return target;
}
