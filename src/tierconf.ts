import { DEFAULT_LOGGER, DEFAULT_OPTIONS } from './constants';
import { ConfigurationError } from './error/ConfigurationError';
import { DecodedMap } from './file/decoders';
import { helpOptions, runLoad, FileInput } from './load';
import { renderHelp } from './help';
import { inspectConfigStructure } from './structure/builder';
import { Infer, Seed, StructDescriptor } from './structure/descriptor';
import { LoadOptions, Logger, Options, SafeLoadResult, Tierconf } from './types';
import { validateOptions } from './validate';

export * from './types';
export * from './error';
export { t } from './structure/descriptor';
export type {
    FieldMeta,
    FieldOpt,
    Infer,
    MapDescriptor,
    ScalarDescriptor,
    Seed,
    SliceDescriptor,
    StructDescriptor,
    TextDescriptor,
    TextUnmarshaler,
    TypeDescriptor,
} from './structure/descriptor';
export { decoderForPath, decoderJson, decoderToml, decoderTryAll, decoderYaml } from './file';
export { makeEnvKey } from './env';
export { toKebabCase } from './structure/naming';
export { DEFAULT_LOGGER, DEFAULT_OPTIONS } from './constants';

/**
 * Merge caller options over {@link DEFAULT_OPTIONS}, group by group.
 */
export const mergeOptions = (pOptions: LoadOptions = {}): Options => ({
    configFileVariable: pOptions.configFileVariable,
    file: { ...DEFAULT_OPTIONS.file, ...pOptions.file },
    env: { ...DEFAULT_OPTIONS.env, ...pOptions.env },
    flags: { ...DEFAULT_OPTIONS.flags, ...pOptions.flags },
    help: { ...DEFAULT_OPTIONS.help, ...pOptions.help },
    logger: pOptions.logger ?? DEFAULT_LOGGER,
});

/**
 * Options for a load whose only sources are the defaults and the given map or
 * content.
 */
const withoutOuterSources = (options: Options): Options => ({
    ...options,
    env: { ...options.env, disable: true },
    flags: { ...options.flags, disable: true },
});

/**
 * Creates a loader for a configuration schema.
 *
 * The loader fills a target object in place from, in ascending priority:
 * - defaults declared on the schema's fields
 * - a configuration file in JSON, YAML or TOML
 * - environment variables
 * - command line flags
 *
 * @template S - Struct descriptor of the configuration
 * @param schema - Configuration schema built with `t.struct`
 * @param pOptions - Loader options, merged over the defaults
 * @returns A loader bound to `schema`
 * @throws {ArgumentError} When `pOptions` is invalid
 *
 * @example
 * ```typescript
 * import { create, t } from 'tierconf';
 *
 * const schema = t.struct({
 *     config: t.string({ short: 'c', description: 'path to the `file` to read' }),
 *     count: t.int({ default: '10' }),
 *     server: t.struct({
 *         host: t.string({ default: 'localhost' }),
 *         port: t.uint16({ default: '8080' }),
 *     }),
 * });
 *
 * const loader = create(schema, {
 *     configFileVariable: 'config',
 *     file: { defaultFilename: 'app.yaml' },
 *     env: { prefix: 'MYAPP_' },
 * });
 *
 * const config = loader.load();
 * // MYAPP_SERVER_PORT=9000 or --server.port 9000 both set config.server.port
 * ```
 */
export const create = <S extends StructDescriptor>(schema: S, pOptions: LoadOptions = {}): Tierconf<S> => {
    const options = validateOptions(mergeOptions(pOptions));

    const setLogger = (pLogger: Logger) => {
        options.logger = pLogger;
    };

    const run = (input: FileInput, runOptions: Options, target?: Seed<S>): Infer<S> =>
        runLoad(schema, target ?? {}, input, runOptions);

    const load = (target?: Seed<S>) => run({ kind: 'file' }, options, target);

    const safeLoad = (target?: Seed<S>): SafeLoadResult<Infer<S>> => {
        try {
            return { success: true, data: load(target) };
        } catch (error) {
            if (error instanceof ConfigurationError) {
                return { success: false, error };
            }
            throw error;
        }
    };

    const help = (): string => {
        const { allOpts } = inspectConfigStructure(schema, {}, { reserveHelp: !options.help.disable });
        return renderHelp(allOpts, helpOptions(options));
    };

    return {
        load,
        safeLoad,
        loadWithMap: (vars: DecodedMap, target?: Seed<S>) => run({ kind: 'map', vars }, options, target),
        loadMap: (vars: DecodedMap, target?: Seed<S>) =>
            run({ kind: 'map', vars }, withoutOuterSources(options), target),
        loadWithContent: (content: string, target?: Seed<S>) => run({ kind: 'content', content }, options, target),
        loadContent: (content: string, target?: Seed<S>) =>
            run({ kind: 'content', content }, withoutOuterSources(options), target),
        help,
        setLogger,
    };
}

/**
 * Load a configuration in one call: `create(schema, options).load(target)`.
 *
 * @example
 * ```typescript
 * const config = load(t.struct({ verbose: t.bool({ short: 'v' }) }));
 * ```
 */
export const load = <S extends StructDescriptor>(schema: S, target?: Seed<S>, options?: LoadOptions): Infer<S> =>
    create(schema, options).load(target);
