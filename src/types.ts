import type { EnvSource } from './env/types';
import type { DecodedMap, FileDecoder } from './file/decoders';
import type { Infer, Seed, StructDescriptor } from './structure/descriptor';

export type { DecodedMap, FileDecoder } from './file/decoders';
export type { EnvSource } from './env/types';

/**
 * Settings of the configuration file source.
 */
export interface FileSettings {
    /** Skip the file source entirely */
    disable: boolean;
    /** File read when the config-file variable is not set; missing is fine */
    defaultFilename?: string;
    /** Decoder used instead of choosing one from the file extension */
    decoder?: FileDecoder;
    /** Directory relative file paths resolve against; the working directory when unset */
    baseDirectory?: string;
    /** Encoding the file is read with */
    encoding: BufferEncoding;
}

/**
 * Settings of the environment source.
 */
export interface EnvSettings {
    disable: boolean;
    /** Prepended to every variable key as given, e.g. 'MYAPP_' */
    prefix: string;
    /** Environment table; `process.env` at load time when unset */
    source?: EnvSource;
}

/**
 * Settings of the command line source.
 */
export interface FlagSettings {
    disable: boolean;
    /** Leave flags that match no option alone instead of failing */
    ignoreUnknown: boolean;
    /** Words to parse; `process.argv.slice(2)` at load time when unset */
    args?: string[];
}

/**
 * Settings of the help flag and usage text.
 */
export interface HelpSettings {
    /** Do not reserve `--help`/`-h` */
    disable: boolean;
    /** Text shown under the usage line */
    message?: string;
    /** Description of the help flag */
    description: string;
    /** Program name in the usage line; the script name when unset */
    programName?: string;
    /** Column at which the usage text wraps */
    width: number;
}

/**
 * Complete loader options, after defaults have been merged in.
 */
export interface Options {
    /** Top-level option id whose value names the configuration file */
    configFileVariable?: string;
    file: FileSettings;
    env: EnvSettings;
    flags: FlagSettings;
    help: HelpSettings;
    logger: Logger;
}

/**
 * Loader options as accepted from the caller. Every group and every setting
 * is optional; see `DEFAULT_OPTIONS`.
 */
export interface LoadOptions {
    configFileVariable?: string;
    file?: Partial<FileSettings>;
    env?: Partial<EnvSettings>;
    flags?: Partial<FlagSettings>;
    help?: Partial<HelpSettings>;
    logger?: Logger;
}

/**
 * Logger interface for the loader's internal logging.
 * Compatible with popular logging libraries like Winston, Bunyan, etc.
 */
export interface Logger {
    /** Debug-level logging: individual values being set */
    debug: (message: string, ...args: unknown[]) => void;
    /** Info-level logging for general information */
    info: (message: string, ...args: unknown[]) => void;
    /** Warning-level logging for non-critical issues */
    warn: (message: string, ...args: unknown[]) => void;
    /** Error-level logging for critical problems */
    error: (message: string, ...args: unknown[]) => void;
    /** Verbose-level logging: the stages of a load */
    verbose: (message: string, ...args: unknown[]) => void;
    /** Silly-level logging for maximum detail */
    silly: (message: string, ...args: unknown[]) => void;
}

/**
 * Outcome of `safeLoad`. Only input errors are returned here; errors in the
 * schema itself are still thrown.
 */
export type SafeLoadResult<T> =
    | { success: true; data: T }
    | { success: false; error: Error };

/**
 * A loader bound to one configuration schema.
 *
 * Every method builds a fresh option tree over the target it is given (or a
 * new object), writes into that target in place and returns it.
 *
 * @template S - Struct descriptor of the configuration
 */
export interface Tierconf<S extends StructDescriptor> {
    /**
     * Load defaults, then the configuration file, the environment and the
     * command line, each overriding the previous.
     */
    load: (target?: Seed<S>) => Infer<S>;
    /** Like `load`, but returns input errors instead of throwing them */
    safeLoad: (target?: Seed<S>) => SafeLoadResult<Infer<S>>;
    /** Like `load`, with `vars` in place of the configuration file */
    loadWithMap: (vars: DecodedMap, target?: Seed<S>) => Infer<S>;
    /** Defaults and `vars` only */
    loadMap: (vars: DecodedMap, target?: Seed<S>) => Infer<S>;
    /** Like `load`, with `content` decoded in place of the configuration file */
    loadWithContent: (content: string, target?: Seed<S>) => Infer<S>;
    /** Defaults and decoded `content` only */
    loadContent: (content: string, target?: Seed<S>) => Infer<S>;
    /** Usage text listing every visible option */
    help: () => string;
    /** Sets a custom logger */
    setLogger: (logger: Logger) => void;
}
