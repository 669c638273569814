import * as path from 'path';
import { StructureError } from '../error/StructureError';
import { lookupConfigFileEnv } from '../env/resolver';
import { EnvOptions } from '../env/types';
import { lookupConfigFileFlag } from '../flags/resolver';
import { Option } from '../structure/option';

export interface LocateOptions {
    /** Top-level option id whose value names the configuration file */
    configFileVariable?: string;
    /** File used when the variable is not set */
    defaultFilename?: string;
    /** Directory relative paths resolve against; the working directory when unset */
    baseDirectory?: string;
    /** Command line words to look in, or undefined when flags are disabled */
    args?: string[];
    /** Environment to look in, or undefined when the environment is disabled */
    env?: EnvOptions;
}

export interface ConfigFileLocation {
    /** Absolute path of the file */
    path: string;
    /** Whether the user named the file; a missing explicit file is an error */
    explicit: boolean;
}

/**
 * Find the top-level option named by the config-file variable.
 *
 * @throws {StructureError} When no top-level option has that id
 */
export function findConfigFileOption(opts: Option[], configFileVariable: string): Option {
    const configOpt = opts.find((opt) => opt.id === configFileVariable);
    if (!configOpt) {
        throw new StructureError(
            'unknown_variable',
            `config variable name provided (${configFileVariable}), but not defined in config struct`,
            configFileVariable
        );
    }
    return configOpt;
}

/**
 * Decide which configuration file to read.
 *
 * The config-file variable is looked up on the command line first, then in
 * the environment; a value found there names the file explicitly. Otherwise
 * the default filename is used, if any.
 *
 * @param opts - Top-level options
 * @returns The file to read, or undefined when there is none
 */
export function locateConfigFile(opts: Option[], options: LocateOptions): ConfigFileLocation | undefined {
    const resolve = (file: string) => path.resolve(options.baseDirectory ?? process.cwd(), file);

    if (options.configFileVariable) {
        const configOpt = findConfigFileOption(opts, options.configFileVariable);

        const fromFlags = options.args ? lookupConfigFileFlag(configOpt, options.args) : undefined;
        if (fromFlags) {
            return { path: resolve(fromFlags), explicit: true };
        }

        const fromEnv = options.env ? lookupConfigFileEnv(configOpt, options.env) : undefined;
        if (fromEnv) {
            return { path: resolve(fromEnv), explicit: true };
        }
    }

    if (options.defaultFilename) {
        return { path: resolve(options.defaultFilename), explicit: false };
    }

    return undefined;
}
