import { CoercionError } from '../error/CoercionError';
import { fullId, Option } from '../structure/option';
import { Logger } from '../types';
import { setMapValue, setValueByString } from '../values/setter';
import { makeEnvKey } from './naming';
import { readEnvVar, readPrefixedEnvVars } from './reader';
import { EnvOptions } from './types';

/**
 * Attach the variable name to a coercion failure.
 */
function fromEnvVar(error: unknown, envVarName: string, value: string): unknown {
    if (!(error instanceof CoercionError)) {
        return error;
    }
    return new CoercionError(
        `failed to set option '${error.path}' with value '${value}' from environment variable ${envVarName}: ${error.message}`,
        error.value,
        error.path,
        error.targetType
    );
}

/**
 * Read every option from the environment and write the values found in place.
 *
 * Scalars, slices, byte buffers and text types read the single variable made
 * by {@link makeEnvKey}. Map options collect every variable below that key:
 * with key `LABELS`, `LABELS_TEAM=core` sets the entry `team`.
 *
 * @param allOpts - Flattened option list
 * @param options - Prefix and environment table
 * @param logger - Receives one debug line per variable used
 * @returns Number of variables applied
 * @throws {CoercionError} When a variable does not parse into its option's type
 */
export function applyEnv(allOpts: Option[], options: EnvOptions, logger?: Logger): number {
    let applied = 0;

    for (const opt of allOpts) {
        if (opt.kind === 'parent') {
            continue;
        }

        const envKey = makeEnvKey(options.prefix, opt.fullIdParts);

        if (opt.kind === 'map') {
            for (const result of readPrefixedEnvVars(options.source, `${envKey}_`)) {
                try {
                    setMapValue(opt, result.mapKey ?? '', result.value);
                } catch (error) {
                    throw fromEnvVar(error, result.envVarName, result.value);
                }
                applied++;
                logger?.debug(`Set ${fullId(opt)}.${result.mapKey} from ${result.envVarName}`);
            }
            continue;
        }

        const result = readEnvVar(options.source, envKey);
        if (!result) {
            continue;
        }

        try {
            setValueByString(opt, result.value);
        } catch (error) {
            throw fromEnvVar(error, result.envVarName, result.value);
        }
        applied++;
        logger?.debug(`Set ${fullId(opt)} from ${result.envVarName}`);
    }

    return applied;
}

/**
 * Look up the value of the config-file option in the environment.
 */
export function lookupConfigFileEnv(configOpt: Option, options: EnvOptions): string | undefined {
    return readEnvVar(options.source, makeEnvKey(options.prefix, configOpt.fullIdParts))?.value;
}
