import { EnvSource, EnvVarReadResult } from './types';

/**
 * Read one environment variable.
 *
 * @param source - Environment table
 * @param envVarName - Full key, e.g. 'MYAPP_SERVER_PORT'
 * @returns The read result, or undefined when the variable is not set
 */
export function readEnvVar(source: EnvSource, envVarName: string): EnvVarReadResult | undefined {
    const value = source[envVarName];
    if (value === undefined) {
        return undefined;
    }
    return { envVarName, value };
}

/**
 * Read every variable whose key starts with `prefix`. The rest of the key,
 * lower-cased, becomes the map key.
 *
 * Example:
 *   prefix 'LABELS_' and LABELS_TEAM=core -> { mapKey: 'team', value: 'core' }
 *
 * @param source - Environment table
 * @param prefix - Key prefix, separator included
 * @returns Results in the table's iteration order
 */
export function readPrefixedEnvVars(source: EnvSource, prefix: string): EnvVarReadResult[] {
    const results: EnvVarReadResult[] = [];

    for (const [envVarName, value] of Object.entries(source)) {
        if (value === undefined || !envVarName.startsWith(prefix) || envVarName.length === prefix.length) {
            continue;
        }
        results.push({
            envVarName,
            value,
            mapKey: envVarName.slice(prefix.length).toLowerCase(),
        });
    }

    return results;
}
