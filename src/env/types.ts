/**
 * Environment table the loader reads from; `process.env` unless injected.
 */
export type EnvSource = Record<string, string | undefined>;

/**
 * Settings of the environment source
 */
export interface EnvOptions {
    /** Prefix of every variable key, used as given (no underscore is added) */
    prefix: string;
    /** Environment table to read */
    source: EnvSource;
}

/**
 * A variable that was found for an option
 */
export interface EnvVarReadResult {
    /** Full variable key that was read */
    envVarName: string;
    /** Its value */
    value: string;
    /** Map key derived from the variable, for map options */
    mapKey?: string;
}
