/**
 * Build the environment variable key of an option: the prefix followed by the
 * option's identifiers joined with underscores, hyphens folded to underscores,
 * all upper case.
 *
 * No separator is inserted after the prefix, so a prefix normally ends with
 * an underscore.
 *
 * Examples:
 *   ('', ['server', 'port']) -> 'SERVER_PORT'
 *   ('myapp_', ['max-retries']) -> 'MYAPP_MAX_RETRIES'
 *
 * @param prefix - Prefix shared by all variables of the application
 * @param fullIdParts - Identifiers of the option and its ancestors
 * @returns The environment variable key
 */
export function makeEnvKey(prefix: string, fullIdParts: string[]): string {
    const key = fullIdParts.join('_').replace(/-/g, '_');
    return (prefix + key).toUpperCase();
}
