/**
 * Convert a field name to the kebab-case identifier used for flags, file keys
 * and (after folding) environment variables.
 *
 * Examples:
 *   maxRetryCount -> max-retry-count
 *   openaiAPIKey -> openai-api-key
 *   HTTPSConnection -> https-connection
 *   max_retry_count -> max-retry-count
 *
 * Applying it to its own output returns the output unchanged.
 *
 * @param name - Field name or file key
 * @returns The kebab-case identifier
 */
export function toKebabCase(name: string): string {
    if (!name) {
        return '';
    }

    return name
        .replace(/([a-z0-9])([A-Z])/g, '$1-$2')  // Insert - between lower/digit and upper
        .replace(/([A-Z])([A-Z][a-z])/g, '$1-$2') // Insert - between consecutive capitals when followed by lowercase
        .replace(/[\s_]+/g, '-')
        .toLowerCase();
}

/**
 * Join the identifiers of an option and its ancestors with dots.
 *
 * Examples:
 *   ['server', 'port'] -> 'server.port'
 */
export function fullIdOf(parts: string[]): string {
    return parts.join('.');
}
