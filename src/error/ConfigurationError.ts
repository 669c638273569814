/**
 * Categories of recoverable configuration failures.
 */
export type ConfigurationErrorType = 'coercion' | 'flag' | 'file' | 'decode' | 'help';

/**
 * Base class for every failure caused by configuration input rather than by
 * the shape of the configuration schema.
 *
 * Anything thrown by a loader that is an instance of this class can be
 * reported to the end user; the populated target must then be treated as
 * indeterminate, since fields written before the failure stay written.
 */
export class ConfigurationError extends Error {
    public readonly errorType: ConfigurationErrorType;
    public readonly details?: unknown;
    public readonly configPath?: string;

    constructor(
        errorType: ConfigurationErrorType,
        message: string,
        details?: unknown,
        configPath?: string
    ) {
        super(message);
        this.name = 'ConfigurationError';
        this.errorType = errorType;
        this.details = details;
        this.configPath = configPath;
    }
}
