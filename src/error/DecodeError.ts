import { ConfigurationError } from './ConfigurationError';

/**
 * Thrown when configuration file content cannot be decoded into a
 * string-keyed map.
 */
export class DecodeError extends ConfigurationError {
    /** Name of the decoder that failed, e.g. 'YAML' or 'try-all' */
    public readonly decoder: string;

    constructor(decoder: string, message: string, configPath?: string) {
        super('decode', message, { decoder }, configPath);
        this.name = 'DecodeError';
        this.decoder = decoder;
    }

    /**
     * Re-throws a decoder failure with the path of the file it was reading.
     */
    static inFile(error: DecodeError, path: string): DecodeError {
        return new DecodeError(error.decoder, `failed to parse file at ${path}: ${error.message}`, path);
    }
}
