import { ConfigurationError } from './ConfigurationError';

/**
 * Thrown when the configuration file cannot be found or read.
 */
export class FileSystemError extends ConfigurationError {
    public readonly fsErrorType: 'not_found' | 'operation_failed';
    public readonly path: string;
    public readonly operation: string;
    public readonly originalError?: Error;

    constructor(
        fsErrorType: 'not_found' | 'operation_failed',
        message: string,
        path: string,
        operation: string,
        originalError?: Error
    ) {
        super('file', message, { path, operation }, path);
        this.name = 'FileSystemError';
        this.fsErrorType = fsErrorType;
        this.path = path;
        this.operation = operation;
        this.originalError = originalError;
    }

    /**
     * Create an error for a configuration file that was explicitly requested but does not exist.
     */
    static fileNotFound(path: string): FileSystemError {
        return new FileSystemError('not_found', `config file at ${path} does not exist`, path, 'file_read');
    }

    /**
     * Create an error for a failed file operation.
     */
    static operationFailed(operation: string, path: string, originalError: Error): FileSystemError {
        return new FileSystemError(
            'operation_failed',
            `Failed to ${operation}: ${originalError.message}`,
            path,
            operation,
            originalError
        );
    }
}
