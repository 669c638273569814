import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../../src/error/ConfigurationError';
import { FileSystemError } from '../../src/error/FileSystemError';

describe('FileSystemError', () => {
    it('should create a FileSystemError with correct properties', () => {
        const originalError = new Error('Original error');
        const error = new FileSystemError('operation_failed', 'File not readable', '/test/path', 'read', originalError);

        expect(error).toBeInstanceOf(ConfigurationError);
        expect(error.name).toBe('FileSystemError');
        expect(error.message).toBe('File not readable');
        expect(error.errorType).toBe('file');
        expect(error.fsErrorType).toBe('operation_failed');
        expect(error.path).toBe('/test/path');
        expect(error.configPath).toBe('/test/path');
        expect(error.operation).toBe('read');
        expect(error.originalError).toBe(originalError);
    });

    it('should create a file not found error using static method', () => {
        const error = FileSystemError.fileNotFound('/config/app.yaml');

        expect(error.fsErrorType).toBe('not_found');
        expect(error.message).toBe('config file at /config/app.yaml does not exist');
        expect(error.operation).toBe('file_read');
    });

    it('should create an operation failed error using static method', () => {
        const error = FileSystemError.operationFailed('read configuration file', '/config', new Error('EACCES'));

        expect(error.fsErrorType).toBe('operation_failed');
        expect(error.message).toBe('Failed to read configuration file: EACCES');
    });
});
