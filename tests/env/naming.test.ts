import { describe, expect, it } from 'vitest';
import { makeEnvKey } from '../../src/env/naming';

describe('makeEnvKey', () => {
    it('should join identifiers with underscores in upper case', () => {
        expect(makeEnvKey('', ['server', 'port'])).toBe('SERVER_PORT');
    });

    it('should fold hyphens into underscores', () => {
        expect(makeEnvKey('myapp_', ['max-retries'])).toBe('MYAPP_MAX_RETRIES');
    });

    it('should use the prefix as given', () => {
        expect(makeEnvKey('App', ['count'])).toBe('APPCOUNT');
    });
});
