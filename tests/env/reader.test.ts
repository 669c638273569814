import { describe, expect, it } from 'vitest';
import { readEnvVar, readPrefixedEnvVars } from '../../src/env/reader';

describe('readEnvVar', () => {
    it('should read a set variable', () => {
        expect(readEnvVar({ TEST_VAR: 'test-value' }, 'TEST_VAR')).toEqual({ envVarName: 'TEST_VAR', value: 'test-value' });
    });

    it('should keep empty values', () => {
        expect(readEnvVar({ TEST_VAR: '' }, 'TEST_VAR')).toEqual({ envVarName: 'TEST_VAR', value: '' });
    });

    it('should return undefined for a missing variable', () => {
        expect(readEnvVar({ OTHER: 'x', UNSET: undefined }, 'UNSET')).toBeUndefined();
        expect(readEnvVar({}, 'NONEXISTENT')).toBeUndefined();
    });
});

describe('readPrefixedEnvVars', () => {
    it('should derive lower-cased map keys from the rest of the name', () => {
        const source = {
            LABELS_TEAM: 'core',
            LABELS_: 'ignored',
            OTHER: 'ignored',
            LABELS_Owner_Name: 'z',
        };

        expect(readPrefixedEnvVars(source, 'LABELS_')).toEqual([
            { envVarName: 'LABELS_TEAM', value: 'core', mapKey: 'team' },
            { envVarName: 'LABELS_Owner_Name', value: 'z', mapKey: 'owner_name' },
        ]);
    });
});
