import { describe, expect, it } from 'vitest';
import {
    ArgumentError,
    CoercionError,
    ConfigurationError,
    DecodeError,
    FlagError,
    HelpRequestedError,
    StructureError,
} from '../../src/error';
import { describeValueType } from '../../src/error/CoercionError';

describe('CoercionError', () => {
    it('should format parse failures', () => {
        const error = CoercionError.parse('x', 'server.port', 'uint16', 'invalid syntax');

        expect(error).toBeInstanceOf(ConfigurationError);
        expect(error.errorType).toBe('coercion');
        expect(error.message).toBe("failed to parse 'x' into type uint16 for option 'server.port': invalid syntax");
        expect(error.value).toBe('x');
        expect(error.path).toBe('server.port');
        expect(error.targetType).toBe('uint16');
    });

    it('should leave out an empty path', () => {
        expect(CoercionError.parse('x', '', 'int').message).toBe("failed to parse 'x' into type int");
    });

    it('should format inconvertible values', () => {
        expect(CoercionError.inconvertible(true, 'name', 'string').message).toBe(
            "incompatible type for option 'name': boolean not convertible to string"
        );
    });

    it('should describe decoded value types', () => {
        expect(describeValueType(null)).toBe('null');
        expect(describeValueType([1])).toBe('array');
        expect(describeValueType({})).toBe('object');
        expect(describeValueType(new Date(0))).toBe('Date');
        expect(describeValueType(1n)).toBe('bigint');
    });
});

describe('FlagError', () => {
    it('should format each failure', () => {
        expect(FlagError.unexpectedWord('stray').message).toBe("unexpected word while parsing flags: 'stray'");
        expect(FlagError.unknown('nope').message).toBe('unknown flag: nope');
        expect(FlagError.ambiguous('count').message).toBe('flag is set with both short and full form: count');
        expect(FlagError.unknown('nope').flag).toBe('nope');
        expect(FlagError.unknown('nope').errorType).toBe('flag');
    });
});

describe('DecodeError', () => {
    it('should add the file path', () => {
        const error = DecodeError.inFile(new DecodeError('JSON', 'error parsing JSON config file: bad'), '/srv/app.json');

        expect(error.message).toBe('failed to parse file at /srv/app.json: error parsing JSON config file: bad');
        expect(error.decoder).toBe('JSON');
        expect(error.configPath).toBe('/srv/app.json');
    });
});

describe('HelpRequestedError', () => {
    it('should carry the usage text', () => {
        const error = new HelpRequestedError('Usage: demo [options]\n');

        expect(error).toBeInstanceOf(ConfigurationError);
        expect(error.errorType).toBe('help');
        expect(error.usage).toBe('Usage: demo [options]\n');
    });
});

describe('programmer errors', () => {
    it('should not be configuration errors', () => {
        expect(StructureError.duplicateId('count')).not.toBeInstanceOf(ConfigurationError);
        expect(new ArgumentError('options', 'bad')).not.toBeInstanceOf(ConfigurationError);
    });

    it('should prefix structure messages', () => {
        const error = StructureError.unsupportedType('x', 'type not supported');

        expect(error.message).toBe('error in config structure: type of field x is not supported: type not supported');
        expect(error.errorType).toBe('unsupported_type');
        expect(error.field).toBe('x');
    });

    it('should name the invalid argument', () => {
        const error = new ArgumentError('help.width', 'Invalid loader option help.width');

        expect(error.argument).toBe('help.width');
        expect(error.name).toBe('ArgumentError');
    });
});
