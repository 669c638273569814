import { describe, expect, it } from 'vitest';
import { CsvError, readAsCsv } from '../../src/values/csv';

describe('readAsCsv', () => {
    it('should return no fields for empty input', () => {
        expect(readAsCsv('')).toEqual([]);
    });

    it('should split on commas', () => {
        expect(readAsCsv('a,b,c')).toEqual(['a', 'b', 'c']);
        expect(readAsCsv('a,,b,')).toEqual(['a', '', 'b', '']);
    });

    it('should keep commas inside quoted fields', () => {
        expect(readAsCsv('a,b,"c,d"')).toEqual(['a', 'b', 'c,d']);
    });

    it('should unescape doubled quotes', () => {
        expect(readAsCsv('"say ""hi""",x')).toEqual(['say "hi"', 'x']);
    });

    it('should stop at the end of the first line', () => {
        expect(readAsCsv('a,b\nc,d')).toEqual(['a', 'b']);
    });

    it('should reject a bare quote in an unquoted field', () => {
        expect(() => readAsCsv('a"b')).toThrow(CsvError);
        expect(() => readAsCsv('a"b')).toThrow('parse error at column 2: bare " in non-quoted-field');
    });

    it('should reject an unterminated quoted field', () => {
        expect(() => readAsCsv('"abc')).toThrow('parse error at column 5: extraneous or missing " in quoted-field');
    });

    it('should reject text after a closing quote', () => {
        expect(() => readAsCsv('"a"b')).toThrow('parse error at column 4: extraneous or missing " in quoted-field');
    });
});
