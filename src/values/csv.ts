/**
 * Thrown for malformed comma separated input.
 */
export class CsvError extends Error {
    constructor(message: string, public readonly column: number) {
        super(`parse error at column ${column}: ${message}`);
        this.name = 'CsvError';
    }
}

/**
 * Read one comma separated record.
 *
 * Fields may be enclosed in double quotes to hold commas, line breaks or
 * doubled quotes (`""`). A quote inside an unquoted field, or anything but a
 * comma after a closing quote, is an error. Input past the first unquoted line
 * break is ignored. Empty input yields no fields.
 *
 * @example
 * ```typescript
 * readAsCsv('a,b,"c,d"'); // ['a', 'b', 'c,d']
 * ```
 */
export function readAsCsv(value: string): string[] {
    if (value === '') {
        return [];
    }

    const fields: string[] = [];
    const isRecordEnd = (index: number) =>
        index >= value.length || value[index] === '\n' || value[index] === '\r';
    let i = 0;

    for (;;) {
        if (value[i] === '"') {
            let field = '';
            i++;
            for (;;) {
                if (i >= value.length) {
                    throw new CsvError('extraneous or missing " in quoted-field', i + 1);
                }
                if (value[i] === '"') {
                    if (value[i + 1] === '"') {
                        field += '"';
                        i += 2;
                        continue;
                    }
                    i++;
                    break;
                }
                field += value[i];
                i++;
            }
            fields.push(field);
            if (isRecordEnd(i)) {
                break;
            }
            if (value[i] !== ',') {
                throw new CsvError('extraneous or missing " in quoted-field', i + 1);
            }
            i++;
            continue;
        }

        let end = i;
        while (!isRecordEnd(end) && value[end] !== ',') {
            end++;
        }
        const field = value.slice(i, end);
        const quote = field.indexOf('"');
        if (quote !== -1) {
            throw new CsvError('bare " in non-quoted-field', i + quote + 1);
        }
        fields.push(field);
        if (isRecordEnd(end)) {
            break;
        }
        i = end + 1;
    }

    return fields;
}
