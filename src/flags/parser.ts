import { FlagError } from '../error/FlagError';

/**
 * Raw flag values keyed by flag name (full id or shorthand, without dashes).
 */
export type FlagValues = Map<string, string>;

export interface ParseFlagsOptions {
    /** Treat `--help` and `-h` as a help request instead of an ordinary flag */
    helpEnabled?: boolean;
}

export interface ParsedFlags {
    values: FlagValues;
    /** Whether `--help` or `-h` was found; `values` is then incomplete */
    helpRequested: boolean;
}

/**
 * The flag name carried by a command line word: `--name` gives `name` and
 * `-n` gives `n`. Any other word, `--` included, is not a flag and gives
 * undefined.
 */
export function flagFromWord(word: string): string | undefined {
    if (word.length > 2 && word.startsWith('--')) {
        return word.slice(2);
    }
    if (word.length === 2 && word.startsWith('-') && word[1] !== '-') {
        return word.slice(1);
    }
    return undefined;
}

/**
 * Parse command line words into raw flag values.
 *
 * Accepted forms are `--name=value`, `--name value`, `-n value` and `-n=value`.
 * A flag followed by another flag, by `--` or by nothing, is set to `true`.
 * Repeated flags accumulate their values comma separated, so
 * `--tag a --tag b` reads as `a,b`. Parsing stops at `--`.
 *
 * @param args - Words to parse, without the program name
 * @throws {FlagError} On a word that is neither a flag nor a flag's value
 */
export function parseFlagsToMap(args: string[], options: ParseFlagsOptions = {}): ParsedFlags {
    const values: FlagValues = new Map();

    const addValue = (key: string, value: string) => {
        const existing = values.get(key);
        values.set(key, existing === undefined ? value : `${existing},${value}`);
    };

    let i = 0;
    while (i < args.length) {
        const arg = args[i];

        if (options.helpEnabled && (arg === '--help' || arg === '-h')) {
            return { values, helpRequested: true };
        }

        if (arg === '--') {
            break;
        }

        const separator = arg.indexOf('=');
        const word = separator >= 0 ? arg.slice(0, separator) : arg;
        const key = flagFromWord(word);
        if (key === undefined) {
            throw FlagError.unexpectedWord(arg);
        }

        if (separator >= 0) {
            addValue(key, arg.slice(separator + 1));
            i += 1;
            continue;
        }

        const next = args[i + 1];
        if (next === undefined || next === '--' || flagFromWord(next) !== undefined) {
            addValue(key, 'true');
            i += 1;
            continue;
        }

        addValue(key, next);
        i += 2;
    }

    return { values, helpRequested: false };
}
