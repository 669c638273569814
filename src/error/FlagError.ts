import { ConfigurationError } from './ConfigurationError';

/**
 * Thrown for malformed or unknown command line flags.
 */
export class FlagError extends ConfigurationError {
    /** The flag (or word) at fault, without leading dashes where it is a flag */
    public readonly flag: string;

    constructor(flag: string, message: string) {
        super('flag', message, { flag });
        this.name = 'FlagError';
        this.flag = flag;
    }

    static unexpectedWord(word: string): FlagError {
        return new FlagError(word, `unexpected word while parsing flags: '${word}'`);
    }

    static unknown(flag: string): FlagError {
        return new FlagError(flag, `unknown flag: ${flag}`);
    }

    static ambiguous(fullId: string): FlagError {
        return new FlagError(fullId, `flag is set with both short and full form: ${fullId}`);
    }
}
