import { ConfigurationError } from './ConfigurationError';

/**
 * Thrown when `--help` or `-h` was passed on the command line. Carries the
 * rendered usage text; printing it and choosing an exit code is up to the
 * caller.
 */
export class HelpRequestedError extends ConfigurationError {
    public readonly usage: string;

    constructor(usage: string) {
        super('help', 'help requested');
        this.name = 'HelpRequestedError';
        this.usage = usage;
    }
}
