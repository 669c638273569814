import { Logger, Options } from './types';

/** Default file encoding for reading configuration files */
export const DEFAULT_ENCODING = 'utf8';

/** Description of the help flag in usage output */
export const DEFAULT_HELP_DESCRIPTION = 'print this help menu';

/** Column at which usage output wraps */
export const DEFAULT_HELP_WIDTH = 80;

/**
 * Default logger implementation using console methods.
 * Provides basic logging functionality when no custom logger is specified.
 * The verbose and silly methods are no-ops to avoid excessive output.
 */
export const DEFAULT_LOGGER: Logger = {
    // eslint-disable-next-line no-console
    debug: console.debug,
    // eslint-disable-next-line no-console
    info: console.info,
    // eslint-disable-next-line no-console
    warn: console.warn,
    // eslint-disable-next-line no-console
    error: console.error,

    verbose: () => { },

    silly: () => { },
}

/**
 * Default loader options. All four sources are enabled, no configuration
 * file is read unless one is named, and `--help`/`-h` are reserved.
 */
export const DEFAULT_OPTIONS: Options = {
    file: {
        disable: false,
        encoding: DEFAULT_ENCODING,
    },
    env: {
        disable: false,
        prefix: '',
    },
    flags: {
        disable: false,
        ignoreUnknown: false,
    },
    help: {
        disable: false,
        description: DEFAULT_HELP_DESCRIPTION,
        width: DEFAULT_HELP_WIDTH,
    },
    logger: DEFAULT_LOGGER,
}
