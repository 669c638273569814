import { CoercionError } from '../error/CoercionError';
import { FlagError } from '../error/FlagError';
import { fullId, Option } from '../structure/option';
import { Logger } from '../types';
import { setMapValue, setValueByString } from '../values/setter';
import { FlagValues, ParsedFlags, parseFlagsToMap } from './parser';

export interface ApplyFlagsOptions {
    /** Leave flags that match no option alone instead of failing */
    ignoreUnknown?: boolean;
}

function fromFlag(error: unknown, flag: string): unknown {
    if (!(error instanceof CoercionError)) {
        return error;
    }
    return new CoercionError(
        `error parsing flag value for ${flag}: ${error.message}`,
        error.value,
        error.path,
        error.targetType
    );
}

/**
 * Take the value addressed to `opt` by its full id or its shorthand out of
 * `values`. Setting both forms is an error.
 */
function takeFlagValue(opt: Option, values: FlagValues): string | undefined {
    const id = fullId(opt);
    const full = values.get(id);
    values.delete(id);

    let short: string | undefined;
    if (opt.short) {
        short = values.get(opt.short);
        values.delete(opt.short);
    }

    if (full !== undefined && short !== undefined) {
        throw FlagError.ambiguous(id);
    }
    return full ?? short;
}

/**
 * Write parsed flag values into the options they address.
 *
 * Leaf options are addressed by full id (`server.port`) or shorthand. Map
 * options take one flag per key: `--labels.team core` sets the entry `team`.
 * Each flag is consumed by the first option that claims it; what remains is
 * reported as unknown.
 *
 * @param allOpts - Flattened option list
 * @param values - Parsed flags; consumed entries are removed
 * @param logger - Receives one debug line per flag used
 * @returns Number of flags applied
 * @throws {FlagError} On ambiguous or unknown flags
 * @throws {CoercionError} When a value does not parse into its option's type
 */
export function applyFlags(
    allOpts: Option[],
    values: FlagValues,
    options: ApplyFlagsOptions = {},
    logger?: Logger
): number {
    let applied = 0;

    for (const opt of allOpts) {
        if (opt.kind === 'parent') {
            continue;
        }

        const id = fullId(opt);

        if (opt.kind === 'map') {
            const prefix = `${id}.`;
            for (const [flag, value] of [...values]) {
                if (!flag.startsWith(prefix) || flag.length === prefix.length) {
                    continue;
                }
                values.delete(flag);
                try {
                    setMapValue(opt, flag.slice(prefix.length), value);
                } catch (error) {
                    throw fromFlag(error, flag);
                }
                applied++;
                logger?.debug(`Set ${flag} from command line`);
            }
            continue;
        }

        const value = takeFlagValue(opt, values);
        if (value === undefined) {
            continue;
        }

        try {
            setValueByString(opt, value);
        } catch (error) {
            throw fromFlag(error, id);
        }
        applied++;
        logger?.debug(`Set ${id} from command line`);
    }

    if (!options.ignoreUnknown) {
        for (const flag of values.keys()) {
            throw FlagError.unknown(flag);
        }
    }

    return applied;
}

/**
 * Look up the value of the config-file option on the command line. Words that
 * do not parse are left for the flag stage to report.
 */
export function lookupConfigFileFlag(configOpt: Option, args: string[]): string | undefined {
    let parsed: ParsedFlags;
    try {
        parsed = parseFlagsToMap(args);
    } catch (error) {
        if (error instanceof FlagError) {
            return undefined;
        }
        throw error;
    }
    return parsed.values.get(fullId(configOpt)) ?? (configOpt.short ? parsed.values.get(configOpt.short) : undefined);
}
