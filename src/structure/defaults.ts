import { Logger } from '../types';
import { isZero } from '../values/zero';
import { fullId, Option } from './option';

/**
 * Write declared defaults into every option that still holds its zero value.
 *
 * A value the caller put in the target before loading is never replaced by a
 * default. Defaults were coerced when the option tree was built, so this
 * cannot fail.
 *
 * @param allOpts - Flattened option list, nested options included
 * @param logger - Receives one debug line per default applied
 * @returns Number of defaults written
 */
export function applyDefaults(allOpts: Option[], logger?: Logger): number {
    let applied = 0;

    for (const opt of allOpts) {
        if (opt.kind === 'parent' || !opt.defaultSet) {
            continue;
        }

        if (!isZero(opt.type, opt.handle.get())) {
            logger?.debug(`Keeping pre-populated value of ${fullId(opt)} over its default`);
            continue;
        }

        opt.handle.set(opt.defaultValue);
        applied++;
        logger?.debug(`Applied default for ${fullId(opt)}: ${opt.defaultLiteral}`);
    }

    return applied;
}
