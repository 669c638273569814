import { Command, Option as CommanderOption } from 'commander';
import { makeEnvKey } from './env/naming';
import { TypeDescriptor } from './structure/descriptor';
import { fullId, hasFieldOpt, Option } from './structure/option';

export interface HelpOptions {
    /** Program name shown in the usage line */
    programName: string;
    /** Text printed below the usage line */
    message?: string;
    /** Description of the help flag itself */
    description: string;
    /** Wrapping width */
    width: number;
    /** Whether `-h, --help` is listed */
    helpFlag: boolean;
    /** Environment prefix, to show each option's variable; omitted when the environment is disabled */
    envPrefix?: string;
}

/**
 * Short name of the value an option takes on the command line.
 */
export function typeString(type: TypeDescriptor): string {
    switch (type.kind) {
        case 'text':
        case 'bytes':
        case 'string':
            return 'string';
        case 'bool':
            return 'bool';
        case 'float32':
        case 'float64':
            return 'float';
        case 'int':
        case 'int8':
        case 'int16':
        case 'int32':
        case 'int64':
            return 'int';
        case 'uint':
        case 'uint8':
        case 'uint16':
        case 'uint32':
        case 'uint64':
            return 'uint';
        case 'slice':
            return `${typeString(type.element)}...`;
        default:
            return '';
    }
}

/**
 * Extract a back-quoted name from a description.
 * Given "a `name` to show" it returns ['name', 'a name to show']; without a
 * pair of back quotes the name is empty.
 */
export function unquoteDescription(description: string): [string, string] {
    const open = description.indexOf('`');
    if (open < 0) {
        return ['', description];
    }
    const close = description.indexOf('`', open + 1);
    if (close < 0) {
        return ['', description];
    }
    const name = description.slice(open + 1, close);
    return [name, description.slice(0, open) + name + description.slice(close + 1)];
}

function commanderOption(opt: Option, options: HelpOptions): CommanderOption {
    const id = fullId(opt);
    const typeStr = typeString(opt.type);
    const [valueName, description] = unquoteDescription(opt.description);

    let flags = opt.short ? `-${opt.short}, --${id}` : `--${id}`;
    if (opt.kind === 'map') {
        flags += '.<key> <value>';
    } else {
        const name = valueName || (typeStr === 'bool' ? '' : typeStr);
        if (name) {
            flags += ` <${name}>`;
        }
    }

    const option = new CommanderOption(flags, description);

    if (opt.defaultLiteral !== '') {
        const shown = typeStr.startsWith('string') ? JSON.stringify(opt.defaultLiteral) : opt.defaultLiteral;
        option.default(opt.defaultValue, shown);
    }
    if (options.envPrefix !== undefined) {
        const envKey = makeEnvKey(options.envPrefix, opt.fullIdParts);
        option.env(opt.kind === 'map' ? `${envKey}_<KEY>` : envKey);
    }
    if (hasFieldOpt(opt, 'hidden')) {
        option.hideHelp();
    }

    return option;
}

/**
 * Build a command describing every option, for rendering usage text.
 * Struct parents carry no value and are left out.
 */
export function createHelpCommand(allOpts: Option[], options: HelpOptions): Command {
    const command = new Command(options.programName)
        .usage('[options]')
        .configureHelp({ helpWidth: options.width });

    if (options.message) {
        command.description(options.message);
    }

    if (options.helpFlag) {
        command.helpOption('-h, --help', options.description);
    } else {
        command.helpOption(false);
    }

    for (const opt of allOpts) {
        if (opt.kind === 'parent') {
            continue;
        }
        command.addOption(commanderOption(opt, options));
    }

    return command;
}

/**
 * Render the usage text for an option list.
 */
export function renderHelp(allOpts: Option[], options: HelpOptions): string {
    return createHelpCommand(allOpts, options).helpInformation();
}
