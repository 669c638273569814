import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
    ArgumentError,
    CoercionError,
    ConfigurationError,
    create,
    FileSystemError,
    FlagError,
    HelpRequestedError,
    load,
    LoadOptions,
    StructureError,
    t,
} from '../src/tierconf';
import { createMockLogger, HexEncoded } from './helpers';

const schema = t.struct({
    count: t.int({ short: 'c', default: '10', description: 'number of items' }),
    tags: t.slice(t.string()),
    server: t.struct({
        host: t.string({ default: 'localhost' }),
        port: t.uint16({ default: '8080' }),
    }),
    data: t.bytes(),
    labels: t.map(),
});

const sources = (args: string[] = [], env: Record<string, string> = {}): LoadOptions => ({
    env: { source: env },
    flags: { args },
    help: { programName: 'demo' },
    logger: createMockLogger(),
});

describe('create().load', () => {
    it('should apply defaults when no source sets anything', () => {
        expect(create(schema, sources()).load()).toEqual({
            count: 10,
            tags: [],
            server: { host: 'localhost', port: 8080 },
            data: new Uint8Array(0),
            labels: {},
        });
    });

    it('should let flags override defaults', () => {
        expect(create(schema, sources(['--count', '25'])).load().count).toBe(25);
        expect(create(schema, sources(['-c', '26'])).load().count).toBe(26);
    });

    it('should read comma separated lists from the environment', () => {
        expect(create(schema, sources([], { TAGS: 'a,b,"c,d"' })).load().tags).toEqual(['a', 'b', 'c,d']);
    });

    it('should address nested options the same way from flags and the environment', () => {
        const fromFlags = create(schema, sources(['--server.port', '9090'])).load();
        const fromEnv = create(schema, sources([], { SERVER_PORT: '9090' })).load();

        expect(fromFlags.server.port).toBe(9090);
        expect(fromEnv).toEqual(fromFlags);
    });

    it('should decode byte buffers from base64', () => {
        expect(create(schema, sources([], { DATA: 'AQID' })).load().data).toEqual(new Uint8Array([1, 2, 3]));
        expect(() => create(schema, sources([], { DATA: 'AQI' })).load()).toThrow(CoercionError);
    });

    it('should fill map entries from flags and the environment', () => {
        const config = create(schema, sources(['--labels.team', 'core'], { LABELS_OWNER: 'ops' })).load();

        expect(config.labels).toEqual({ owner: 'ops', team: 'core' });
    });

    it('should keep pre-populated values over defaults', () => {
        const target = { count: 5 };
        const config = create(schema, sources()).load(target);

        expect(config.count).toBe(5);
        expect(config).toBe(target);
    });

    it('should let every source overwrite pre-populated values', () => {
        expect(create(schema, sources()).loadWithContent('count: 6', { count: 5 }).count).toBe(6);
        expect(create(schema, sources([], { COUNT: '7' })).load({ count: 5 }).count).toBe(7);
        expect(create(schema, sources(['--count', '8'])).load({ count: 5 }).count).toBe(8);

        const config = create(schema, sources([], { SERVER_HOST: 'env-host' })).load({ server: { host: 'pre.test', port: 1 } });
        expect(config.server).toEqual({ host: 'env-host', port: 1 });
    });

    it('should honour the environment prefix', () => {
        const options: LoadOptions = { ...sources(), env: { prefix: 'APP_', source: { APP_COUNT: '11', COUNT: '1' } } };

        expect(create(schema, options).load().count).toBe(11);
    });

    it('should decode text types', () => {
        const config = create(t.struct({ key: t.text(HexEncoded) }), sources(['--key', '0aff'])).load();

        expect(config.key).toBeInstanceOf(HexEncoded);
        expect(config.key?.bytes).toEqual([10, 255]);
    });

    it('should report integer overflow', () => {
        const loader = create(t.struct({ level: t.int8() }), sources(['--level', '200']));

        expect(() => loader.load()).toThrow(
            "error parsing flag value for level: failed to parse '200' into type int8 for option 'level': value out of range"
        );
    });

    it('should reject unknown flags unless told to ignore them', () => {
        expect(() => create(schema, sources(['--nope'])).load()).toThrow(FlagError);
        expect(() => create(schema, sources(['--nope'])).load()).toThrow('unknown flag: nope');

        const options: LoadOptions = { ...sources(), flags: { args: ['--nope'], ignoreUnknown: true } };
        expect(create(schema, options).load().count).toBe(10);
    });

    it('should throw structure errors for duplicate shorthands', () => {
        const broken = t.struct({ a: t.int({ short: 'x' }), b: t.struct({ c: t.int({ short: 'x' }) }) });

        expect(() => create(broken, sources()).load()).toThrow(StructureError);
        expect(() => create(broken, sources()).safeLoad()).toThrow(StructureError);
    });

    it('should check structs inside lists before reading any source', () => {
        const broken = t.struct({ items: t.slice(t.struct({ a: t.int(), b: t.int({ id: 'a' }) })) });

        expect(() => create(broken, sources()).load()).toThrow('error in config structure: duplicate config variable: items.a');
    });

    it('should reserve -h unless help is disabled', () => {
        const withH = t.struct({ host: t.string({ short: 'h' }) });

        expect(() => create(withH, sources()).load()).toThrow(StructureError);
        expect(create(withH, { ...sources(['-h', 'example.test']), help: { disable: true } }).load()).toEqual({ host: 'example.test' });
    });
});

describe('source precedence', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tierconf-load-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should apply the file, then the environment, then flags', () => {
        fs.writeFileSync(path.join(dir, 'app.yaml'), 'count: 1\nserver:\n  host: file-host\n  port: 1000\n');
        const loader = create(schema, {
            ...sources(['--count', '3'], { COUNT: '2', SERVER_HOST: 'env-host' }),
            file: { defaultFilename: 'app.yaml', baseDirectory: dir },
        });

        expect(loader.load()).toEqual({
            count: 3,
            tags: [],
            server: { host: 'env-host', port: 1000 },
            data: new Uint8Array(0),
            labels: {},
        });
    });

    it('should read the file named by the config-file variable', () => {
        fs.writeFileSync(path.join(dir, 'custom.json'), '{"count": 4}');
        const withConfig = t.struct({ config: t.string(), count: t.int() });
        const loader = create(withConfig, {
            ...sources(['--config', 'custom.json']),
            configFileVariable: 'config',
            file: { defaultFilename: 'app.yaml', baseDirectory: dir },
        });

        expect(loader.load()).toEqual({ config: 'custom.json', count: 4 });
    });

    it('should fail when the named file does not exist', () => {
        const withConfig = t.struct({ config: t.string(), count: t.int() });
        const loader = create(withConfig, {
            ...sources([], { CONFIG: 'missing.toml' }),
            configFileVariable: 'config',
            file: { baseDirectory: dir },
        });

        expect(() => loader.load()).toThrow(FileSystemError);
        expect(() => loader.load()).toThrow(`config file at ${path.join(dir, 'missing.toml')} does not exist`);
    });

    it('should tolerate a missing default file', () => {
        const loader = create(schema, { ...sources(), file: { defaultFilename: 'app.yaml', baseDirectory: dir } });

        expect(loader.load().count).toBe(10);
    });
});

describe('create().safeLoad', () => {
    it('should return the data on success', () => {
        const result = create(schema, sources(['--count', '2'])).safeLoad();

        expect(result.success).toBe(true);
        if (result.success) {
            expect(result.data.count).toBe(2);
        }
    });

    it('should return input errors', () => {
        const result = create(schema, sources(['--count', 'x'])).safeLoad();

        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error).toBeInstanceOf(CoercionError);
            expect(result.error).toBeInstanceOf(ConfigurationError);
        }
    });
});

describe('help', () => {
    it('should throw a help request carrying the usage text', () => {
        const loader = create(schema, sources(['--help']));
        const result = loader.safeLoad();

        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error).toBeInstanceOf(HelpRequestedError);
            if (result.error instanceof HelpRequestedError) {
                expect(result.error.usage).toBe(loader.help());
            }
        }
    });

    it('should check for help before locating the file', () => {
        const loader = create(schema, { ...sources(['-h']), configFileVariable: 'undeclared' });

        expect(() => loader.load()).toThrow(HelpRequestedError);
    });

    it('should render the usage text', () => {
        const usage = create(t.struct({ verbose: t.bool({ short: 'v', description: 'log more' }) }), {
            ...sources(),
            env: { disable: true },
            help: { programName: 'demo', description: 'show usage' },
        }).help();

        expect(usage).toBe('Usage: demo [options]\n\nOptions:\n  -v, --verbose  log more\n  -h, --help     show usage\n');
    });
});

describe('map and content loaders', () => {
    it('loadMap should ignore the environment and flags', () => {
        const config = create(schema, sources(['--count', '3'], { COUNT: '2' })).loadMap({ count: 7, server: { port: 1 } });

        expect(config.count).toBe(7);
        expect(config.server).toEqual({ host: 'localhost', port: 1 });
    });

    it('loadWithMap should let the environment and flags override the map', () => {
        const config = create(schema, sources(['--count', '3'], { SERVER_PORT: '2' })).loadWithMap({ count: 7, server: { port: 1 } });

        expect(config.count).toBe(3);
        expect(config.server.port).toBe(2);
    });

    it('loadContent should decode content of any supported format', () => {
        expect(create(schema, sources(['--count', '3'])).loadContent('count: 6').count).toBe(6);
        expect(create(schema, sources()).loadContent('[server]\nport = 7\n').server.port).toBe(7);
    });

    it('loadContent should keep 64-bit integers exact', () => {
        const loader = create(t.struct({ id: t.int64(), max: t.uint64() }), sources());

        expect(loader.loadContent('id: 9007199254740993\nmax: 18446744073709551615\n')).toEqual({
            id: 9007199254740993n,
            max: 18446744073709551615n,
        });
        expect(loader.loadContent('id = 9007199254740993\n')).toEqual({ id: 9007199254740993n, max: 0n });
    });

    it('loadWithContent should apply flags on top', () => {
        expect(create(schema, sources(['--count', '3'])).loadWithContent('count = 6').count).toBe(3);
    });

    it('loadContent should need the file source', () => {
        expect(() => create(schema, { ...sources(), file: { disable: true } }).loadContent('count: 6')).toThrow(ArgumentError);
    });
});

describe('options', () => {
    it('should reject invalid settings', () => {
        let caught: unknown;
        try {
            create(schema, { help: { width: 0 } });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ArgumentError);
        if (caught instanceof ArgumentError) {
            expect(caught.argument).toBe('help.width');
        }
    });

    it('should reject unknown encodings', () => {
        expect(() => create(schema, { file: JSON.parse('{"encoding": "klingon"}') })).toThrow(
            'Invalid loader option file.encoding'
        );
    });

    it('should log through the logger set last', () => {
        const loader = create(schema, sources());
        const logger = createMockLogger();

        loader.setLogger(logger);
        loader.load();

        expect(logger.verbose).toHaveBeenCalledWith('Found 7 configuration options');
        expect(logger.verbose).toHaveBeenCalledWith('Applied 3 default values');
    });
});

describe('load', () => {
    it('should load in one call', () => {
        const config = load(t.struct({ verbose: t.bool({ short: 'v' }) }), undefined, sources(['-v']));

        expect(config).toEqual({ verbose: true });
    });
});
