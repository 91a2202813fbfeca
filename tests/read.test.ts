import { describe, it, expect, beforeEach, vi } from 'vitest';
import { z } from 'zod';
import { checkEnv, listVariables, read, resolvePrefix } from '../src/read';
import { ArgumentError } from '../src/error/ArgumentError';
import { EnvVarParseError } from '../src/env/errors';
import { createMapSource } from '../src/env/source';
import type { EnvSource } from '../src/env/types';
import type { Options } from '../src/types';

const createLogger = () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    verbose: vi.fn(),
    silly: vi.fn(),
});

const schema = z.object({
    port: z.number().default(8080),
    server: z.object({
        host: z.string().default('localhost'),
    }),
});

describe('read', () => {
    let logger: ReturnType<typeof createLogger>;

    const optionsWith = (source: EnvSource): Options<typeof schema> => ({
        defaults: { prefix: 'APP_', source },
        schema,
        logger,
    });

    beforeEach(() => {
        logger = createLogger();
    });

    describe('resolvePrefix', () => {
        it('prefers --env-prefix over the default', () => {
            expect(resolvePrefix({ envPrefix: 'CLI_' }, optionsWith(createMapSource({})))).toBe('CLI_');
        });

        it('falls back to the default prefix', () => {
            expect(resolvePrefix({}, optionsWith(createMapSource({})))).toBe('APP_');
        });

        it('rejects an invalid prefix', () => {
            expect(() => resolvePrefix({ envPrefix: 'A=B' }, optionsWith(createMapSource({})))).toThrow(ArgumentError);
        });
    });

    describe('read', () => {
        it('returns defaults when nothing is set', async () => {
            const config = await read({}, optionsWith(createMapSource({})));

            expect(config).toEqual({ port: 8080, server: { host: 'localhost' } });
            expect(logger.verbose).toHaveBeenCalledWith('Reading environment variables with prefix "APP_"');
            expect(logger.verbose).toHaveBeenCalledWith('No environment variables found, using defaults');
        });

        it('applies variables over defaults', async () => {
            const config = await read({}, optionsWith(createMapSource({ APP_PORT: '9000', APP_SERVER__HOST: 'example.test' })));

            expect(config).toEqual({ port: 9000, server: { host: 'example.test' } });
            expect(logger.verbose).toHaveBeenCalledWith('Environment variables applied over defaults');
        });

        it('reads under --env-prefix when given', async () => {
            const config = await read({ envPrefix: 'CLI_' }, optionsWith(createMapSource({ APP_PORT: '1', CLI_PORT: '2' })));

            expect(config.port).toBe(2);
        });

        it('logs and rethrows bind errors', async () => {
            await expect(read({}, optionsWith(createMapSource({ APP_PORT: 'abc' })))).rejects.toThrow(EnvVarParseError);

            expect(logger.error).toHaveBeenCalledWith('Failed to read environment: APP_PORT: Cannot parse "abc" as number');
        });

        it('rejects an invalid --env-prefix', async () => {
            await expect(read({ envPrefix: 'A\0' }, optionsWith(createMapSource({})))).rejects.toThrow(ArgumentError);
        });
    });

    describe('listVariables', () => {
        it('lists variables under the effective prefix', () => {
            const variables = listVariables({ envPrefix: 'X_' }, optionsWith(createMapSource({})));

            expect(variables).toEqual([
                { path: 'port', kind: 'scalar', type: 'number', names: ['X_PORT'] },
                { path: 'server.host', kind: 'scalar', type: 'string', names: ['X_SERVER:HOST', 'X_SERVER__HOST'] },
            ]);
        });

        it('applies envVarMap overrides', () => {
            const options = optionsWith(createMapSource({}));
            options.defaults.envVarMap = { port: 'LISTEN' };

            expect(listVariables({}, options)[0].names).toEqual(['APP_LISTEN']);
        });
    });

    describe('checkEnv', () => {
        it('logs each variable consulted and the resolved configuration', async () => {
            await checkEnv({}, optionsWith(createMapSource({ APP_SERVER__HOST: 'example.test' })));

            expect(logger.info.mock.calls.map((call) => call[0])).toEqual([
                'Checking environment variables with prefix "APP_"...',
                'APP_SERVER__HOST = example.test',
                '1 of 3 variables consulted were set',
                'Resolved configuration:',
                'port: 8080\nserver:\n  host: example.test',
            ]);
            expect(logger.debug.mock.calls.map((call) => call[0])).toEqual([
                'APP_PORT (not set)',
                'APP_SERVER:HOST (not set)',
            ]);
        });

        it('warns about values that are not valid text', async () => {
            const source = createMapSource({ APP_PORT: new Uint8Array([0xff]) });

            await expect(checkEnv({}, optionsWith(source))).rejects.toThrow('APP_PORT: not valid text');
            expect(logger.warn).toHaveBeenCalledWith('APP_PORT (not valid text)');
        });

        it('logs lookups made before a parse error', async () => {
            await expect(checkEnv({}, optionsWith(createMapSource({ APP_PORT: 'abc' })))).rejects.toThrow(EnvVarParseError);

            expect(logger.info).toHaveBeenCalledWith('APP_PORT = abc');
        });

        it('prints wide integers as strings', async () => {
            const wide = z.object({ total: z.bigint().optional() });

            await checkEnv({}, {
                defaults: { prefix: '', source: createMapSource({ TOTAL: '12345678901234567890' }) },
                schema: wide,
                logger,
            });

            expect(logger.info).toHaveBeenLastCalledWith("total: '12345678901234567890'");
        });
    });
});
