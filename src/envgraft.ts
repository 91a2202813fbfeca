import { Command } from 'commander';
import { z } from 'zod';
import { configure } from './configure';
import { DEFAULT_LOGGER } from './constants';
import { checkEnv, listVariables, read } from './read';
import { Args, DefaultOptions, Envgraft, Logger, Options } from './types';

export * from './types';
export * from './env';
export { ArgumentError } from './error/ArgumentError';
export { configure, validatePrefix } from './configure';

/**
 * Creates a new Envgraft instance for environment-based configuration.
 *
 * Envgraft binds environment variables onto a record built from the defaults
 * of a Zod object schema:
 * - Scalars are read from `<PREFIX><FIELD>`
 * - Nested objects from `<PREFIX><FIELD>:<CHILD>` or `<PREFIX><FIELD>__<CHILD>`
 * - Arrays from `<PREFIX><FIELD>:<n>` or `<PREFIX><FIELD>__<n>`, for n = 0, 1, 2... up to the first gap
 * - Arrays of objects from `<PREFIX><FIELD>:<n>:<CHILD>` or `<PREFIX><FIELD>__<n>__<CHILD>`
 *
 * Field names are converted to SCREAMING_SNAKE_CASE (`maxRetries` -> `MAX_RETRIES`).
 *
 * @template S - The Zod object schema for your configuration
 * @param pOptions - Configuration options for the Envgraft instance
 * @param pOptions.defaults - Default prefix, fragment overrides and variable source
 * @param pOptions.schema - Zod object schema describing your configuration (required)
 * @param pOptions.logger - Custom logger implementation (optional, defaults to console logger)
 * @returns An Envgraft instance
 *
 * @example
 * ```typescript
 * import { create } from 'envgraft';
 * import { z } from 'zod';
 *
 * const envgraft = create({
 *   defaults: { prefix: 'MYAPP_' },
 *   schema: z.object({
 *     apiKey: z.string().min(1),
 *     timeout: z.number().default(5000),
 *     server: z.object({ host: z.string().default('localhost'), port: z.number().default(8080) }),
 *     upstreams: z.array(z.object({ url: z.string() })),
 *   }),
 * });
 *
 * // MYAPP_API_KEY=test-key MYAPP_SERVER__PORT=9000 MYAPP_UPSTREAMS__0__URL=http://a
 * const config = await envgraft.read({});
 * ```
 */
export const create = <S extends z.ZodObject>(pOptions: {
    defaults?: Partial<DefaultOptions>,
    schema: S,
    logger?: Logger,
}): Envgraft<S> => {
    const defaults: DefaultOptions = { prefix: '', ...pOptions.defaults };
    const options: Options<S> = {
        defaults,
        schema: pOptions.schema,
        logger: pOptions.logger || DEFAULT_LOGGER,
    }

    const setLogger = (pLogger: Logger) => {
        options.logger = pLogger;
    }

    return {
        setLogger,
        configure: (command: Command) => configure(command, options),
        read: (args: Args) => read(args, options),
        checkEnv: (args: Args) => checkEnv(args, options),
        listVariables: (args: Args = {}) => listVariables(args, options),
    }
}
