import * as yaml from 'js-yaml';
import { z } from 'zod';
import { validatePrefix } from './configure';
import { listEnvVariables, EnvVariableInfo } from './env/describe';
import { isEnvBindError } from './env/errors';
import { resolveSource } from './env/reader';
import { resolveEnvVarConfig } from './env/resolver';
import { shapeFromSchema } from './env/schema-utils';
import { traceSource } from './env/source';
import { Args, Options } from './types';

/**
 * Picks the prefix for this run: `--env-prefix` when given, the default otherwise.
 */
export const resolvePrefix = <S extends z.ZodObject>(args: Args, options: Options<S>): string =>
    validatePrefix(args.envPrefix ?? options.defaults.prefix);

/**
 * Builds the configuration from schema defaults and environment variables.
 *
 * Variables are bound onto a record holding the schema defaults, and the
 * result is validated against the schema.
 *
 * @param args - Parsed command-line arguments
 * @param options - Envgraft options
 * @returns The validated configuration
 * @throws EnvVarParseError / EnvVarEncodingError when a variable cannot be decoded
 * @throws EnvVarValidationError when the bound configuration fails validation
 *
 * @example
 * ```typescript
 * // APP_SERVER__PORT=9000
 * const config = await read({}, options);
 * config.server.port; // 9000
 * ```
 */
export const read = async <S extends z.ZodObject>(
    args: Args,
    options: Options<S>
): Promise<z.infer<S>> => {
    const logger = options.logger;
    const prefix = resolvePrefix(args, options);

    logger.verbose(`Reading environment variables with prefix "${prefix}"`);

    try {
        const { config, source } = resolveEnvVarConfig(options.schema, {
            prefix,
            envVarMap: options.defaults.envVarMap,
            source: options.defaults.source,
        });

        logger.verbose(source.found
            ? 'Environment variables applied over defaults'
            : 'No environment variables found, using defaults');

        return config;
    } catch (error) {
        if (isEnvBindError(error)) {
            logger.error(`Failed to read environment: ${error.message}`);
        }
        throw error;
    }
}

/**
 * Lists the variables the configuration reads under the effective prefix.
 */
export const listVariables = <S extends z.ZodObject>(
    args: Args,
    options: Options<S>
): EnvVariableInfo[] => {
    const shape = shapeFromSchema(options.schema, { envVarMap: options.defaults.envVarMap });
    return listEnvVariables(shape, resolvePrefix(args, options));
}

/**
 * Displays which environment variables were consulted and the resolved configuration.
 *
 * Each lookup is logged as it happens: set variables at info level, unset
 * ones at debug level. The resolved configuration is then printed as YAML.
 * Errors are logged up to the variable that caused them and then rethrown.
 *
 * @param args - Parsed command-line arguments
 * @param options - Envgraft options
 *
 * @example
 * ```typescript
 * await checkEnv({ envPrefix: 'APP_' }, options);
 * // APP_SERVER:PORT (not set)
 * // APP_SERVER__PORT = 9000
 * // server:
 * //   port: 9000
 * ```
 */
export const checkEnv = async <S extends z.ZodObject>(
    args: Args,
    options: Options<S>
): Promise<void> => {
    const logger = options.logger;
    const prefix = resolvePrefix(args, options);

    logger.info(`Checking environment variables with prefix "${prefix}"...`);

    let consulted = 0;
    let set = 0;
    const source = traceSource(resolveSource(options.defaults.source), (name, lookup) => {
        consulted++;
        switch (lookup.status) {
            case 'present':
                set++;
                logger.info(`${name} = ${lookup.value}`);
                break;
            case 'absent':
                logger.debug(`${name} (not set)`);
                break;
            case 'invalid':
                logger.warn(`${name} (not valid text)`);
                break;
        }
    });

    const { config } = resolveEnvVarConfig(options.schema, {
        prefix,
        envVarMap: options.defaults.envVarMap,
        source,
    });

    logger.info(`${set} of ${consulted} variables consulted were set`);
    logger.info('Resolved configuration:');
    logger.info(yaml.dump(config, {
        indent: 2,
        lineWidth: 120,
        noRefs: true,
        sortKeys: true,
        // 64 and 128 bit integers are bigints, which YAML has no tag for
        replacer: (_key: string, value: unknown) => typeof value === 'bigint' ? value.toString() : value,
    }).trimEnd());
}
