import type { z } from 'zod';
import { bindWithPrefix } from './binder';
import { EnvVarValidationError } from './errors';
import { shapeFromSchema } from './schema-utils';
import { EnvConfigSource, EnvResolveOptions } from './types';

/**
 * Resolve configuration from environment variables
 *
 * This is the schema-driven entry point of the env module. It:
 * 1. Derives a binding shape from the schema
 * 2. Creates a record holding the schema defaults
 * 3. Binds environment variables onto it under `options.prefix`
 * 4. Validates the result with Zod
 *
 * Throws EnvVarParseError / EnvVarEncodingError if a variable cannot be decoded.
 * Throws EnvVarValidationError if the bound config fails Zod validation.
 *
 * @param schema - Zod schema defining config structure
 * @param options - Prefix, source and fragment overrides
 * @returns Parsed config object and source information
 */
export function resolveEnvVarConfig<S extends z.ZodObject>(
    schema: S,
    options: EnvResolveOptions
): { config: z.infer<S>; source: EnvConfigSource } {
    const shape = shapeFromSchema(schema, { envVarMap: options.envVarMap });
    const record = shape.create();

    const found = bindWithPrefix(shape, record, options.prefix, { source: options.source });

    const validationResult = schema.safeParse(record);

    if (!validationResult.success) {
        throw new EnvVarValidationError(
            'Environment variable configuration failed validation',
            options.prefix,
            validationResult.error
        );
    }

    return {
        config: validationResult.data,
        source: {
            type: 'env',
            prefix: options.prefix,
            found,
            readAt: new Date(),
        },
    };
}
