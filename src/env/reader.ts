import { EnvVarEncodingError } from './errors';
import { processEnvSource } from './source';
import { EnvSource } from './types';

const defaultSource = processEnvSource();

/**
 * Source used when the caller does not pass one
 */
export function resolveSource(source?: EnvSource): EnvSource {
    return source ?? defaultSource;
}

/**
 * Read environment variable value
 *
 * Missing variables are not an error and come back as undefined.
 *
 * @param envVarName - Full env var name (e.g., 'APP_SERVER__PORT')
 * @param source - Source to read from, `process.env` by default
 * @returns The variable's text, or undefined if not set
 * @throws EnvVarEncodingError if the variable is set but is not valid text
 */
export function readEnvVar(envVarName: string, source?: EnvSource): string | undefined {
    const lookup = resolveSource(source).lookup(envVarName);

    switch (lookup.status) {
        case 'absent':
            return undefined;
        case 'present':
            return lookup.value;
        case 'invalid':
            throw new EnvVarEncodingError(envVarName, lookup.raw);
    }
}
