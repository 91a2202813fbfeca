/** Separator joining a record fragment to the names below it (`APP_SERVER:PORT`) */
export const COLON_SEPARATOR = ':';

/** Shell-friendly alternative to the colon (`APP_SERVER__PORT`) */
export const UNDERSCORE_SEPARATOR = '__';

/**
 * Convert camelCase to SCREAMING_SNAKE_CASE
 * 
 * Examples:
 *   planDirectory -> PLAN_DIRECTORY
 *   apiKey -> API_KEY
 *   maxRetryCount -> MAX_RETRY_COUNT
 *   openaiAPIKey -> OPENAI_API_KEY
 *   api.key -> API_KEY (dots converted to underscores)
 * 
 * @param camelCase - The camelCase string to convert
 * @returns The SCREAMING_SNAKE_CASE version
 */
export function toScreamingSnakeCase(camelCase: string): string {
    if (!camelCase) {
        return '';
    }

    // Insert underscore before uppercase letters (but not at the start) and keep
    // runs of capitals together until a lowercase follows
    return camelCase
        .replace(/\./g, '_')
        .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
        .replace(/([A-Z])([A-Z][a-z])/g, '$1_$2')
        .toUpperCase();
}

/**
 * Name of the variable holding a scalar or optional field
 *
 *   ('APP_', 'PORT') -> 'APP_PORT'
 */
export function scalarVariable(prefix: string, variable: string): string {
    return `${prefix}${variable}`;
}

/**
 * Prefixes handed to a nested record, in the order they are tried
 *
 *   ('APP_', 'SERVER') -> ['APP_SERVER:', 'APP_SERVER__']
 */
export function nestedPrefixes(prefix: string, variable: string): [colon: string, underscore: string] {
    const stem = `${prefix}${variable}`;
    return [`${stem}${COLON_SEPARATOR}`, `${stem}${UNDERSCORE_SEPARATOR}`];
}

/**
 * Candidate names for element `index` of a scalar sequence, in the order they are tried
 *
 *   ('APP_', 'HOSTS', 2) -> ['APP_HOSTS:2', 'APP_HOSTS__2']
 */
export function sequenceVariables(
    prefix: string,
    variable: string,
    index: number
): [colon: string, underscore: string] {
    const stem = `${prefix}${variable}`;
    return [
        `${stem}${COLON_SEPARATOR}${index}`,
        `${stem}${UNDERSCORE_SEPARATOR}${index}`,
    ];
}

/**
 * Prefixes handed to element `index` of a record sequence, in the order they are tried
 *
 *   ('APP_', 'UPSTREAMS', 0) -> ['APP_UPSTREAMS:0:', 'APP_UPSTREAMS__0__']
 */
export function nestedSequencePrefixes(
    prefix: string,
    variable: string,
    index: number
): [colon: string, underscore: string] {
    const stem = `${prefix}${variable}`;
    return [
        `${stem}${COLON_SEPARATOR}${index}${COLON_SEPARATOR}`,
        `${stem}${UNDERSCORE_SEPARATOR}${index}${UNDERSCORE_SEPARATOR}`,
    ];
}
