import { Command } from "commander";
import { z } from "zod";
import { MAX_PREFIX_LENGTH } from "./constants";
import { ArgumentError } from "./error/ArgumentError";
import { Options } from "./types";
export { ArgumentError };

/**
 * Validates an environment variable prefix.
 *
 * An empty prefix is allowed (variables are then named after the fields alone).
 * Rejects:
 * - Null characters, which cannot appear in a variable name
 * - '=' characters, which terminate a variable name in the environment block
 * - Prefixes longer than {@link MAX_PREFIX_LENGTH}
 *
 * @param prefix - The prefix to validate
 * @returns The prefix, unchanged
 * @throws {ArgumentError} When the prefix is invalid
 *
 * @example
 * ```typescript
 * validatePrefix('APP_');   // Returns 'APP_'
 * validatePrefix('A=B');    // Throws ArgumentError
 * ```
 */
export function validatePrefix(prefix: string): string {
    if (typeof prefix !== 'string') {
        throw new ArgumentError('prefix', 'Environment prefix must be a string');
    }

    if (prefix.includes('\0')) {
        throw new ArgumentError('prefix', 'Environment prefix contains invalid null character');
    }

    if (prefix.includes('=')) {
        throw new ArgumentError('prefix', 'Environment prefix cannot contain "="');
    }

    if (prefix.length > MAX_PREFIX_LENGTH) {
        throw new ArgumentError('prefix', `Environment prefix is too long (max ${MAX_PREFIX_LENGTH} characters)`);
    }

    return prefix;
}

/**
 * Configures a Commander.js command with Envgraft's CLI options.
 *
 * Adds:
 * - --env-prefix <prefix>: Override the default environment variable prefix
 * - --check-env: Display the variables consulted and the resolved configuration
 *
 * @template S - The Zod object schema describing the configuration
 * @param command - The Commander.js Command instance to configure
 * @param options - Envgraft options containing defaults and schema
 * @returns Promise resolving to the configured Command instance
 * @throws {ArgumentError} When command or options are invalid
 *
 * @example
 * ```typescript
 * const program = new Command();
 * await configure(program, options);
 * // Now the program accepts: --env-prefix <prefix> and --check-env
 * ```
 */
export const configure = async <S extends z.ZodObject>(
    command: Command,
    options: Options<S>
): Promise<Command> => {
    if (!command) {
        throw new ArgumentError('command', 'Command instance is required');
    }

    if (typeof command.option !== 'function') {
        throw new ArgumentError('command', 'Command must be a valid Commander.js Command instance');
    }

    if (!options) {
        throw new ArgumentError('options', 'Options object is required');
    }

    if (!options.defaults) {
        throw new ArgumentError('options.defaults', 'Options must include defaults configuration');
    }

    const validatedDefaultPrefix = validatePrefix(options.defaults.prefix);

    let retCommand = command;

    retCommand = retCommand.option(
        '--env-prefix <prefix>',
        'Environment variable prefix',
        (value: string) => {
            try {
                return validatePrefix(value);
            } catch (error) {
                if (error instanceof ArgumentError) {
                    // Re-throw with more specific context for CLI usage
                    throw new ArgumentError('env-prefix', `Invalid --env-prefix: ${error.message}`);
                }
                throw error;
            }
        },
        validatedDefaultPrefix
    );

    retCommand = retCommand.option(
        '--check-env',
        'Display the environment variables read and the resolved configuration, then exit'
    );

    return retCommand;
}
