import { Command } from "commander";
import { z } from "zod";
import type { EnvSource } from "./env/types";
import type { EnvVariableInfo } from "./env/describe";

/**
 * Default options for an Envgraft instance.
 */
export interface DefaultOptions {
    /** Prepended to every variable name (e.g. 'APP_'). May be empty. */
    prefix: string;
    /** Variable fragment overrides keyed by dotted field path (e.g. `{ 'server.port': 'HTTP_PORT' }`) */
    envVarMap?: Record<string, string>;
    /** Where variables are read from. Defaults to `process.env`. */
    source?: EnvSource;
}

/**
 * Complete options object passed to Envgraft functions.
 *
 * @template S - The Zod object schema describing the configuration
 */
export interface Options<S extends z.ZodObject> {
    defaults: DefaultOptions,
    /** Zod object schema describing the configuration record */
    schema: S;
    /** Logger instance for debugging and error reporting */
    logger: Logger;
}

/**
 * Logger interface for Envgraft's host-level logging.
 * Compatible with popular logging libraries like Winston, Bunyan, etc.
 */
export interface Logger {
    /** Debug-level logging for detailed troubleshooting information */
    debug: (message: string, ...args: unknown[]) => void;
    /** Info-level logging for general information */
    info: (message: string, ...args: unknown[]) => void;
    /** Warning-level logging for non-critical issues */
    warn: (message: string, ...args: unknown[]) => void;
    /** Error-level logging for critical problems */
    error: (message: string, ...args: unknown[]) => void;
    /** Verbose-level logging for extensive detail */
    verbose: (message: string, ...args: unknown[]) => void;
    /** Silly-level logging for maximum detail */
    silly: (message: string, ...args: unknown[]) => void;
}

/**
 * Main Envgraft interface.
 *
 * @template S - The Zod object schema describing the configuration
 */
export interface Envgraft<S extends z.ZodObject> {
    /**
     * Adds Envgraft's CLI options to a Commander.js command:
     * --env-prefix to override the prefix and --check-env to inspect the binding.
     */
    configure: (command: Command) => Promise<Command>;
    /** Sets a custom logger for debugging and error reporting */
    setLogger: (logger: Logger) => void;
    /**
     * Builds the configuration from schema defaults and environment variables
     * and validates it. Throws on undecodable variables or failed validation.
     */
    read: (args: Args) => Promise<z.infer<S>>;
    /** Logs every variable consulted and the resolved configuration */
    checkEnv: (args: Args) => Promise<void>;
    /** Lists the variables the configuration reads under the effective prefix */
    listVariables: (args?: Args) => EnvVariableInfo[];
}

/**
 * Parsed command-line arguments object, typically from Commander.js opts().
 */
export interface Args {
    /** Overrides `defaults.prefix` */
    envPrefix?: string;
    [key: string]: unknown;
}
