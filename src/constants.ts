import { Logger } from "./types";

/** Longest prefix accepted from the command line */
export const MAX_PREFIX_LENGTH = 1000;

/**
 * Default logger implementation using console methods.
 * The verbose and silly methods are no-ops to avoid excessive output.
 */
export const DEFAULT_LOGGER: Logger = {
    // eslint-disable-next-line no-console
    debug: console.debug,
    // eslint-disable-next-line no-console
    info: console.info,
    // eslint-disable-next-line no-console
    warn: console.warn,
    // eslint-disable-next-line no-console
    error: console.error,

    verbose: () => { },

    silly: () => { },
}
