/**
 * Error thrown when a function argument or CLI option is invalid.
 */
export class ArgumentError extends Error {
    constructor(
        public readonly argument: string,
        message: string
    ) {
        super(message);
        this.name = 'ArgumentError';
    }
}
