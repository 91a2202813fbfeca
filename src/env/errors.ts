import { z } from 'zod';

/**
 * Error thrown when env var parsing fails
 *
 * Decoders throw it without a variable name. Once the binder knows which
 * variable produced the value it rethrows it via {@link EnvVarParseError.forVariable},
 * so the message reads `<VARIABLE>: <reason>`.
 */
export class EnvVarParseError extends Error {
    constructor(
        message: string,
        public readonly value: string,
        public readonly expectedType: string,
        public readonly envVarName?: string,
        public readonly reason: string = message
    ) {
        super(message);
        this.name = 'EnvVarParseError';
    }

    /**
     * Attach the name of the variable that held the undecodable value.
     */
    static forVariable(envVarName: string, error: EnvVarParseError): EnvVarParseError {
        return new EnvVarParseError(
            `${envVarName}: ${error.reason}`,
            error.value,
            error.expectedType,
            envVarName,
            error.reason
        );
    }
}

/**
 * Error thrown when a variable is set but its raw bytes are not valid UTF-8
 */
export class EnvVarEncodingError extends Error {
    constructor(
        public readonly envVarName: string,
        public readonly raw: Uint8Array
    ) {
        super(`${envVarName}: not valid text`);
        this.name = 'EnvVarEncodingError';
    }
}

/**
 * Error thrown when env var validation fails
 */
export class EnvVarValidationError extends Error {
    constructor(
        message: string,
        public readonly prefix: string,
        public readonly zodError: z.ZodError
    ) {
        super(message);
        this.name = 'EnvVarValidationError';
    }
}

/**
 * Errors that abort a binding pass.
 */
export type EnvBindError = EnvVarParseError | EnvVarEncodingError;

export const isEnvBindError = (error: unknown): error is EnvBindError =>
    error instanceof EnvVarParseError || error instanceof EnvVarEncodingError;
