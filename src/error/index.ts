export { ArgumentError } from './ArgumentError';
export {
    EnvVarParseError,
    EnvVarEncodingError,
    EnvVarValidationError
} from '../env/errors';
