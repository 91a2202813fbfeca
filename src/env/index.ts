// Core binding
export {
    bind,
    bindWithPrefix,
    bindScalar,
    tryBind,
    tryBindWithPrefix,
    fromEnv
} from './binder';

export type { ScalarBinding } from './binder';

// Shape declaration
export {
    scalar,
    optional,
    nested,
    sequence,
    nestedSequence,
    defineShape
} from './fields';

export {
    decoders,
    createDecoder
} from './decoders';

export {
    parseBoolean,
    parseNumber,
    parseInteger,
    parsePath,
    parseEncodingLabel,
    integerBounds
} from './parser';

export {
    toScreamingSnakeCase,
    scalarVariable,
    nestedPrefixes,
    sequenceVariables,
    nestedSequencePrefixes,
    COLON_SEPARATOR,
    UNDERSCORE_SEPARATOR
} from './naming';

// Environment access
export {
    processEnvSource,
    createMapSource,
    traceSource
} from './source';

export { readEnvVar } from './reader';

// Zod integration
export { shapeFromSchema } from './schema-utils';
export { resolveEnvVarConfig } from './resolver';
export { listEnvVariables, INDEX_PLACEHOLDER } from './describe';

// Errors
export {
    EnvVarParseError,
    EnvVarEncodingError,
    EnvVarValidationError,
    isEnvBindError
} from './errors';

// Types
export type {
    EnvLookup,
    EnvSource,
    Decoder,
    FieldOptions,
    FieldKind,
    FieldDescriptor,
    ScalarField,
    OptionalField,
    NestedField,
    SequenceField,
    NestedSequenceField,
    EnvShape,
    BindOptions,
    BindOutcome,
    EnvResolveOptions,
    EnvConfigSource
} from './types';

export type { EnvBindError } from './errors';
export type { LookupListener } from './source';
export type { SchemaRecord, SchemaShapeOptions } from './schema-utils';
export type { EnvVariableInfo } from './describe';
export type { IntegerBounds } from './parser';
