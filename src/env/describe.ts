import { COLON_SEPARATOR, UNDERSCORE_SEPARATOR } from './naming';
import { EnvShape, FieldDescriptor, FieldKind } from './types';

/** Placeholder for a sequence index in listed variable names */
export const INDEX_PLACEHOLDER = '<n>';

/**
 * One bindable leaf of a shape and the names it is read from
 */
export interface EnvVariableInfo {
    /** Dotted field path, with `[]` after sequence fields (e.g. 'upstreams[].port') */
    path: string;
    kind: FieldKind;
    /** Decoder type of the leaf */
    type: string;
    /**
     * All-colon form first, all-underscore form second. Top-level scalars have
     * a single name. Mixed forms are accepted too but not listed.
     */
    names: string[];
}

type PrefixPair = [colon: string, underscore: string];

const extend = ([colon, underscore]: PrefixPair, variable: string, colonSuffix: string, underscoreSuffix: string): PrefixPair => [
    `${colon}${variable}${colonSuffix}`,
    `${underscore}${variable}${underscoreSuffix}`,
];

const unique = (names: string[]): string[] => Array.from(new Set(names));

function describeFields<R>(shape: EnvShape<R>, prefixes: PrefixPair, path: string, out: EnvVariableInfo[]): void {
    for (const field of shape.fields) {
        if (!field.ignored) {
            describeField(field, prefixes, path ? `${path}.${field.name}` : field.name, out);
        }
    }
}

function describeField<R>(field: FieldDescriptor<R>, prefixes: PrefixPair, path: string, out: EnvVariableInfo[]): void {
    const n = INDEX_PLACEHOLDER;

    switch (field.kind) {
        case 'scalar':
            out.push({ path, kind: field.kind, type: field.decoder.type, names: unique(extend(prefixes, field.variable, '', '')) });
            return;
        case 'optional':
            if ('fields' in field.inner) {
                describeFields(field.inner, extend(prefixes, field.variable, COLON_SEPARATOR, UNDERSCORE_SEPARATOR), path, out);
            } else {
                out.push({ path, kind: field.kind, type: field.inner.type, names: unique(extend(prefixes, field.variable, '', '')) });
            }
            return;
        case 'nested':
            describeFields(field.shape, extend(prefixes, field.variable, COLON_SEPARATOR, UNDERSCORE_SEPARATOR), path, out);
            return;
        case 'sequence':
            out.push({
                path: `${path}[]`,
                kind: field.kind,
                type: field.decoder.type,
                names: extend(prefixes, field.variable, `${COLON_SEPARATOR}${n}`, `${UNDERSCORE_SEPARATOR}${n}`),
            });
            return;
        case 'nestedSequence':
            describeFields(
                field.shape,
                extend(prefixes, field.variable, `${COLON_SEPARATOR}${n}${COLON_SEPARATOR}`, `${UNDERSCORE_SEPARATOR}${n}${UNDERSCORE_SEPARATOR}`),
                `${path}[]`,
                out
            );
            return;
    }
}

/**
 * List the variables a shape reads under `prefix`
 *
 * Example:
 *   listEnvVariables(AppShape, 'APP_')
 *   // [{ path: 'server.port', kind: 'scalar', type: 'u16', names: ['APP_SERVER:PORT', 'APP_SERVER__PORT'] }, ...]
 */
export function listEnvVariables<R>(shape: EnvShape<R>, prefix: string = shape.prefix ?? ''): EnvVariableInfo[] {
    const out: EnvVariableInfo[] = [];
    describeFields(shape, [prefix, prefix], '', out);
    return out;
}
