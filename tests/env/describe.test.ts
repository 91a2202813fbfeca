import { describe, it, expect } from 'vitest';
import { decoders } from '../../src/env/decoders';
import { listEnvVariables, INDEX_PLACEHOLDER } from '../../src/env/describe';
import { defineShape, nested, nestedSequence, optional, scalar, sequence } from '../../src/env/fields';

interface Server {
    host: string;
    port: number;
}

interface App {
    name: string;
    label: string;
    tls: boolean | undefined;
    server: Server;
    hosts: string[];
    upstreams: Server[];
}

const ServerShape = defineShape<Server>({
    create: () => ({ host: 'localhost', port: 80 }),
    fields: [
        scalar('host', decoders.string),
        scalar('port', decoders.u16),
    ],
});

const AppShape = defineShape<App>({
    create: () => ({ name: '', label: '', tls: undefined, server: ServerShape.create(), hosts: [], upstreams: [] }),
    fields: [
        scalar('name', decoders.string),
        scalar('label', decoders.string, { ignore: true }),
        optional('tls', decoders.boolean),
        nested('server', ServerShape),
        sequence('hosts', decoders.string),
        nestedSequence('upstreams', ServerShape),
    ],
    prefix: 'APP_',
});

describe('listEnvVariables', () => {
    it('lists every leaf with the names it is read from', () => {
        expect(listEnvVariables(AppShape)).toEqual([
            { path: 'name', kind: 'scalar', type: 'string', names: ['APP_NAME'] },
            { path: 'tls', kind: 'optional', type: 'boolean', names: ['APP_TLS'] },
            { path: 'server.host', kind: 'scalar', type: 'string', names: ['APP_SERVER:HOST', 'APP_SERVER__HOST'] },
            { path: 'server.port', kind: 'scalar', type: 'u16', names: ['APP_SERVER:PORT', 'APP_SERVER__PORT'] },
            { path: 'hosts[]', kind: 'sequence', type: 'string', names: ['APP_HOSTS:<n>', 'APP_HOSTS__<n>'] },
            { path: 'upstreams[].host', kind: 'scalar', type: 'string', names: ['APP_UPSTREAMS:<n>:HOST', 'APP_UPSTREAMS__<n>__HOST'] },
            { path: 'upstreams[].port', kind: 'scalar', type: 'u16', names: ['APP_UPSTREAMS:<n>:PORT', 'APP_UPSTREAMS__<n>__PORT'] },
        ]);
    });

    it('uses the given prefix over the shape prefix', () => {
        const names = listEnvVariables(AppShape, 'X_').map((info) => info.names[0]);

        expect(names[0]).toBe('X_NAME');
        expect(names[2]).toBe('X_SERVER:HOST');
    });

    it('skips ignored fields', () => {
        expect(listEnvVariables(AppShape).map((info) => info.path)).not.toContain('label');
    });

    it('lists optional records by their fields', () => {
        interface Root {
            database: Server | undefined;
        }
        const RootShape = defineShape<Root>({
            create: () => ({ database: undefined }),
            fields: [optional('database', ServerShape)],
        });

        expect(listEnvVariables(RootShape)).toEqual([
            { path: 'database.host', kind: 'scalar', type: 'string', names: ['DATABASE:HOST', 'DATABASE__HOST'] },
            { path: 'database.port', kind: 'scalar', type: 'u16', names: ['DATABASE:PORT', 'DATABASE__PORT'] },
        ]);
    });

    it('marks sequence indices with a placeholder', () => {
        expect(INDEX_PLACEHOLDER).toBe('<n>');
    });
});
