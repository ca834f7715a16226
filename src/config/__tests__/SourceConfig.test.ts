import { join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { describe, test, expect } from 'vitest';

import { DataSourceError, ValidationError } from '../../model/Errors.ts';
import { DEFAULT_SOURCE_FILES, loadSourceConfig } from '../SourceConfig.ts';

function fixture(name: string): string {
    return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

describe('loadSourceConfig', () => {
    test('defaults', () => {
        const config = loadSourceConfig({});
        const dataDir = resolve('./data');

        expect(config.dataDir).toBe(dataDir);
        expect(config.files).toEqual({
            aba: join(dataDir, DEFAULT_SOURCE_FILES.aba),
            addresses: join(dataDir, '112 Adresse punkter.csv'),
            incidents: join(dataDir, 'Pickliste.xlsx'),
            taskIds: join(dataDir, 'TaskIds.xlsx'),
            postcodes: join(dataDir, 'Postnummer.xlsx'),
        });
        expect(config.dispatch).toEqual({
            baseUrl: 'https://www.fireservicerota.co.uk',
            username: undefined,
            password: undefined,
            clientId: undefined,
            timeoutMs: 20000,
        });
    });

    test('reads dispatch settings from the environment', () => {
        const config = loadSourceConfig({
            CALLOUT_DATA_DIR: '/srv/reference',
            DISPATCH_BASE_URL: 'https://dispatch.test/',
            DISPATCH_USERNAME: 'operator',
            DISPATCH_PASSWORD: 'test-secret',
            DISPATCH_CLIENT_ID: '',
            DISPATCH_TIMEOUT_MS: '5000',
        });

        expect(config.dataDir).toBe('/srv/reference');
        expect(config.files.taskIds).toBe('/srv/reference/TaskIds.xlsx');
        expect(config.dispatch).toEqual({
            baseUrl: 'https://dispatch.test',
            username: 'operator',
            password: 'test-secret',
            clientId: undefined,
            timeoutMs: 5000,
        });
    });

    test('invalid values are rejected', () => {
        expect(() => loadSourceConfig({ DISPATCH_TIMEOUT_MS: 'soon' })).toThrow(/^Invalid configuration: DISPATCH_TIMEOUT_MS: /);
        expect(() => loadSourceConfig({ DISPATCH_BASE_URL: 'not a url' })).toThrow(/DISPATCH_BASE_URL/);
        expect(() => loadSourceConfig({ DISPATCH_TIMEOUT_MS: '-5' })).toThrow(ValidationError);
    });

    describe('sources file', () => {
        test('overrides some file names, relative to the data directory', () => {
            const config = loadSourceConfig({
                CALLOUT_DATA_DIR: '/srv/data',
                CALLOUT_SOURCES_FILE: fixture('sources.json'),
            });

            expect(config.files).toEqual({
                aba: '/srv/data/alarm/ABA 2026.xlsx',
                addresses: '/srv/data/112 Adresse punkter.csv',
                incidents: '/srv/data/Pickliste.xlsx',
                taskIds: '/srv/data/TaskIds.xlsx',
                postcodes: '/srv/reference/postnumre.xlsx',
            });
        });

        test('a missing file falls back to the defaults', () => {
            const config = loadSourceConfig({
                CALLOUT_DATA_DIR: '/srv/data',
                CALLOUT_SOURCES_FILE: fixture('does-not-exist.json'),
            });

            expect(config.files.aba).toBe('/srv/data/ABA alarmer.xlsx');
        });

        test('wrong value types are rejected', () => {
            expect(() => loadSourceConfig({ CALLOUT_SOURCES_FILE: fixture('malformed-sources.json') }))
                .toThrow(DataSourceError);
        });

        test('invalid JSON is rejected', () => {
            expect(() => loadSourceConfig({ CALLOUT_SOURCES_FILE: fixture('broken-sources.json') }))
                .toThrow(/sources file is not valid JSON/);
        });
    });
});
