import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, join, resolve } from 'node:path';

import 'dotenv/config';
import { z } from 'zod';

import { DataSourceError, ValidationError } from '../model/Errors.ts';
import { createLogger } from '../utils/Logger.ts';

const logger = createLogger('SourceConfig');

export type SourceKey = 'aba' | 'addresses' | 'incidents' | 'taskIds' | 'postcodes';

export const DEFAULT_SOURCE_FILES: Record<SourceKey, string> = {
    aba: 'ABA alarmer.xlsx',
    addresses: '112 Adresse punkter.csv',
    incidents: 'Pickliste.xlsx',
    taskIds: 'TaskIds.xlsx',
    postcodes: 'Postnummer.xlsx',
};

const EnvSchema = z.object({
    CALLOUT_DATA_DIR: z.string().min(1).default('./data'),
    CALLOUT_SOURCES_FILE: z.string().min(1).optional(),
    DISPATCH_BASE_URL: z.string().url().default('https://www.fireservicerota.co.uk'),
    DISPATCH_USERNAME: z.string().optional(),
    DISPATCH_PASSWORD: z.string().optional(),
    DISPATCH_CLIENT_ID: z.string().optional(),
    DISPATCH_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
});

/** Per-source file names; keys left out fall back to the defaults */
const SourcesFileSchema = z.object({
    aba: z.string().min(1).optional(),
    addresses: z.string().min(1).optional(),
    incidents: z.string().min(1).optional(),
    taskIds: z.string().min(1).optional(),
    postcodes: z.string().min(1).optional(),
});

export interface DispatchSettings {
    baseUrl: string;
    username?: string;
    password?: string;
    clientId?: string;
    timeoutMs: number;
}

export interface SourceConfig {
    dataDir: string;
    /** Absolute path of every reference file */
    files: Record<SourceKey, string>;
    dispatch: DispatchSettings;
}

/**
 * Reads the configuration from the environment (.env is loaded on import)
 * and the optional JSON sources file.
 */
export function loadSourceConfig(env: NodeJS.ProcessEnv = process.env): SourceConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
        logger.error(`Invalid configuration: ${issues}`);
        throw new ValidationError(`Invalid configuration: ${issues}`);
    }

    const vars = parsed.data;
    const dataDir = resolve(vars.CALLOUT_DATA_DIR);
    const overrides = readSourcesFile(vars.CALLOUT_SOURCES_FILE);
    const fileFor = (key: SourceKey) => inDataDir(dataDir, overrides[key] ?? DEFAULT_SOURCE_FILES[key]);

    const files: Record<SourceKey, string> = {
        aba: fileFor('aba'),
        addresses: fileFor('addresses'),
        incidents: fileFor('incidents'),
        taskIds: fileFor('taskIds'),
        postcodes: fileFor('postcodes'),
    };

    return {
        dataDir,
        files,
        dispatch: {
            baseUrl: vars.DISPATCH_BASE_URL.replace(/\/+$/, ''),
            username: vars.DISPATCH_USERNAME || undefined,
            password: vars.DISPATCH_PASSWORD || undefined,
            clientId: vars.DISPATCH_CLIENT_ID || undefined,
            timeoutMs: vars.DISPATCH_TIMEOUT_MS,
        },
    };
}

function inDataDir(dataDir: string, file: string): string {
    return isAbsolute(file) ? file : join(dataDir, file);
}

function readSourcesFile(path: string | undefined): Partial<Record<SourceKey, string>> {
    if (!path) return {};
    if (!existsSync(path)) {
        logger.warn(`Sources file ${path} not found, using default file names`);
        return {};
    }

    let json: unknown;
    try {
        json = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
        throw new DataSourceError(path, 'sources file is not valid JSON', { cause: err });
    }

    const parsed = SourcesFileSchema.safeParse(json);
    if (!parsed.success) {
        throw new DataSourceError(path, `sources file is malformed: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
}
