import { z } from 'zod';

import { parseRows, requireColumns, textCell } from '../source/TableSource.ts';
import { createLogger } from '../utils/Logger.ts';

import type { PostcodeEntry, Table } from '../model/Models.ts';
import type { Logger } from 'pino';

export const POSTCODE_COLUMNS = ['Postnr', 'By'] as const;

const PostcodeRowSchema = z.object({
    Postnr: textCell,
    By: textCell,
});

/**
 * Postcode → city lookup, read from the two-column postcode table (Postnr | By).
 * A postcode listed twice keeps the city of its last row.
 */
export class PostcodeDirectory {
    private logger: Logger;
    private cities: Map<string, string> = new Map();

    constructor() {
        this.logger = createLogger('PostcodeDirectory');
    }

    load(table: Table): void {
        requireColumns(table, POSTCODE_COLUMNS);

        const cities = new Map<string, string>();
        for (const row of parseRows(table, PostcodeRowSchema)) {
            if (!row.Postnr) continue;
            cities.set(row.Postnr, row.By);
        }

        this.cities = cities;
        this.logger.info(`Loaded ${cities.size} postcodes from ${table.name}`);
    }

    /**
     * City for a postcode, or '' when unknown.
     */
    cityForPostcode(postcode: string): string {
        return this.cities.get(postcode.trim()) ?? '';
    }

    entries(): PostcodeEntry[] {
        return [...this.cities].map(([postcode, city]) => ({ postcode, city }));
    }

    asMap(): ReadonlyMap<string, string> {
        return new Map(this.cities);
    }

    get size(): number {
        return this.cities.size;
    }
}
