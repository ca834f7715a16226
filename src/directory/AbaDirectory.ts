import { z } from 'zod';

import { parseRows, requireColumns, textCell } from '../source/TableSource.ts';
import { createLogger } from '../utils/Logger.ts';
import { normalize, normalizeAddressKey } from '../utils/Normalize.ts';

import type { AbaSite, NormalizedKey, Table } from '../model/Models.ts';
import type { Logger } from 'pino';

export const ABA_COLUMNS = [
    'DOA-nr',
    'Adresse',
    'Postnr/bynavn',
    'Navn',
    'Primær udrykning',
    'Sekundær udrykning',
    'Status',
] as const;

const AbaRowSchema = z.object({
    'DOA-nr': textCell,
    'Adresse': textCell,
    'Postnr/bynavn': textCell,
    'Navn': textCell,
    'Primær udrykning': textCell,
    'Sekundær udrykning': textCell,
    'Status': textCell,
});

type AbaRow = z.output<typeof AbaRowSchema>;

/** Response value the alarm register uses for a site with a broken setup */
export const ABA_ERROR_SENTINEL = '*FEJL*';

const PLACEHOLDER = '-';
const IN_SERVICE = /\bdrift\b/i;
const ACTIVE_HINTS = ['drift', 'aktiv', 'in service'];
const POSTCODE4 = /\d{4}/;

interface AbaRecord {
    site: AbaSite;
    keyBasic: NormalizedKey;
    score: number;
    rowIndex: number;
}

/**
 * Ranks duplicate rows for the same address. A usable primary response
 * dominates, the error sentinel sinks a row; the rest are tie-breakers.
 */
export function scoreAbaRow(row: {
    primaryResponse: string;
    secondaryResponse: string;
    status: string;
    name: string;
}): number {
    let score = 0;

    if (isUsableResponse(row.primaryResponse)) score += 100;
    if (row.primaryResponse === ABA_ERROR_SENTINEL) score -= 100;
    if (isUsableResponse(row.secondaryResponse)) score += 10;

    const status = row.status.toLowerCase();
    if (ACTIVE_HINTS.some((hint) => status.includes(hint))) score += 5;

    if (row.name) score += 1;

    return score;
}

function isUsableResponse(response: string): boolean {
    return response !== '' && response !== PLACEHOLDER && response !== ABA_ERROR_SENTINEL;
}

/**
 * Register of properties with automatic fire alarms (ABA).
 *
 * Only rows whose status contains the word "drift" (in service) are kept.
 * Rows are keyed by address + 4-digit postcode; when several rows share a
 * key the highest scoring one survives, earlier rows winning ties.
 */
export class AbaDirectory {
    private logger: Logger;
    private records: AbaRecord[] = [];

    constructor() {
        this.logger = createLogger('AbaDirectory');
    }

    load(table: Table): void {
        requireColumns(table, ABA_COLUMNS);

        const rows = parseRows(table, AbaRowSchema);
        const byKey = new Map<NormalizedKey, AbaRecord>();
        let outOfService = 0;
        let replaced = 0;

        rows.forEach((row, rowIndex) => {
            if (!IN_SERVICE.test(row['Status'])) {
                outOfService++;
                return;
            }

            const record = toRecord(row, rowIndex);
            const current = byKey.get(record.keyBasic);
            if (!current) {
                byKey.set(record.keyBasic, record);
            } else if (record.score > current.score) {
                // Map keeps the key's original position
                byKey.set(record.keyBasic, record);
                replaced++;
            }
        });

        this.records = [...byKey.values()];

        this.logger.info(
            `Loaded ${this.records.length} alarm sites from ${table.name} ` +
            `(${outOfService} not in service, ${replaced} duplicates resolved by score)`
        );
    }

    get size(): number {
        return this.records.length;
    }

    sites(): AbaSite[] {
        return this.records.map((r) => r.site);
    }

    /**
     * Exact normalized match on the site's display address
     * ('<address>, <postcode/city>').
     */
    matchAddress(addressDisplay: string): AbaSite | null {
        const key = normalize(addressDisplay);
        if (!key) return null;

        const hit = this.records.find((r) => r.site.addressNorm === key);
        return usable(hit);
    }

    /**
     * Tries, in order: address key with the house letter, without it, and
     * finally any site key containing the letterless key (catches floor or
     * side annotations in the register). Several containment hits are
     * settled by score.
     */
    matchComponents(street: string, houseNo: string, houseLetter: string, postcode: string): AbaSite | null {
        const pc = postcode.trim();
        const hn = houseNo.trim();
        const hl = houseLetter.trim();

        const keysWithLetter = hl
            ? [normalizeAddressKey(street, hn, hl, pc), normalizeAddressKey(street, `${hn}${hl}`, '', pc)]
            : [];
        const keyNoLetter = normalizeAddressKey(street, hn, '', pc);

        for (const key of [...keysWithLetter, keyNoLetter]) {
            const hit = this.records.find((r) => r.keyBasic === key);
            if (hit) return usable(hit);
        }

        if (!keyNoLetter) return null;

        const contained = this.records.filter((r) => r.keyBasic.includes(keyNoLetter));
        if (contained.length === 0) return null;

        if (contained.length > 1) {
            this.logger.warn(
                { candidates: contained.map((r) => r.site.doaNo) },
                `Containment fallback for '${keyNoLetter}' matched ${contained.length} alarm sites, picking highest score`
            );
        }

        const best = contained.reduce((a, b) =>
            b.score > a.score || (b.score === a.score && b.rowIndex < a.rowIndex) ? b : a
        );
        return usable(best);
    }
}

function toRecord(row: AbaRow, rowIndex: number): AbaRecord {
    const address = row['Adresse'];
    const postcodeCity = row['Postnr/bynavn'];
    const addressDisplay = `${address}, ${postcodeCity}`;
    const postcode4 = POSTCODE4.exec(postcodeCity)?.[0] ?? '';

    const site: AbaSite = {
        doaNo: row['DOA-nr'],
        name: row['Navn'],
        addressDisplay,
        addressNorm: normalize(addressDisplay),
        primaryResponse: row['Primær udrykning'],
        secondaryResponse: row['Sekundær udrykning'],
        status: row['Status'],
    };

    return {
        site,
        keyBasic: normalize(`${address} ${postcode4}`),
        score: scoreAbaRow(site),
        rowIndex,
    };
}

/**
 * A site whose primary response is the error sentinel counts as no match.
 */
function usable(record: AbaRecord | undefined): AbaSite | null {
    if (!record || record.site.primaryResponse === ABA_ERROR_SENTINEL) return null;
    return record.site;
}
