import { z } from 'zod';

import { parseRows, requireColumns, textCell } from '../source/TableSource.ts';
import { createLogger } from '../utils/Logger.ts';
import { normalize, normalizeAddressKey } from '../utils/Normalize.ts';
import { similarityRatio } from '../utils/Similarity.ts';

import type { KnownAddress, ManualAddress, NormalizedKey, Table } from '../model/Models.ts';
import type { Logger } from 'pino';

export const ADDRESS_COLUMNS = [
    'Vejnavn',
    'Hus nummer',
    'Hus bogstav',
    'Postnummer',
    'Distrikt nummer',
] as const;

const AddressRowSchema = z.object({
    'Vejnavn': textCell,
    'Hus nummer': textCell,
    'Hus bogstav': textCell,
    'Postnummer': textCell,
    'Distrikt nummer': textCell,
});

/** Default threshold for the fuzzy street search */
export const DEFAULT_MIN_FUZZY_SCORE = 0.72;

const EXACT_STREET_BONUS = 0.2;
const PREFIX_STREET_BONUS = 0.1;
const LETTER_BONUS = 0.05;

/**
 * Indexed address point; the normalized components are computed once at load
 */
interface IndexedAddress {
    address: KnownAddress;
    streetNorm: NormalizedKey;
    letterNorm: NormalizedKey;
    displayNorm: NormalizedKey;
}

/**
 * The authoritative address-point table.
 *
 * Rows sharing a normalized key (street, number, letter, postcode) collapse
 * to the first one read. Searches return rows in directory order unless
 * stated otherwise.
 */
export class AddressDirectory {
    private logger: Logger;
    private entries: IndexedAddress[] = [];
    private byNormKey: Map<NormalizedKey, KnownAddress> = new Map();
    private knownPostcodes: Set<string> = new Set();

    constructor() {
        this.logger = createLogger('AddressDirectory');
    }

    /**
     * @param postcodeToCity Optional city lookup; postcodes it contains rank
     *                       first in fuzzy search results.
     */
    load(table: Table, postcodeToCity?: ReadonlyMap<string, string>): void {
        requireColumns(table, ADDRESS_COLUMNS);

        const entries: IndexedAddress[] = [];
        const byNormKey = new Map<NormalizedKey, KnownAddress>();
        let duplicates = 0;

        for (const row of parseRows(table, AddressRowSchema)) {
            const street = row['Vejnavn'];
            const houseNo = row['Hus nummer'];
            const houseLetter = row['Hus bogstav'];
            const postcode = row['Postnummer'];
            const city = postcodeToCity?.get(postcode)?.trim() ?? '';

            const normKey = normalizeAddressKey(street, houseNo, houseLetter, postcode);
            if (byNormKey.has(normKey)) {
                duplicates++;
                continue;
            }

            const address: KnownAddress = {
                kind: 'known',
                display: formatDisplay(street, houseNo, houseLetter, postcode, city),
                normKey,
                districtNo: row['Distrikt nummer'],
                street,
                houseNo,
                houseLetter,
                postcode,
                city,
            };

            byNormKey.set(normKey, address);
            entries.push({
                address,
                streetNorm: normalize(street),
                letterNorm: normalize(houseLetter),
                displayNorm: normalize(address.display),
            });
        }

        const knownPostcodes = new Set<string>();
        for (const [postcode, city] of postcodeToCity ?? []) {
            if (city.trim()) knownPostcodes.add(postcode.trim());
        }

        this.entries = entries;
        this.byNormKey = byNormKey;
        this.knownPostcodes = knownPostcodes;

        this.logger.info(
            `Loaded ${entries.length} addresses from ${table.name}, ${duplicates} duplicates dropped`
        );
    }

    all(): KnownAddress[] {
        return this.entries.map((e) => e.address);
    }

    get size(): number {
        return this.entries.length;
    }

    getByNormKey(normKey: NormalizedKey): KnownAddress | null {
        return this.byNormKey.get(normKey) ?? null;
    }

    districtForNormKey(normKey: NormalizedKey): string | null {
        return this.byNormKey.get(normKey)?.districtNo ?? null;
    }

    /**
     * Street and house number must match exactly (street compared normalized).
     * When `extra` is given the house letter must match it as well.
     */
    findByComponents(street: string, houseNo: string, extra: string = '', limit: number = 30): KnownAddress[] {
        const streetQ = normalize(street);
        const houseNoQ = houseNo.trim();
        const extraQ = normalize(extra);

        const hits: KnownAddress[] = [];
        for (const entry of this.entries) {
            if (hits.length >= limit) break;
            if (entry.streetNorm !== streetQ || entry.address.houseNo !== houseNoQ) continue;
            if (extraQ && entry.letterNorm !== extraQ) continue;
            hits.push(entry.address);
        }
        return hits;
    }

    /**
     * Tolerates misspelt street names. The house number is never fuzzy:
     * only rows with exactly that number are scored.
     *
     * Score = similarity of the normalized streets, plus 0.20 for an exact
     * street match or else 0.10 when the candidate street starts with the
     * query, plus 0.05 for a matching house letter. Results rank postcodes
     * with a known city first, then by score.
     */
    findFuzzyStreetHouse(
        street: string,
        houseNo: string,
        houseLetter: string = '',
        limit: number = 20,
        minScore: number = DEFAULT_MIN_FUZZY_SCORE
    ): KnownAddress[] {
        const streetQ = normalize(street);
        const houseNoQ = houseNo.trim();
        const letterQ = normalize(houseLetter);

        if (!streetQ || !houseNoQ) return [];

        const scored: Array<{ address: KnownAddress; score: number; knownPostcode: boolean }> = [];

        for (const entry of this.entries) {
            if (entry.address.houseNo !== houseNoQ) continue;

            let score = similarityRatio(streetQ, entry.streetNorm);
            if (entry.streetNorm === streetQ) {
                score += EXACT_STREET_BONUS;
            } else if (entry.streetNorm.startsWith(streetQ)) {
                score += PREFIX_STREET_BONUS;
            }
            if (letterQ && entry.letterNorm === letterQ) {
                score += LETTER_BONUS;
            }

            if (score < minScore) continue;

            scored.push({
                address: entry.address,
                score,
                knownPostcode: this.knownPostcodes.has(entry.address.postcode),
            });
        }

        scored.sort((a, b) => {
            if (a.knownPostcode !== b.knownPostcode) return a.knownPostcode ? -1 : 1;
            return b.score - a.score;
        });

        this.logger.debug(`Fuzzy search '${street} ${houseNo}' → ${scored.length} candidates`);

        return scored.slice(0, limit).map((s) => s.address);
    }

    /**
     * Typeahead search: normalized substring of the display text.
     */
    findByDisplayContains(query: string, limit: number = 50): KnownAddress[] {
        const q = normalize(query);
        if (!q) return [];

        const hits: KnownAddress[] = [];
        for (const entry of this.entries) {
            if (hits.length >= limit) break;
            if (entry.displayNorm.includes(q)) hits.push(entry.address);
        }
        return hits;
    }
}

/**
 * 'Hovedgaden 12A, 4000 Roskilde'; the city part is dropped when unknown.
 */
export function formatDisplay(
    street: string,
    houseNo: string,
    houseLetter: string,
    postcode: string,
    city: string
): string {
    const cityPart = city ? ` ${city}` : '';
    return `${street} ${houseNo}${houseLetter}, ${postcode}${cityPart}`;
}

/**
 * Address typed in by the operator, for points missing from the directory.
 */
export function makeManualAddress(input: {
    street: string;
    houseNo: string;
    houseLetter?: string;
    postcode: string;
    city?: string;
    districtNo?: string;
}): ManualAddress {
    const street = input.street.trim();
    const houseNo = input.houseNo.trim();
    const houseLetter = (input.houseLetter ?? '').trim();
    const postcode = input.postcode.trim();
    const city = (input.city ?? '').trim();

    return {
        kind: 'manual',
        display: formatDisplay(street, houseNo, houseLetter, postcode, city),
        districtNo: (input.districtNo ?? '').trim(),
        street,
        houseNo,
        houseLetter,
        postcode,
        city,
    };
}
