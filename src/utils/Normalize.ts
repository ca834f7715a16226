import type { NormalizedKey } from '../model/Models.ts';

// Anything that is not a letter, digit or underscore becomes a separator.
// Æ, Ø and Å are letters already; listed so the intent survives edits.
const NON_WORD = /[^\p{L}\p{N}_ÆØÅ]/gu;
const WHITESPACE = /\s+/g;

/**
 * Canonicalizes free text into a matching key.
 * 'Hovedgaden 12, 4000' and 'HOVEDGADEN   12,4000' both give 'HOVEDGADEN 12 4000'.
 */
export function normalize(s: string | number | null | undefined): NormalizedKey {
    if (s === null || s === undefined) return '';

    return String(s)
        .trim()
        .normalize('NFKC')
        .toUpperCase()
        .replace(NON_WORD, ' ')
        .replace(WHITESPACE, ' ')
        .trim();
}

/**
 * Builds the address key shared by every directory, e.g. 'HOVEDGADEN 12 A 4000'.
 * Empty parts are left out before joining.
 */
export function normalizeAddressKey(
    street: string | null | undefined,
    houseNo: string | number | null | undefined,
    houseLetter: string | null | undefined,
    postcode: string | number | null | undefined
): NormalizedKey {
    const raw = [street, houseNo, houseLetter, postcode]
        .map((part) => (part === null || part === undefined ? '' : String(part).trim()))
        .filter((part) => part.length > 0)
        .join(' ');

    return normalize(raw);
}
