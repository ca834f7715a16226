import type { AbaRuleResult, AbaSite } from '../model/Models.ts';

/** Incident code for automatic fire alarms; compared case-sensitively */
export const CODE_ABA = 'BAAl';

/**
 * 'ROIL1, ROM1,,ROV1' → ['ROIL1', 'ROM1', 'ROV1']
 */
export function parseUnits(response: string): string[] {
    return response
        .split(',')
        .map((unit) => unit.trim())
        .filter((unit) => unit.length > 0);
}

export function unitsFromAbaSite(site: AbaSite, useSecondary: boolean): string[] {
    return parseUnits(useSecondary ? site.secondaryResponse : site.primaryResponse);
}

/**
 * For alarm-system incidents the responding units come from the matched
 * site's primary (or secondary) response. Any other incident keeps its
 * base units.
 */
export function applyAbaRules(
    incidentCode: string,
    abaSite: AbaSite | null,
    baseUnits: string[],
    useSecondary: boolean = false
): AbaRuleResult {
    const code = incidentCode.trim();

    if (code !== CODE_ABA) {
        return { applied: false, reason: 'Not an alarm-system incident; ABA list not used.', units: baseUnits };
    }

    if (abaSite === null) {
        return { applied: false, reason: `${CODE_ABA} but address not found in ABA list.`, units: [] };
    }

    const site = `${abaSite.doaNo} / ${abaSite.name}`;
    const units = unitsFromAbaSite(abaSite, useSecondary);

    if (units.length === 0) {
        return {
            applied: false,
            reason: `${CODE_ABA} + ABA match (${site}) but response list is empty.`,
            units: [],
        };
    }

    return {
        applied: true,
        reason: `${CODE_ABA} + ABA match (${site}) → ${useSecondary ? 'secondary' : 'primary'} response used.`,
        units,
    };
}
