import { NotFoundError, ValidationError } from '../model/Errors.ts';
import { createLogger } from '../utils/Logger.ts';
import { applyAbaRules, CODE_ABA } from './AbaRules.ts';

import type { AbaDirectory } from '../directory/AbaDirectory.ts';
import type { IncidentMatrix } from '../directory/IncidentMatrix.ts';
import type { CalloutAddress, ResolvedCallout } from '../model/Models.ts';
import type { Logger } from 'pino';

export const ABA_INCIDENT_LABEL = 'Fire alarm (ABA)';

const LABEL_SEPARATORS = ['\u2014', ' - '];
const TRAILING_CODE = /([A-Za-zÆØÅæøå]{2,4}[A-Za-z0-9ÆØÅæøå]{0,3})\s*$/;

/**
 * Incident code from picker text: 'BBBu', 'Bygn.brand-Butik \u2014 BBBu' and
 * 'Bygn.brand-Butik - BBBu' all give 'BBBu'.
 */
export function extractIncidentCode(raw: string): string {
    let s = raw.trim();
    if (!s) return '';

    for (const separator of LABEL_SEPARATORS) {
        if (s.includes(separator)) {
            s = s.slice(s.lastIndexOf(separator) + separator.length).trim();
        }
    }

    return TRAILING_CODE.exec(s)?.[1] ?? s;
}

/**
 * Combines an address, the incident matrix and the alarm register into the
 * final unit list. Holds no state beyond the directories it reads.
 */
export class CalloutResolver {
    private logger: Logger;
    private incidents: IncidentMatrix;
    private aba: AbaDirectory;

    constructor(incidents: IncidentMatrix, aba: AbaDirectory) {
        this.logger = createLogger('CalloutResolver');
        this.incidents = incidents;
        this.aba = aba;
    }

    /**
     * @throws ValidationError when street, house number or incident code is
     *         blank, or a non-alarm incident is resolved without a district
     * @throws NotFoundError when the district has no such incident, or an
     *         alarm incident has no usable alarm site
     */
    resolve(address: CalloutAddress, incidentCode: string, useSecondaryAba: boolean = false): ResolvedCallout {
        const code = incidentCode.trim();
        const districtNo = address.districtNo.trim();
        this.validate(address, code, districtNo);

        const abaSite = this.aba.matchComponents(
            address.street,
            address.houseNo,
            address.houseLetter,
            address.postcode
        );

        let baseUnits: string[] = [];
        let incidentLabel: string;

        if (code === CODE_ABA) {
            if (abaSite === null) {
                this.logger.warn(`${CODE_ABA} at '${address.display}' without alarm site`);
                throw new NotFoundError(
                    `${CODE_ABA} selected but '${address.display}' is not in the alarm-system list; no response can be derived.`
                );
            }
            incidentLabel = ABA_INCIDENT_LABEL;
        } else {
            const profile = this.incidents.getProfile(districtNo, code);
            if (profile === null) {
                throw new NotFoundError(`Incident '${code}' not found for district '${districtNo}'.`);
            }
            incidentLabel = profile.incidentLabel;
            baseUnits = [...profile.units];
        }

        const abaRuleResult = applyAbaRules(code, abaSite, baseUnits, useSecondaryAba);
        const finalUnits = abaRuleResult.applied || code === CODE_ABA ? abaRuleResult.units : baseUnits;

        this.logger.info(
            `Resolved ${code} at '${address.display}' (district ${districtNo || '?'}): ${finalUnits.join(' ') || 'no units'}`
        );

        return {
            address,
            districtNo,
            incidentCode: code,
            incidentLabel,
            abaSite,
            baseUnits,
            finalUnits,
            abaRuleResult,
        };
    }

    private validate(address: CalloutAddress, code: string, districtNo: string): void {
        const problems: string[] = [];
        if (!code) problems.push('incident code is missing');
        if (!address.street.trim()) problems.push('street is missing');
        if (!address.houseNo.trim()) problems.push('house number is missing');
        if (code && code !== CODE_ABA && !districtNo) {
            problems.push('district number is unknown; select units manually');
        }

        if (problems.length > 0) {
            throw new ValidationError(`Cannot resolve callout: ${problems.join(', ')}.`);
        }
    }
}
