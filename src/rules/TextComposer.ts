import { CODE_ABA } from './AbaRules.ts';

export interface AlertTextInput {
    incidentCode: string;
    /** e.g. 'BRANDALARM' or 'BYGN.BRAND-BUTIK' */
    incidentText: string;
    /** usually 'Street 1, 4000 City' */
    addressDisplay: string;
    city: string;
    /** driving priority as the crews know it, e.g. 'Kørsel 1' */
    priority: string;
    units: string[];
    comments?: string;
    /** alarm incidents only */
    abaSiteName?: string;
}

/**
 * The dispatch channel does not accept commas in the location
 */
export function formatLocation(addressDisplay: string, city: string = ''): string {
    const display = addressDisplay.trim();
    return display ? display.replace(/,/g, '') : city.trim();
}

export function unitsToText(units: string[]): string {
    return units
        .map((u) => u.trim())
        .filter((u) => u.length > 0)
        .join(' ');
}

/**
 * Renders the alert message:
 *
 *   ABA <address> <site> <priority> <incident text> [# comments] - <units>
 *   <incident text> <address> <priority> [# comments] - <units>
 *
 * Empty parts are left out.
 */
export function composeAlertText(input: AlertTextInput): string {
    const address = formatLocation(input.addressDisplay, input.city);
    const units = unitsToText(input.units);
    const comments = input.comments?.trim() ? `# ${input.comments.trim()}` : '';

    const parts =
        input.incidentCode.trim() === CODE_ABA
            ? ['ABA', address, input.abaSiteName ?? '', input.priority, input.incidentText, comments, '-', units]
            : [input.incidentText, address, input.priority, comments, '-', units];

    return parts
        .map((p) => p.trim())
        .filter((p) => p.length > 0)
        .join(' ');
}
