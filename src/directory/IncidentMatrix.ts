import { DataSourceError } from '../model/Errors.ts';
import { cellText } from '../source/TableSource.ts';
import { createLogger } from '../utils/Logger.ts';

import type { IncidentChoice, IncidentProfile, Table, Workbook } from '../model/Models.ts';
import type { Logger } from 'pino';

/**
 * Layout of a district sheet:
 *   column 0      incident code (header usually blank)
 *   column 1      incident label
 *   columns 2..4  metadata flags and notes
 *   columns 5..   one column per unit, marked 'X' when the unit responds
 */
const CODE_COLUMN_INDEX = 0;
const LABEL_COLUMN_INDEX = 1;
export const UNIT_COLUMN_OFFSET = 5;

const UNIT_MARKER = 'X';
const PLACEHOLDER_CODES = new Set(['', '-']);

/**
 * Incident → unit matrix ("pickliste"), one workbook sheet per district.
 * The sheet name is the district number.
 */
export class IncidentMatrix {
    private logger: Logger;
    private byDistrict: Map<string, Map<string, IncidentProfile>> = new Map();

    constructor() {
        this.logger = createLogger('IncidentMatrix');
    }

    load(workbook: Workbook): void {
        const byDistrict = new Map<string, Map<string, IncidentProfile>>();

        for (const sheet of workbook.sheets) {
            const districtNo = sheet.name.trim();
            const profiles = this.loadSheet(districtNo, sheet, workbook.name);
            byDistrict.set(districtNo, profiles);
            this.logger.debug(`District ${districtNo}: ${profiles.size} incident types`);
        }

        this.byDistrict = byDistrict;
        this.logger.info(`Loaded incident matrix for ${byDistrict.size} districts from ${workbook.name}`);
    }

    private loadSheet(districtNo: string, sheet: Table, source: string): Map<string, IncidentProfile> {
        const codeColumn = sheet.columns[CODE_COLUMN_INDEX];
        const labelColumn = sheet.columns[LABEL_COLUMN_INDEX];

        if (codeColumn === undefined || labelColumn === undefined) {
            const missing = codeColumn === undefined ? ['incident code', 'incident label'] : ['incident label'];
            this.logger.error(`Sheet '${sheet.name}' has too few columns`);
            throw new DataSourceError(source, `sheet '${sheet.name}' lacks the incident code or label column`, {
                missingColumns: missing,
                foundColumns: [...sheet.columns],
            });
        }

        const unitColumns = sheet.columns.slice(UNIT_COLUMN_OFFSET);
        const profiles = new Map<string, IncidentProfile>();

        for (const row of sheet.rows) {
            const incidentCode = cellText(row[codeColumn]);
            if (PLACEHOLDER_CODES.has(incidentCode)) continue;

            const units = unitColumns
                .filter((column) => cellText(row[column]).toUpperCase() === UNIT_MARKER)
                .map((column) => column.trim());

            // a code repeated in the sheet keeps its last row
            profiles.set(incidentCode, {
                districtNo,
                incidentCode,
                incidentLabel: cellText(row[labelColumn]),
                units,
            });
        }

        return profiles;
    }

    getProfile(districtNo: string, incidentCode: string): IncidentProfile | null {
        return this.byDistrict.get(districtNo.trim())?.get(incidentCode.trim()) ?? null;
    }

    listIncidents(districtNo: string): IncidentProfile[] {
        return [...(this.byDistrict.get(districtNo.trim())?.values() ?? [])];
    }

    districts(): string[] {
        return [...this.byDistrict.keys()];
    }

    /**
     * Distinct code/label pairs over all districts, first seen order.
     */
    listIncidentChoices(): IncidentChoice[] {
        const seen = new Set<string>();
        const choices: IncidentChoice[] = [];

        for (const profiles of this.byDistrict.values()) {
            for (const p of profiles.values()) {
                const key = `${p.incidentCode}\u0000${p.incidentLabel}`;
                if (seen.has(key)) continue;
                seen.add(key);
                choices.push({ code: p.incidentCode, label: p.incidentLabel });
            }
        }
        return choices;
    }
}
