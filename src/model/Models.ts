// ── Tabular source models ──

/**
 * A single cell as read from a CSV or workbook sheet.
 * Workbooks keep numbers as numbers (task id cells depend on that).
 */
export type CellValue = string | number | boolean | null;

export type TableRow = Record<string, CellValue>;

/**
 * One rectangular source: a CSV file or a single workbook sheet.
 * `columns` keeps the header order, rows are keyed by those names.
 */
export interface Table {
    name: string;
    columns: string[];
    rows: TableRow[];
}

/**
 * A workbook with one table per sheet, in sheet order
 */
export interface Workbook {
    name: string;
    sheets: Table[];
}

// ── Directory models ──

/**
 * Canonical matching key: NFKC, upper-cased, punctuation folded to
 * single spaces. Never shown to operators.
 */
export type NormalizedKey = string;

export interface PostcodeEntry {
    postcode: string;
    city: string;
}

/**
 * An authoritative address point from the address table.
 * `normKey` is unique within a loaded directory.
 */
export interface KnownAddress {
    kind: 'known';
    display: string;           // 'Maglehøjen 10A, 4000 Roskilde'
    normKey: NormalizedKey;    // 'MAGLEHØJEN 10 A 4000'
    districtNo: string;
    street: string;
    houseNo: string;
    houseLetter: string;
    postcode: string;
    city: string;
}

/**
 * Operator-entered address. `districtNo` may be blank when the
 * operator does not know it.
 */
export interface ManualAddress {
    kind: 'manual';
    display: string;
    districtNo: string;
    street: string;
    houseNo: string;
    houseLetter: string;
    postcode: string;
    city: string;
}

export type CalloutAddress = KnownAddress | ManualAddress;

/**
 * A property under automatic fire-alarm contract.
 * Responses are comma-joined unit lists, e.g. 'ROIL1,ROM1,ROV1'.
 */
export interface AbaSite {
    doaNo: string;
    name: string;
    addressDisplay: string;
    addressNorm: NormalizedKey;
    primaryResponse: string;
    secondaryResponse: string;
    status: string;
}

/**
 * One incident type for one district with the units marked for it
 */
export interface IncidentProfile {
    districtNo: string;
    incidentCode: string;
    incidentLabel: string;
    units: string[];
}

/**
 * Distinct code/label pair across all districts, for incident pickers
 */
export interface IncidentChoice {
    code: string;
    label: string;
}

export interface TaskSelectionResult {
    taskIds: number[];
    missingUnits: string[];
    assistanceAdded: boolean;
    /** Only set when assistance task ids were actually appended */
    assistanceUnit: string | null;
}

// ── Resolution models ──

export interface AbaRuleResult {
    applied: boolean;
    reason: string;
    units: string[];
}

export interface ResolvedCallout {
    address: CalloutAddress;
    districtNo: string;
    incidentCode: string;
    incidentLabel: string;
    abaSite: AbaSite | null;
    baseUnits: string[];
    finalUnits: string[];
    abaRuleResult: AbaRuleResult;
}

// ── Dispatch models ──

/**
 * Priority tokens understood by the dispatch service
 */
export type Priority = 'prio1' | 'prio2';

/**
 * Operator-facing driving priority for each token
 */
export const PRIORITY_LABELS: Record<Priority, string> = {
    prio1: 'Kørsel 1',
    prio2: 'Kørsel 2',
};

/**
 * The complete contract with the dispatch service's create-incident call
 */
export interface DispatchRequest {
    body: string;
    prio: Priority;
    location: string;
    taskIds: number[];
}
