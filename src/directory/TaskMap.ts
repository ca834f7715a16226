import { DataSourceError } from '../model/Errors.ts';
import { cellText } from '../source/TableSource.ts';
import { createLogger } from '../utils/Logger.ts';

import type { CellValue, Table, TaskSelectionResult } from '../model/Models.ts';
import type { Logger } from 'pino';

export const DAY_ASSISTANCE_UNIT = 'Ass.Dag';
export const NIGHT_ASSISTANCE_UNIT = 'Ass.Nat';

/**
 * Task ids that never trigger assistance on their own
 */
export const ASSISTANCE_EXCLUDED_TASK_IDS: ReadonlySet<number> = new Set([
    823, 3134, 7040, 6509, 3176, 7035, 7036, 7037, 5474, 1268,
]);

// Day assistance covers Mon–Fri [07:00, 17:00) local time
const DAY_START_HOUR = 7;
const DAY_END_HOUR = 17;

const UNIT_COLUMN = 'unit';
const TASK_ID_COLUMN = 'task_id';

const DIGITS = /^\d+$/;

/**
 * Parses a task id cell.
 *
 * Two ids can share one numeric cell, packed either side of the decimal
 * point: 3134.1268 → [3134, 1268]. Trailing zeros on the right are
 * dropped, so 823.0 → [823]. Anything unparseable gives [].
 */
export function parseTaskIds(value: CellValue | undefined): number[] {
    const s = cellText(value);
    if (!s) return [];

    if (s.includes('.')) {
        const dot = s.indexOf('.');
        const left = s.slice(0, dot).trim();
        const right = s.slice(dot + 1).trim().replace(/0+$/, '');

        const ids: number[] = [];
        if (DIGITS.test(left)) ids.push(parseInt(left, 10));
        if (DIGITS.test(right)) ids.push(parseInt(right, 10));
        return unique(ids);
    }

    const n = Number(s);
    return Number.isFinite(n) ? [Math.trunc(n)] : [];
}

function unique(ids: number[]): number[] {
    return [...new Set(ids)];
}

/**
 * Day assistance on weekdays between 07:00 and 17:00, night assistance otherwise.
 */
export function assistanceUnitAt(now: Date): string {
    const day = now.getDay(); // 0 = Sunday
    const isWeekday = day >= 1 && day <= 5;
    const hour = now.getHours();
    const isDaytime = hour >= DAY_START_HOUR && hour < DAY_END_HOUR;

    return isWeekday && isDaytime ? DAY_ASSISTANCE_UNIT : NIGHT_ASSISTANCE_UNIT;
}

/**
 * Unit → dispatch task id mapping, read from the task id table (unit | task_id).
 * A unit listed twice keeps the ids of its last row.
 */
export class TaskMap {
    private logger: Logger;
    private taskIds: Map<string, number[]> = new Map();

    constructor() {
        this.logger = createLogger('TaskMap');
    }

    load(table: Table): void {
        // header case is not consistent between exports
        const byLower = new Map(table.columns.map((c) => [c.trim().toLowerCase(), c]));
        const unitColumn = byLower.get(UNIT_COLUMN);
        const taskColumn = byLower.get(TASK_ID_COLUMN);

        if (unitColumn === undefined || taskColumn === undefined) {
            const missing = [
                ...(unitColumn === undefined ? [UNIT_COLUMN] : []),
                ...(taskColumn === undefined ? [TASK_ID_COLUMN] : []),
            ];
            this.logger.error(`${table.name}: missing columns ${missing.join(', ')}`);
            throw new DataSourceError(table.name, 'required columns are missing', {
                missingColumns: missing,
                foundColumns: [...table.columns],
            });
        }

        const taskIds = new Map<string, number[]>();
        let skipped = 0;

        for (const row of table.rows) {
            const unit = cellText(row[unitColumn]);
            const ids = parseTaskIds(row[taskColumn]);
            if (!unit || ids.length === 0) {
                skipped++;
                continue;
            }
            taskIds.set(unit, ids);
        }

        this.taskIds = taskIds;
        this.logger.info(`Loaded task ids for ${taskIds.size} units from ${table.name}, ${skipped} rows skipped`);
    }

    get size(): number {
        return this.taskIds.size;
    }

    taskIdsForUnit(unit: string): number[] | null {
        const ids = this.taskIds.get(unit.trim());
        return ids ? [...ids] : null;
    }

    /**
     * Task ids for a unit list, unique and in unit order.
     *
     * With `autoAddAssistance`, the day or night assistance unit is appended
     * unless every selected id is in ASSISTANCE_EXCLUDED_TASK_IDS.
     */
    selectTaskIdsForUnits(
        units: string[],
        now: Date = new Date(),
        autoAddAssistance: boolean = true
    ): TaskSelectionResult {
        const missingUnits: string[] = [];
        const found: number[] = [];

        for (const unit of units) {
            const ids = this.taskIdsForUnit(unit);
            if (ids === null) {
                missingUnits.push(unit);
            } else {
                found.push(...ids);
            }
        }

        const taskIds = unique(found);
        let assistanceAdded = false;
        let assistanceUnit: string | null = null;

        const escalate =
            autoAddAssistance &&
            taskIds.length > 0 &&
            taskIds.some((id) => !ASSISTANCE_EXCLUDED_TASK_IDS.has(id));

        if (escalate) {
            const candidate = assistanceUnitAt(now);
            const assistanceIds = this.taskIdsForUnit(candidate) ?? [];

            if (assistanceIds.length > 0) {
                for (const id of assistanceIds) {
                    if (!taskIds.includes(id)) taskIds.push(id);
                }
                assistanceAdded = true;
                assistanceUnit = candidate;
            } else {
                this.logger.warn(`Assistance unit '${candidate}' has no task ids, nothing added`);
            }
        }

        if (missingUnits.length > 0) {
            this.logger.warn(`No task ids for units: ${missingUnits.join(', ')}`);
        }

        return { taskIds, missingUnits, assistanceAdded, assistanceUnit };
    }
}
