import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';

import { parse } from 'csv-parse/sync';
import * as XLSX from 'xlsx';
import { z } from 'zod';

import { DataSourceError } from '../model/Errors.ts';
import { createLogger } from '../utils/Logger.ts';

import type { CellValue, Table, TableRow, Workbook } from '../model/Models.ts';

const logger = createLogger('TableSource');

const CSV_DELIMITERS = [';', ',', '\t'] as const;

const CsvRecordsSchema = z.array(z.array(z.string()));

/**
 * Schema for a single cell, coerced to trimmed text.
 * Directories build their row schemas from this.
 */
export const textCell = z
    .union([z.string(), z.number(), z.boolean(), z.null()])
    .optional()
    .transform((value) => cellText(value));

/**
 * Cell as trimmed text; absent and null give ''.
 */
export function cellText(value: CellValue | undefined): string {
    if (value === null || value === undefined) return '';
    return String(value).trim();
}

/**
 * Throws DataSourceError listing every required column the table lacks.
 */
export function requireColumns(table: Table, required: readonly string[]): void {
    const missing = required.filter((column) => !table.columns.includes(column));
    if (missing.length > 0) {
        logger.error(`${table.name}: missing columns ${missing.join(', ')}`);
        throw new DataSourceError(table.name, 'required columns are missing', {
            missingColumns: missing,
            foundColumns: [...table.columns],
        });
    }
}

/**
 * Validates every row against a zod schema; the first failure aborts the load.
 */
export function parseRows<S extends z.ZodTypeAny>(table: Table, schema: S): z.output<S>[] {
    return table.rows.map((row, index) => {
        const result = schema.safeParse(row);
        if (!result.success) {
            const issue = result.error.issues[0];
            const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid row';
            throw new DataSourceError(table.name, `row ${index + 2} is malformed (${where})`, {
                cause: result.error,
            });
        }
        return result.data;
    });
}

/**
 * Builds a table from a header row and data rows.
 * Blank headers become 'Column <n>', repeated headers get a ' (<n>)' suffix.
 * Rows with no non-blank cell are dropped.
 */
export function tableFromMatrix(name: string, matrix: CellValue[][]): Table {
    if (matrix.length === 0) {
        return { name, columns: [], rows: [] };
    }

    const columns = uniqueHeaders(matrix[0]);
    const rows: TableRow[] = [];

    for (const cells of matrix.slice(1)) {
        if (cells.every((cell) => cellText(cell) === '')) continue;

        const row: TableRow = {};
        columns.forEach((column, i) => {
            row[column] = cells[i] ?? null;
        });
        rows.push(row);
    }

    return { name, columns, rows };
}

function uniqueHeaders(headerCells: CellValue[]): string[] {
    const seen = new Map<string, number>();

    return headerCells.map((cell, i) => {
        const base = cellText(cell) || `Column ${i + 1}`;
        const count = seen.get(base) ?? 0;
        seen.set(base, count + 1);
        return count === 0 ? base : `${base} (${count + 1})`;
    });
}

function toCellValue(value: unknown): CellValue {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }
    if (value instanceof Date) {
        return value.toISOString();
    }
    return null;
}

/**
 * Picks the delimiter that occurs most often in the header line.
 * Danish exports are usually ';'.
 */
export function detectDelimiter(text: string): string {
    const headerLine = text.split(/\r?\n/, 1)[0] ?? '';
    let best: string = CSV_DELIMITERS[0];
    let bestCount = 0;

    for (const delimiter of CSV_DELIMITERS) {
        const count = headerLine.split(delimiter).length - 1;
        if (count > bestCount) {
            best = delimiter;
            bestCount = count;
        }
    }
    return best;
}

export function parseCsvText(name: string, text: string): Table {
    const delimiter = detectDelimiter(text);

    let records: string[][];
    try {
        records = CsvRecordsSchema.parse(
            parse(text, {
                delimiter,
                bom: true,
                skip_empty_lines: true,
                relax_column_count: true,
            })
        );
    } catch (err) {
        throw new DataSourceError(name, 'failed to parse CSV', { cause: err });
    }

    return tableFromMatrix(name, records);
}

async function readSourceFile(path: string): Promise<Buffer> {
    try {
        return await readFile(path);
    } catch (err) {
        logger.error({ err }, `Failed to read ${path}`);
        throw new DataSourceError(basename(path), `failed to read file ${path}`, { cause: err });
    }
}

export async function readCsvTable(path: string): Promise<Table> {
    const buffer = await readSourceFile(path);
    const table = parseCsvText(basename(path), buffer.toString('utf-8'));
    logger.info(`Read ${table.rows.length} rows from ${basename(path)}`);
    return table;
}

export function parseWorkbookBuffer(name: string, buffer: Buffer): Workbook {
    let book: XLSX.WorkBook;
    try {
        book = XLSX.read(buffer, { type: 'buffer' });
    } catch (err) {
        throw new DataSourceError(name, 'failed to parse workbook', { cause: err });
    }

    const sheets = book.SheetNames.map((sheetName) => {
        const sheet = book.Sheets[sheetName];
        const matrix = XLSX.utils
            .sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, raw: true, blankrows: false })
            .map((cells) => cells.map(toCellValue));
        return tableFromMatrix(sheetName, matrix);
    });

    return { name, sheets };
}

export async function readWorkbook(path: string): Promise<Workbook> {
    const buffer = await readSourceFile(path);
    const workbook = parseWorkbookBuffer(basename(path), buffer);
    logger.info(`Read ${workbook.sheets.length} sheets from ${basename(path)}`);
    return workbook;
}

/**
 * First sheet of a workbook, renamed after the file
 */
export async function readFirstSheet(path: string): Promise<Table> {
    const workbook = await readWorkbook(path);
    const first = workbook.sheets[0];
    if (!first) {
        throw new DataSourceError(workbook.name, 'workbook has no sheets');
    }
    return { ...first, name: workbook.name };
}

/**
 * Reads a single table, choosing the reader by file extension.
 */
export async function readTable(path: string): Promise<Table> {
    return extname(path).toLowerCase() === '.csv' ? readCsvTable(path) : readFirstSheet(path);
}
