/**
 * Measures table: flat, ordered field-value export of {@link GridMeasures}.
 *
 * One row per measures record (per trajectory or per combined group). Columns
 * always appear in {@link MEASURE_COLUMNS} order. Undefined measures are
 * written as `NaN`, never left out, and numbers use the shortest text that
 * parses back to the same double. Id lists are JSON arrays.
 */

import type { GridMeasures } from '../grid-types.js';
import { ConfigError, ValidationError } from './errors.js';
import { describeIssues, idListSchema, measureNumberSchema } from './schemas.js';

type NumericMeasure = Exclude<keyof GridMeasures, 'trajectoryIds' | 'dispersionExcludedIds'>;

const NUMERIC_COLUMNS: ReadonlyArray<readonly [column: string, key: NumericMeasure]> = [
    ['mean_duration', 'meanDuration'],
    ['mean_number_of_events', 'meanNumberOfEvents'],
    ['mean_number_of_visits', 'meanNumberOfVisits'],
    ['mean_cell_range', 'meanCellRange'],
    ['overall_cell_range', 'overallCellRange'],
    ['mean_duration_per_event', 'meanDurationPerEvent'],
    ['mean_duration_per_visit', 'meanDurationPerVisit'],
    ['mean_duration_per_cell', 'meanDurationPerCell'],
    ['dispersion', 'dispersion'],
    ['visited_entropy', 'visitedEntropy'],
];

export const MEASURE_COLUMNS: readonly string[] = [
    'trajectory_ids',
    ...NUMERIC_COLUMNS.map(([column]) => column),
    'dispersion_excluded_ids',
];

export interface TableOptions {
    /** Single-character cell separator. Default: `,`. */
    delimiter?: string;
}

export function formatMeasure(value: number): string {
    return Number.isNaN(value) ? 'NaN' : String(value);
}

/** Cells of one row, in column order. */
export function toRow(measures: GridMeasures): string[] {
    return [
        JSON.stringify(measures.trajectoryIds),
        ...NUMERIC_COLUMNS.map(([, key]) => formatMeasure(measures[key])),
        JSON.stringify(measures.dispersionExcludedIds),
    ];
}

export function fromRow(cells: readonly string[], rowNumber = 1): GridMeasures {
    if (cells.length !== MEASURE_COLUMNS.length) {
        throw new ValidationError(`Row ${rowNumber}: expected ${MEASURE_COLUMNS.length} cells, got ${cells.length}`);
    }

    const read = (key: NumericMeasure): number => readNumber(cells, key, rowNumber);
    return Object.freeze({
        trajectoryIds: Object.freeze(parseIdList(cells[0], 'trajectory_ids', rowNumber)),
        meanDuration: read('meanDuration'),
        meanNumberOfEvents: read('meanNumberOfEvents'),
        meanNumberOfVisits: read('meanNumberOfVisits'),
        meanCellRange: read('meanCellRange'),
        overallCellRange: read('overallCellRange'),
        meanDurationPerEvent: read('meanDurationPerEvent'),
        meanDurationPerVisit: read('meanDurationPerVisit'),
        meanDurationPerCell: read('meanDurationPerCell'),
        dispersion: read('dispersion'),
        visitedEntropy: read('visitedEntropy'),
        dispersionExcludedIds: Object.freeze(
            parseIdList(cells[MEASURE_COLUMNS.length - 1], 'dispersion_excluded_ids', rowNumber)
        ),
    });
}

export function serializeMeasures(rows: readonly GridMeasures[], options: TableOptions = {}): string {
    const delimiter = resolveDelimiter(options);
    const lines = [MEASURE_COLUMNS, ...rows.map(toRow)].map((cells) =>
        cells.map((cell) => quoteCell(cell, delimiter)).join(delimiter)
    );
    return lines.join('\n') + '\n';
}

/**
 * Parses text written by {@link serializeMeasures}.
 * @throws ValidationError on an unexpected header or malformed cells.
 */
export function parseMeasures(text: string, options: TableOptions = {}): GridMeasures[] {
    const delimiter = resolveDelimiter(options);
    const records = splitRecords(text, delimiter).filter((r) => !(r.length === 1 && r[0] === ''));
    if (records.length === 0) {
        throw new ValidationError('Measures table is empty');
    }

    const [header, ...rows] = records;
    if (header.join('\u0000') !== MEASURE_COLUMNS.join('\u0000')) {
        throw new ValidationError(`Unexpected measures table header: ${header.join(delimiter)}`);
    }
    return rows.map((cells, i) => fromRow(cells, i + 1));
}

function resolveDelimiter(options: TableOptions): string {
    const delimiter = options.delimiter ?? ',';
    if (delimiter.length !== 1 || delimiter === '"' || delimiter === '\n' || delimiter === '\r') {
        throw new ConfigError(`Invalid table delimiter: ${JSON.stringify(delimiter)}`);
    }
    return delimiter;
}

function quoteCell(cell: string, delimiter: string): string {
    if (cell.includes(delimiter) || cell.includes('"') || cell.includes('\n') || cell.includes('\r')) {
        return `"${cell.replace(/"/g, '""')}"`;
    }
    return cell;
}

function readNumber(cells: readonly string[], key: NumericMeasure, rowNumber: number): number {
    const index = NUMERIC_COLUMNS.findIndex(([, k]) => k === key);
    const column = NUMERIC_COLUMNS[index][0];
    const parsed = measureNumberSchema.safeParse(cells[index + 1]);
    if (!parsed.success) {
        throw new ValidationError(`Row ${rowNumber}, ${column}: ${describeIssues(parsed.error)}`, parsed.error);
    }
    return parsed.data;
}

function parseIdList(cell: string, column: string, rowNumber: number): string[] {
    let raw: unknown;
    try {
        raw = JSON.parse(cell);
    } catch (err) {
        throw new ValidationError(`Row ${rowNumber}, ${column}: not a JSON array`, err);
    }
    const parsed = idListSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ValidationError(`Row ${rowNumber}, ${column}: ${describeIssues(parsed.error)}`, parsed.error);
    }
    return parsed.data;
}

function splitRecords(text: string, delimiter: string): string[][] {
    const records: string[][] = [];
    let record: string[] = [];
    let cell = '';
    let quoted = false;

    for (let i = 0; i < text.length; i++) {
        const ch = text[i];
        if (quoted) {
            if (ch !== '"') {
                cell += ch;
            } else if (text[i + 1] === '"') {
                cell += '"';
                i++;
            } else {
                quoted = false;
            }
            continue;
        }
        if (ch === '"' && cell.length === 0) {
            quoted = true;
        } else if (ch === delimiter) {
            record.push(cell);
            cell = '';
        } else if (ch === '\n' || ch === '\r') {
            if (ch === '\r' && text[i + 1] === '\n') i++;
            record.push(cell);
            records.push(record);
            record = [];
            cell = '';
        } else {
            cell += ch;
        }
    }
    if (quoted) {
        throw new ValidationError('Measures table ends inside a quoted cell');
    }
    if (cell.length > 0 || record.length > 0) {
        record.push(cell);
        records.push(record);
    }
    return records;
}
