// src/services/history/csv.ts

import type { PostRecord } from '@/types';
import { validatePostRecord } from '@/utils/validators';

export const CSV_COLUMNS = [
    'id',
    'trigger',
    'topicId',
    'topicName',
    'category',
    'body',
    'hashtags',
    'generationMethod',
    'imageRef',
    'platformPostId',
    'status',
    'failureReason',
    'failureDetail',
    'timestamp',
    'attemptCount'
] as const satisfies ReadonlyArray<keyof PostRecord>;

type Column = typeof CSV_COLUMNS[number];

/** A parsed cell: quoted text, or null for an empty unquoted cell */
type Cell = string | null;

/**
 * Values are always quoted; null is the only unquoted (empty) cell, so '' and null survive a round trip
 */
const escapeField = (value: string | null): string => {
    if (value === null) return '';
    return `"${value.replace(/"/g, '""')}"`;
};

const cellValue = (record: PostRecord, column: Column): string | null => {
    const value = record[column];
    if (value === null) return null;
    if (Array.isArray(value)) return value.join(' ');
    return String(value);
};

export const toCsv = (records: Iterable<PostRecord>): string => {
    const lines = [CSV_COLUMNS.join(',')];
    for (const record of records) {
        lines.push(CSV_COLUMNS.map(column => escapeField(cellValue(record, column))).join(','));
    }
    return lines.join('\r\n') + '\r\n';
};

/**
 * Split CSV text into rows of cells. Handles quoted commas, newlines and doubled quotes.
 */
export const parseCsvRows = (text: string): Cell[][] => {
    const rows: Cell[][] = [];
    let row: Cell[] = [];
    let field = '';
    let quoted = false;
    let inQuotes = false;
    let rowHasContent = false;

    const endField = (): void => {
        row.push(quoted ? field : (field === '' ? null : field));
        field = '';
        quoted = false;
    };
    const endRow = (): void => {
        endField();
        if (rowHasContent || row.length > 1 || row[0] !== null) rows.push(row);
        row = [];
        rowHasContent = false;
    };

    for (let i = 0; i < text.length; i++) {
        const char = text.charAt(i);

        if (inQuotes) {
            if (char === '"') {
                if (text.charAt(i + 1) === '"') {
                    field += '"';
                    i++;
                } else {
                    inQuotes = false;
                }
            } else {
                field += char;
            }
            continue;
        }

        if (char === '"') {
            inQuotes = true;
            quoted = true;
            rowHasContent = true;
        } else if (char === ',') {
            endField();
            rowHasContent = true;
        } else if (char === '\n') {
            endRow();
        } else if (char === '\r') {
            if (text.charAt(i + 1) !== '\n') endRow();
        } else {
            field += char;
            rowHasContent = true;
        }
    }

    if (inQuotes) {
        throw new Error('Unterminated quoted field in CSV input');
    }
    if (field !== '' || quoted || row.length > 0) endRow();

    return rows;
};

/**
 * Rebuild PostRecords from exported CSV. Throws on a bad header or an invalid row.
 */
export const fromCsv = (text: string): PostRecord[] => {
    const [header, ...rows] = parseCsvRows(text);
    if (!header) return [];

    const expected = CSV_COLUMNS.join(',');
    if (header.join(',') !== expected) {
        throw new Error(`Unexpected CSV header: ${header.join(',')}`);
    }

    return rows.map((cells, index) => {
        const raw: Record<string, unknown> = {};
        CSV_COLUMNS.forEach((column, i) => {
            raw[column] = cells[i] ?? null;
        });

        const hashtags = raw.hashtags;
        raw.hashtags = typeof hashtags === 'string' && hashtags.length > 0 ? hashtags.split(' ') : [];
        const attemptCount = raw.attemptCount;
        raw.attemptCount = typeof attemptCount === 'string' ? Number(attemptCount) : attemptCount;

        const validation = validatePostRecord(raw);
        if (!validation.successful || !validation.data) {
            throw new Error(`Invalid record on CSV row ${index + 2}: ${validation.error ?? 'unknown error'}`);
        }
        return validation.data;
    });
};
