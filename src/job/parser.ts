/**
 * Comma-delimited access log parsing
 */
import { parse } from "csv-parse/sync";
import { Logger } from "../common/logger";

const logger = new Logger("Parser");
import { LogRecord } from "../shared/type/log-record.type";

/**
 * Line layout is
 * path, datetime, user agent, status, size
 * Anything after the fifth column is ignored.
 */
const MIN_FIELDS = 5;

/** Every line boundary, including form feed, separators and NEL. */
const LINE_BREAK_RE = /\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029]/;

const CSV_OPTIONS = {
    record_delimiter: "\n",
    relax_quotes: true,
    relax_column_count: true,
    skip_empty_lines: true
};

function isStringRow(row: unknown): row is string[] {
    return Array.isArray(row) && row.every((f) => typeof f === "string");
}

function isQuoteNotClosed(err: unknown): boolean {
    return (
        err instanceof Error &&
        "code" in err &&
        err.code === "CSV_QUOTE_NOT_CLOSED"
    );
}

/**
 * Splits the log into rows of CSV fields. A quoted field may carry on over
 * the following lines; the line breaks inside it are dropped. A quote still
 * open at the end of the input closes there.
 */
export function splitRows(raw: string): string[][] {
    const text = raw.split(LINE_BREAK_RE).join("\n");
    let rows: unknown;
    try {
        rows = parse(text, CSV_OPTIONS);
    } catch (err) {
        logger.debug(
            `[unparsed] ${err instanceof Error ? err.message : err}, retrying`
        );
        rows = parse(isQuoteNotClosed(err) ? `${text}"` : text, {
            ...CSV_OPTIONS,
            skip_records_with_error: true
        });
    }
    if (!Array.isArray(rows)) return [];
    return rows
        .filter(isStringRow)
        .map((row) => row.map((field) => field.replace(/\n/g, "")));
}

export function toRecord(fields: readonly string[]): LogRecord | null {
    if (fields.length < MIN_FIELDS) return null;
    const [path, timestamp, agentString, status, size] = fields.map((f) =>
        f.trim()
    );
    return Object.freeze({ path, timestamp, agentString, status, size });
}

export function parseLine(line: string): LogRecord | null {
    const [fields] = splitRows(line);
    return fields ? toRecord(fields) : null;
}

/** Parses a whole log; malformed lines are dropped, order is kept. */
export function parseLog(raw: string): readonly LogRecord[] {
    const records: LogRecord[] = [];
    for (const fields of splitRows(raw)) {
        const record = toRecord(fields);
        if (record) records.push(record);
    }
    return Object.freeze(records);
}
