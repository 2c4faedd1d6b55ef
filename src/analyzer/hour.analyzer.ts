/**
 * Hits by hour of day
 */
import { LogRecord } from "../shared/type/log-record.type";
import { HourCount } from "../shared/type/report.type";
import { Tally } from "./tally";

/**
 * M/D/YYYY H:M:S, one or two digits everywhere but the year. A single-digit
 * day may also be padded with a space ("01/ 5/2020").
 */
const TIMESTAMP_RE =
    /^(\d{1,2})\/(\d{1,2}| [1-9])\/(\d{4})\s+(\d{1,2}):(\d{1,2}):(\d{1,2})$/;

function daysInMonth(year: number, month: number): number {
    // day 0 of the next month is the last day of this one
    return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Returns the hour (0–23) of a MM/DD/YYYY HH:MM:SS timestamp, or null when
 * the text is not a valid date-time in that layout.
 */
export function parseTimestampHour(timestamp: string): number | null {
    const m = TIMESTAMP_RE.exec(timestamp);
    if (!m) return null;
    const [month, day, year, hour, minute, second] = m
        .slice(1)
        .map((part) => parseInt(part, 10));
    if (month < 1 || month > 12) return null;
    if (year < 1 || day < 1 || day > daysInMonth(year, month)) return null;
    if (hour > 23 || minute > 59 || second > 59) return null;
    return hour;
}

export function tallyHours(records: readonly LogRecord[]): Tally<number> {
    const tally = new Tally<number>();
    for (const record of records) {
        const hour = parseTimestampHour(record.timestamp);
        if (hour !== null) tally.add(hour);
    }
    return tally;
}

/** Non-empty hours, busiest first; equal counts keep first-seen order. */
export function aggregateByHour(records: readonly LogRecord[]): HourCount[] {
    return tallyHours(records)
        .ranked()
        .map(([hour, count]) => ({ hour, count }));
}
