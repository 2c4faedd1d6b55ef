/**
 * One parsed access log line. Every field is the trimmed raw text of its
 * column; nothing beyond the column count is validated.
 */
export type LogRecord = Readonly<{
    path: string;
    /** expected as MM/DD/YYYY HH:MM:SS, may be malformed */
    timestamp: string;
    agentString: string;
    status: string;
    size: string;
}>;
