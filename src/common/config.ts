export const APP_VERSION = "1.0.0";

/** Log level name understood by pino, including the custom "notice". */
export const LOG_LEVEL = process.env.LOG_LEVEL || "notice";

/** Colour only where a terminal is expected. */
export const LOG_COLORIZE = [undefined, "local", "docker"].includes(
    process.env.APP_ENV
);

export const FETCH_TIMEOUT_MS = parsePositiveInt(
    process.env.FETCH_TIMEOUT_MS,
    30_000
);

function parsePositiveInt(raw: string | undefined, fallback: number): number {
    if (!raw) return fallback;
    const val = parseInt(raw, 10);
    return isNaN(val) || val <= 0 ? fallback : val;
}
