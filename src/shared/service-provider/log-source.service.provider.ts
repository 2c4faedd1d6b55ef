/**
 * Retrieves the raw access log text from a URL or a local file
 */
import axios from "axios";
import { readFile } from "fs/promises";
import { fileURLToPath } from "url";
import { FETCH_TIMEOUT_MS } from "../../common/config";
import { TransportError } from "../../common/errors";
import { Logger } from "../../common/logger";

const logger = new Logger("LogSourceServiceProvider");

export class LogSourceServiceProvider {
    private readonly HTTP_RE = /^https?:\/\//i;
    private readonly FILE_URL_RE = /^file:/i;
    /** Anything else that looks like scheme://… is not something we can read. */
    private readonly SCHEME_RE = /^[a-z][a-z0-9+.-]*:\/\//i;

    constructor(private readonly timeoutMs: number = FETCH_TIMEOUT_MS) {}

    /**
     * Resolves with the UTF-8 text found at `location`.
     * Rejects with a TransportError on any failure; nothing is retried.
     */
    async fetch(location: string): Promise<string> {
        try {
            const bytes = await this.fetchBytes(location);
            return this.decode(bytes);
        } catch (err) {
            throw new TransportError(location, err);
        }
    }

    private async fetchBytes(location: string): Promise<Uint8Array> {
        if (this.HTTP_RE.test(location)) {
            logger.debug(`GET ${location} (timeout ${this.timeoutMs}ms)`);
            const response = await axios.get<ArrayBuffer>(location, {
                responseType: "arraybuffer",
                timeout: this.timeoutMs
            });
            return new Uint8Array(response.data);
        }
        if (this.FILE_URL_RE.test(location)) {
            return readFile(fileURLToPath(location));
        }
        if (this.SCHEME_RE.test(location)) {
            throw new Error(`Unsupported URL scheme in ${location}`);
        }
        return readFile(location);
    }

    private decode(bytes: Uint8Array): string {
        // fatal: invalid UTF-8 means the content is not a text log
        return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
    }
}
