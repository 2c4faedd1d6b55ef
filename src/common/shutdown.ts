import { Logger } from "./logger";

const logger = new Logger("Shutdown");

export function shutdown(code: number): never {
    if (code !== 0) {
        logger.notice(`Exiting with code ${code}`);
    }
    process.exit(code);
}
