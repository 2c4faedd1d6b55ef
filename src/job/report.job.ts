/**
 * Fetch an access log and compute its summary statistics
 */
import { classifyImages } from "../analyzer/image.analyzer";
import {
    agentCounts,
    summarizeTally,
    tallyAgents
} from "../analyzer/agent.analyzer";
import { aggregateByHour } from "../analyzer/hour.analyzer";
import { Logger } from "../common/logger";
import { LogSourceServiceProvider } from "../shared/service-provider/log-source.service.provider";
import { ReportResult } from "../shared/type/report.type";
import { parseLog } from "./parser";

const logger = new Logger("ReportJob");

/**
 * Parses `raw` and runs the three analysis passes over the same records.
 * The passes share nothing, so their order does not affect the result.
 */
export function buildReport(source: string, raw: string): ReportResult {
    logger.notice("Processing CSV data...");
    const records = parseLog(raw);
    logger.notice(`Processed ${records.length} log entries`);

    logger.notice("Analyzing image requests...");
    const images = classifyImages(records);

    logger.notice("Determining most popular browser...");
    const agentTally = tallyAgents(records);

    logger.notice("Analyzing hits by hour...");
    const hours = aggregateByHour(records);

    return {
        source,
        recordCount: records.length,
        images,
        agent: summarizeTally(agentTally),
        agents: agentCounts(agentTally),
        hours
    };
}

export class ReportJob {
    constructor(
        private readonly logSource: LogSourceServiceProvider = new LogSourceServiceProvider()
    ) {}

    async run(location: string): Promise<ReportResult> {
        logger.notice(`Downloading data from ${location}...`);
        const raw = await this.logSource.fetch(location);
        return buildReport(location, raw);
    }
}
