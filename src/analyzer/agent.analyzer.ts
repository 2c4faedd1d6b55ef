/**
 * Browser family detection from raw user agent strings
 */
import { LogRecord } from "../shared/type/log-record.type";
import {
    AgentCount,
    AgentFamily,
    AgentSummary
} from "../shared/type/report.type";
import { Tally } from "./tally";

const FIREFOX_RE = /Firefox\/\d+/i;
const CHROME_RE = /Chrome\/\d+/i;
const IE_RE = /MSIE \d+|Trident\/\d+/i;
const SAFARI_RE = /Safari\/\d+/i;

/**
 * Order matters: Chrome agents also carry a Safari token, and several
 * browsers mimic the others, so the first matching family wins.
 */
export function classifyAgent(agentString: string): AgentFamily {
    if (FIREFOX_RE.test(agentString)) return "Firefox";
    if (CHROME_RE.test(agentString)) return "Chrome";
    if (IE_RE.test(agentString)) return "Internet Explorer";
    if (SAFARI_RE.test(agentString)) return "Safari";
    return "Other";
}

export function tallyAgents(records: readonly LogRecord[]): Tally<AgentFamily> {
    const tally = new Tally<AgentFamily>();
    for (const record of records) {
        tally.add(classifyAgent(record.agentString));
    }
    return tally;
}

export function agentCounts(tally: Tally<AgentFamily>): AgentCount[] {
    return tally.entries().map(([label, count]) => ({ label, count }));
}

export function summarizeTally(tally: Tally<AgentFamily>): AgentSummary {
    const top = tally.mostCommon();
    return top ? { label: top[0], count: top[1] } : { label: "None", count: 0 };
}

/** Most common family; "None" with 0 hits when there is nothing to count. */
export function summarizeAgents(records: readonly LogRecord[]): AgentSummary {
    return summarizeTally(tallyAgents(records));
}
