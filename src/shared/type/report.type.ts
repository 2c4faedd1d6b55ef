/**
 * Shapes produced by the analysis passes and returned by a report run.
 */

export const AGENT_FAMILIES = [
    "Firefox",
    "Chrome",
    "Internet Explorer",
    "Safari",
    "Other"
] as const;

export type AgentFamily = (typeof AGENT_FAMILIES)[number];

export type ImageSummary = {
    count: number;
    total: number;
    percentage: number; // 0–100
};

export type AgentCount = { label: AgentFamily; count: number };

/** Most common agent family; "None" only when there were no records. */
export type AgentSummary = { label: AgentFamily | "None"; count: number };

export type HourCount = { hour: number; count: number };

export type ReportResult = {
    source: string;
    recordCount: number;
    images: ImageSummary;
    agent: AgentSummary;
    agents: AgentCount[]; // first-seen order
    hours: HourCount[];   // count descending, ties in first-seen order
};

export type ReportFormat = "text" | "json";
