import { describe, expect, it } from "vitest";
import { LogRecord } from "../shared/type/log-record.type";
import {
    agentCounts,
    classifyAgent,
    summarizeAgents,
    tallyAgents
} from "./agent.analyzer";

const CHROME =
    "Mozilla/5.0 (Windows NT 6.1; WOW64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/100.0.4896.60 Safari/537.36";
const SAFARI =
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_10_1) AppleWebKit/600.2.5 (KHTML, like Gecko) Version/8.0.2 Safari/537.85.11";
const FIREFOX =
    "Mozilla/5.0 (Windows NT 6.1; rv:26.0) Gecko/20100101 Firefox/26.0";
const IE9 = "Mozilla/5.0 (compatible; MSIE 9.0; Windows NT 6.1; Trident/5.0)";
const IE11 = "Mozilla/5.0 (Windows NT 6.3; Trident/7.0; rv:11.0) like Gecko";

function record(agentString: string): LogRecord {
    return {
        path: "/",
        timestamp: "01/01/2020 10:00:00",
        agentString,
        status: "200",
        size: "0"
    };
}

describe("classifyAgent", () => {
    it("recognises each family", () => {
        expect(classifyAgent(FIREFOX)).toBe("Firefox");
        expect(classifyAgent(CHROME)).toBe("Chrome");
        expect(classifyAgent(IE9)).toBe("Internet Explorer");
        expect(classifyAgent(IE11)).toBe("Internet Explorer");
        expect(classifyAgent(SAFARI)).toBe("Safari");
    });

    it("prefers Chrome over the Safari token it also carries", () => {
        expect(classifyAgent("Chrome/100 Safari/537")).toBe("Chrome");
        expect(classifyAgent("Safari/537")).toBe("Safari");
    });

    it("prefers Firefox over every later family", () => {
        expect(classifyAgent("Firefox/90 Chrome/100 Safari/537")).toBe(
            "Firefox"
        );
    });

    it("matches tokens case-insensitively", () => {
        expect(classifyAgent("firefox/3")).toBe("Firefox");
        expect(classifyAgent("CHROME/12")).toBe("Chrome");
        expect(classifyAgent("msie 6.0")).toBe("Internet Explorer");
    });

    it("needs a version number after the token", () => {
        expect(classifyAgent("Firefox")).toBe("Other");
        expect(classifyAgent("Chrome/")).toBe("Other");
        expect(classifyAgent("MSIE")).toBe("Other");
    });

    it.each(["", "CustomBot/1.0", "curl/7.68.0"])(
        "falls back to Other for %j",
        (agent) => {
            expect(classifyAgent(agent)).toBe("Other");
        }
    );
});

describe("summarizeAgents", () => {
    it("returns the most common family", () => {
        const records = [CHROME, FIREFOX, CHROME, "bot"].map(record);
        expect(summarizeAgents(records)).toEqual({ label: "Chrome", count: 2 });
    });

    it("keeps the family seen first on a tie", () => {
        const records = [SAFARI, CHROME, CHROME, SAFARI].map(record);
        expect(summarizeAgents(records)).toEqual({ label: "Safari", count: 2 });
    });

    it("reports None for no records", () => {
        expect(summarizeAgents([])).toEqual({ label: "None", count: 0 });
    });
});

describe("agentCounts", () => {
    it("lists every family seen in first-seen order", () => {
        const tally = tallyAgents([IE9, "", IE11, FIREFOX].map(record));
        expect(agentCounts(tally)).toEqual([
            { label: "Internet Explorer", count: 2 },
            { label: "Other", count: 1 },
            { label: "Firefox", count: 1 }
        ]);
    });
});
