/**
 * Console rendering of a finished report
 */
import Handlebars from "handlebars";
import { readFileSync } from "fs";
import { join } from "path";
import { ReportFormat, ReportResult } from "../shared/type/report.type";

const VIEWS_ROOT = join(__dirname, "..", "..", "resources", "views");

/**
 * One decimal place, ties to even. `toFixed` rounds an exact tie such as
 * 0.25 up; those ties are exactly the quarters that are not halves.
 */
export function formatOneDecimal(n: number): string {
    if (Number.isInteger(n * 4) && !Number.isInteger(n * 2)) {
        const tenths = Math.floor(n * 10);
        return ((tenths % 2 === 0 ? tenths : tenths + 1) / 10).toFixed(1);
    }
    return n.toFixed(1);
}

export class ReportRender {
    private readonly hbs = Handlebars.create();
    private readonly template: Handlebars.TemplateDelegate<ReportResult>;

    constructor(viewsRoot: string = VIEWS_ROOT) {
        this.hbs.registerHelper("pad2", (n: unknown) =>
            String(n).padStart(2, "0")
        );
        this.hbs.registerHelper("fixed1", (n: unknown) =>
            formatOneDecimal(Number(n))
        );
        // plain text: nothing to HTML-escape
        this.template = this.hbs.compile<ReportResult>(
            readFileSync(join(viewsRoot, "report.hbs"), "utf8"),
            { noEscape: true }
        );
    }

    render(result: ReportResult, format: ReportFormat): string {
        return format === "json"
            ? this.renderJson(result)
            : this.renderText(result);
    }

    renderText(result: ReportResult): string {
        return this.template(result);
    }

    renderJson(result: ReportResult): string {
        return `${JSON.stringify(result, null, 2)}\n`;
    }
}
