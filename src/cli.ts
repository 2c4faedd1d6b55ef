import yargs from "yargs";
import { APP_VERSION as version } from "./common/config";
import { Logger } from "./common/logger";
import { shutdown } from "./common/shutdown";
import { ReportJob } from "./job/report.job";
import { ReportRender } from "./render/report.render";

const logger = new Logger("Cli");

export type CliDeps = {
    job: ReportJob;
    write: (text: string) => void;
    exit: (code: number) => void;
};

export function buildArgv(args: string[]) {
    return yargs(args)
        .usage("Usage: $0 --url <location> [options]")
        .option("url", {
            alias: "u",
            type: "string",
            demandOption: true,
            description: "Access log location (http(s) URL, file: URL or path)",
            coerce: (arg: string) => {
                if (!arg || !arg.trim()) {
                    throw new Error("URL must be a non-empty string");
                }
                return arg.trim();
            }
        })
        .option("format", {
            alias: "f",
            choices: ["text", "json"] as const,
            default: "text" as const,
            description: "Report output format"
        })
        .version(version)
        .strict()
        .help()
        .fail((msg: string, err: Error | undefined) => {
            throw err ?? new Error(msg);
        });
}

/**
 * Runs one report for the given command line. Every failure ends up here,
 * is logged and turns into exit code 1.
 */
export async function runCli(
    args: string[],
    deps: Partial<CliDeps> = {}
): Promise<void> {
    const {
        job = new ReportJob(),
        write = (text: string) => {
            process.stdout.write(text);
        },
        exit = shutdown
    } = deps;

    try {
        const argv = await buildArgv(args).parse();
        const result = await job.run(argv.url);
        write(new ReportRender().render(result, argv.format));
    } catch (err) {
        logger.error(
            `An error occurred: ${err instanceof Error ? err.message : String(err)}`
        );
        exit(1);
    }
}
