import pino from "pino";
import { LOG_COLORIZE, LOG_LEVEL } from "./config";

export class Logger {
    static readonly config: pino.LoggerOptions<"notice"> = {
        customLevels: { notice: 35 },
        level: LOG_LEVEL,
        base: { context: "App" },
        // silent runs (tests) need no pretty-printing worker
        transport: LOG_LEVEL === "silent" ? undefined : {
            target: "pino-pretty",
            options: {
                customLevels: "trace:10,debug:20,info:30,notice:35,warn:40,error:50,fatal:60",
                colorize: LOG_COLORIZE,
                singleLine: true,
                levelFirst: false,
                translateTime: "yyyy-mm-dd'T'HH:MM:ss.l'Z'",
                // customize https://github.com/pinojs/pino-pretty
                messageFormat: "[{context}] {msg}",
                ignore: "pid,hostname,context",
                errorLikeObjectKeys: ["err", "error"],
                // stdout carries the report
                destination: 2
            }
        }
    };

    private static readonly root: pino.Logger<"notice"> = pino(Logger.config);

    readonly notice: pino.LogFn;
    readonly error: pino.LogFn;
    readonly warn: pino.LogFn;
    readonly info: pino.LogFn;
    readonly debug: pino.LogFn;

    constructor(context: string) {
        const child = Logger.root.child({ context });
        this.notice = child.notice.bind(child);
        this.error  = child.error.bind(child);
        this.warn   = child.warn.bind(child);
        this.info   = child.info.bind(child);
        this.debug  = child.debug.bind(child);
    }
}
