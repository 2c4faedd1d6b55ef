import { LogRecord } from "../shared/type/log-record.type";
import { ImageSummary } from "../shared/type/report.type";

/** Extension must close the whole path: "a.jpg?x=1" is not an image. */
const IMAGE_PATH_RE = /\.(jpg|gif|png)$/i;

export function isImagePath(path: string): boolean {
    return IMAGE_PATH_RE.test(path);
}

export function classifyImages(records: readonly LogRecord[]): ImageSummary {
    let count = 0;
    for (const record of records) {
        if (isImagePath(record.path)) count++;
    }
    const total = records.length;
    return {
        count,
        total,
        percentage: total > 0 ? (count / total) * 100 : 0
    };
}
