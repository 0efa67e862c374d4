import { createWriteStream } from "fs";
import type { WriteStream } from "fs";

let logStream: WriteStream | undefined;

/** Appends every subsequent log line to `filePath`, replacing any earlier log file. */
export function setLogFile(filePath: string): void {
    logStream?.end();
    const stream = createWriteStream(filePath, { flags: "a", encoding: "utf8" });
    stream.on("error", (err: Error): void => {
        console.error(`Cannot write log file ${filePath}: ${err.message}`);
        if (logStream === stream) {
            logStream = undefined;
        }
    });
    logStream = stream;
}

export function getLogFile(): WriteStream | undefined {
    return logStream;
}

/** Detaches the current log file so no further lines are queued on it. */
export function takeLogFile(): WriteStream | undefined {
    const stream = logStream;
    logStream = undefined;
    return stream;
}
