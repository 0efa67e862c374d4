import { createPromise } from "./createPromise";
import { takeLogFile } from "./logFile";

/** Resolves once every queued line has reached the log file. */
export function closeLogger(): Promise<void> {
    const stream = takeLogFile();
    const closed = createPromise<void>();
    if (!stream) {
        closed.resolve();
        return closed.promise;
    }
    stream.end((): void => {
        closed.resolve();
    });
    return closed.promise;
}
