import { LogLevel } from "./LogLevel";
import { format } from "util";
import { getConsoleLevel } from "./consoleLevel";
import { getLogFile } from "./logFile";

function levelName(level: LogLevel): string {
    switch (level) {
        case LogLevel.Verbose:
            return "VERBOSE";
        case LogLevel.Debug:
            return "DEBUG";
        case LogLevel.Log:
            return "INFO";
        case LogLevel.Error:
            return "ERROR";
        case LogLevel.Silent:
            return "SILENT";
    }
}

function formatLine(level: LogLevel, args: readonly unknown[]): string {
    return `[${new Date().toISOString()}] [${levelName(level)}] ${format(...args)}`;
}

/**
 * The log file receives every level; the console only levels at or above the console
 * threshold, errors on stderr.
 */
export function doLog(level: LogLevel, args: readonly unknown[]): void {
    getLogFile()?.write(formatLine(level, args) + "\n");

    if (level < getConsoleLevel()) {
        return;
    }
    if (level === LogLevel.Error) {
        console.error(...args);
    } else {
        console.log(...args);
    }
}
