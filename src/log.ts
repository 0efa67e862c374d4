import { LogLevel } from "./LogLevel";
import { doLog } from "./doLog";

// User-facing output such as status reports and dry-run plans goes through here
export function log(...args: unknown[]): void {
    doLog(LogLevel.Log, args);
}
