import { patternFields } from "./PatternField";
import type { MonitorPattern } from "./MonitorPattern";

export function isEmptyPattern(pattern: MonitorPattern): boolean {
    return patternFields.every((field: keyof MonitorPattern) => pattern[field] === undefined);
}
