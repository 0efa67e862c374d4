import { patternFields } from "./PatternField";
import type { MonitorPattern } from "./MonitorPattern";
import type { PatternField } from "./PatternField";

export function describePatternInline(pattern: MonitorPattern): string {
    const parts = patternFields
        .filter((field: PatternField) => pattern[field] !== undefined)
        .map((field: PatternField) => `${field}=${pattern[field]}`);
    return parts.length > 0 ? parts.join(", ") : "default";
}
