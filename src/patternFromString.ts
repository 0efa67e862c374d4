import { patternFields } from "./PatternField";
import type { MonitorPattern } from "./MonitorPattern";
import type { PatternField } from "./PatternField";

function isPatternField(value: string): value is PatternField {
    return patternFields.some((field: PatternField) => field === value);
}

/**
 * Parses "field=value" (e.g. "connector=DP-6", "product=Acer") into a single-field pattern.
 * Anything else, including an unknown field, becomes a name filter holding the whole input.
 * Never throws.
 */
export function patternFromString(input: string): MonitorPattern {
    const separator = input.indexOf("=");
    if (separator === -1) {
        return { name: input };
    }

    const field = input.slice(0, separator).trim();
    const value = input.slice(separator + 1).trim();

    if (!isPatternField(field)) {
        return { name: input };
    }

    const pattern: MonitorPattern = {};
    pattern[field] = value;
    return pattern;
}
