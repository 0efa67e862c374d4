import { describePatternInline } from "./describePatternInline";
import type { DisplayRule } from "./DisplayRule";

export function describeRule(rule: DisplayRule): string {
    return `${rule.mode}(${describePatternInline(rule.pattern)})`;
}
