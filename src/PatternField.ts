import type { MonitorPattern } from "./MonitorPattern";

export type PatternField = keyof MonitorPattern;

export const patternFields: readonly PatternField[] = ["connector", "vendor", "product", "serial", "name"];
