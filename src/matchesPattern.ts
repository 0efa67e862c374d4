import { isEmptyPattern } from "./isEmptyPattern";
import type { MonitorPattern } from "./MonitorPattern";
import type { PhysicalMonitor } from "./PhysicalMonitor";

function exact(expected: string | undefined, actual: string): boolean {
    return expected === undefined || actual === expected;
}

function contains(expected: string | undefined, actual: string): boolean {
    return expected === undefined || actual.includes(expected);
}

export function matchesPattern(pattern: MonitorPattern, monitor: PhysicalMonitor): boolean {
    // An empty pattern is a default rule and matches every monitor
    if (isEmptyPattern(pattern)) {
        return true;
    }

    return (
        exact(pattern.connector, monitor.connector) &&
        exact(pattern.vendor, monitor.vendor) &&
        contains(pattern.product, monitor.product) &&
        contains(pattern.serial, monitor.serial) &&
        contains(pattern.name, monitor.displayName)
    );
}
