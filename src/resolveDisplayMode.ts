import { DisplayError } from "./DisplayError";
import { classifyMonitors } from "./classifyMonitors";
import { isEmptyPattern } from "./isEmptyPattern";
import { matchesPattern } from "./matchesPattern";
import { monitorsForMode } from "./monitorsForMode";
import type { ClassifiedMonitors } from "./ClassifiedMonitors";
import type { DisplayMode } from "./DisplayMode";
import type { DisplayRule } from "./DisplayRule";
import type { PhysicalMonitor } from "./PhysicalMonitor";

const REQUIRED_MONITOR_TYPES = 2;

function needsBothTypes(mode: DisplayMode): boolean {
    return mode === "join" || mode === "mirror";
}

function availableTypes(classified: ClassifiedMonitors): number {
    return (classified.internal.length > 0 ? 1 : 0) + (classified.external.length > 0 ? 1 : 0);
}

function isAvailable(mode: DisplayMode, classified: ClassifiedMonitors): boolean {
    if (needsBothTypes(mode)) {
        return availableTypes(classified) === REQUIRED_MONITOR_TYPES;
    }
    return monitorsForMode(mode, classified).length > 0;
}

function resolveSingleRule(rule: DisplayRule, classified: ClassifiedMonitors): DisplayMode {
    const candidates = monitorsForMode(rule.mode, classified);
    if (candidates.length === 0) {
        throw new DisplayError({ kind: "no-monitors-available", mode: rule.mode });
    }

    if (!isEmptyPattern(rule.pattern)) {
        const hasMatch = candidates.some((monitor: PhysicalMonitor) => matchesPattern(rule.pattern, monitor));
        if (!hasMatch) {
            throw new DisplayError({ kind: "filter-mismatch", mode: rule.mode, pattern: rule.pattern });
        }
    }

    const available = availableTypes(classified);
    if (needsBothTypes(rule.mode) && available < REQUIRED_MONITOR_TYPES) {
        throw new DisplayError({
            kind: "insufficient-monitors",
            available,
            required: REQUIRED_MONITOR_TYPES,
            mode: rule.mode
        });
    }

    return rule.mode;
}

function ruleFires(rule: DisplayRule, classified: ClassifiedMonitors): boolean {
    if (isEmptyPattern(rule.pattern)) {
        return isAvailable(rule.mode, classified);
    }

    const candidates = monitorsForMode(rule.mode, classified);
    if (candidates.length === 0) {
        return false;
    }
    if (!candidates.some((monitor: PhysicalMonitor) => matchesPattern(rule.pattern, monitor))) {
        return false;
    }
    return !needsBothTypes(rule.mode) || availableTypes(classified) === REQUIRED_MONITOR_TYPES;
}

/**
 * Picks the display mode for the connected monitors.
 *
 * With no rules the external monitors win when present. A single rule is an explicit command
 * and fails with the specific constraint it violates. Several rules form a cascade where the
 * first rule that fires wins and exhaustion raises "no-monitors-match".
 */
export function resolveDisplayMode(rules: readonly DisplayRule[], monitors: readonly PhysicalMonitor[]): DisplayMode {
    const classified = classifyMonitors(monitors);

    const [first] = rules;
    if (first === undefined) {
        return classified.external.length > 0 ? "external" : "internal";
    }

    if (rules.length === 1) {
        return resolveSingleRule(first, classified);
    }

    const fired = rules.find((rule: DisplayRule) => ruleFires(rule, classified));
    if (fired === undefined) {
        throw new DisplayError({ kind: "no-monitors-match", rules });
    }
    return fired.mode;
}
