import type { DisplayMode } from "./DisplayMode";
import type { DisplayRule } from "./DisplayRule";
import type { MonitorPattern } from "./MonitorPattern";

export type DisplayErrorDetail =
    // Reserved: patternFromString is total and never produces it
    | { kind: "invalid-pattern"; pattern: string }
    | { kind: "max-attempts"; attempts: number; label: string; lastError: unknown }
    | { kind: "no-monitors-available"; mode: DisplayMode }
    | { kind: "filter-mismatch"; mode: DisplayMode; pattern: MonitorPattern }
    | { kind: "insufficient-monitors"; available: number; required: number; mode: DisplayMode }
    | { kind: "no-common-resolutions" }
    | { kind: "no-monitors-match"; rules: readonly DisplayRule[] }
    | { kind: "no-valid-configuration" }
    | { kind: "failed-verification"; reply: unknown }
    | { kind: "unsupported-desktop"; desktop: string }
    | { kind: "rejected"; operation: string; name: string; cause: unknown }
    | { kind: "transport"; operation: string; cause: unknown };

export type DisplayErrorKind = DisplayErrorDetail["kind"];
