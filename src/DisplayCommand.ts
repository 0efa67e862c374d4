import type { DisplayMode } from "./DisplayMode";
import type { MonitorPattern } from "./MonitorPattern";

export interface StatusCommand {
    kind: "status";
    modes: boolean;
}

export interface TestCommand {
    kind: "test";
    pattern: MonitorPattern;
}

export interface ModeCommand {
    kind: "mode";
    mode: DisplayMode;
    pattern: MonitorPattern;
}

export interface AutoCommand {
    kind: "auto";
    /** Descriptive name for the rule set, only used in log output */
    name: string | null;
    external: string[];
    internal: string[];
    join: string[];
    mirror: string[];
    defaultMode: DisplayMode;
}

export type RuleCommand = ModeCommand | AutoCommand;

export type DisplayCommand = StatusCommand | TestCommand | RuleCommand;
