import type { DisplayMode } from "./DisplayMode";
import type { MonitorPattern } from "./MonitorPattern";

export interface DisplayRule {
    mode: DisplayMode;
    pattern: MonitorPattern;
}
