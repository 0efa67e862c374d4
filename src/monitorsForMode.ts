import type { ClassifiedMonitors } from "./ClassifiedMonitors";
import type { DisplayMode } from "./DisplayMode";
import type { PhysicalMonitor } from "./PhysicalMonitor";

export function monitorsForMode(mode: DisplayMode, classified: ClassifiedMonitors): PhysicalMonitor[] {
    switch (mode) {
        case "external":
            return classified.external;
        case "internal":
            return classified.internal;
        case "join":
        case "mirror":
            return classified.all;
    }
}
