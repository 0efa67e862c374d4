import type { PhysicalMonitor } from "./PhysicalMonitor";

export interface ClassifiedMonitors {
    internal: PhysicalMonitor[];
    external: PhysicalMonitor[];
    all: PhysicalMonitor[];
}
