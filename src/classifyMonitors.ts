import type { ClassifiedMonitors } from "./ClassifiedMonitors";
import type { PhysicalMonitor } from "./PhysicalMonitor";

export function classifyMonitors(monitors: readonly PhysicalMonitor[]): ClassifiedMonitors {
    const internal: PhysicalMonitor[] = [];
    const external: PhysicalMonitor[] = [];
    for (const monitor of monitors) {
        if (monitor.isBuiltin) {
            internal.push(monitor);
        } else {
            external.push(monitor);
        }
    }
    return { internal, external, all: [...monitors] };
}
