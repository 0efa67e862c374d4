import { formatMode } from "./formatMode";
import type { Mode } from "./Mode";
import type { PhysicalMonitor } from "./PhysicalMonitor";

export function formatAssignedMonitor(
    connector: string,
    monitors: readonly PhysicalMonitor[],
    isMode: (mode: Mode) => boolean
): string {
    const monitor = monitors.find((candidate: PhysicalMonitor) => candidate.connector === connector);
    if (!monitor) {
        return `       - ${connector} (Unknown)`;
    }
    const mode = monitor.modes.find(isMode);
    return `       - ${connector} (${monitor.displayName}) ${mode ? formatMode(mode) : "unknown mode"}`;
}
