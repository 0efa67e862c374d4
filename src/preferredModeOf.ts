import type { Mode } from "./Mode";
import type { PhysicalMonitor } from "./PhysicalMonitor";

// The flagged preferred mode, else the first in compositor order
export function preferredModeOf(monitor: PhysicalMonitor): Mode | undefined {
    return monitor.modes.find((mode: Mode) => mode.isPreferred) ?? monitor.modes[0];
}
