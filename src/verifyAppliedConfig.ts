import type { ApplyLogicalMonitor } from "./ApplyLogicalMonitor";
import type { ConnectorInfo } from "./ConnectorInfo";
import type { CurrentLogicalMonitor } from "./CurrentLogicalMonitor";
import type { CurrentState } from "./CurrentState";
import type { Mode } from "./Mode";
import type { MonitorAssignment } from "./MonitorAssignment";
import type { PhysicalMonitor } from "./PhysicalMonitor";

const SCALE_TOLERANCE = 0.001;

function isModeActive(state: CurrentState, assignment: MonitorAssignment): boolean {
    const monitor = state.monitors.find((candidate: PhysicalMonitor) => candidate.connector === assignment.connector);
    return monitor?.modes.some((mode: Mode) => mode.id === assignment.modeId && mode.isCurrent) ?? false;
}

function reflects(state: CurrentState, current: CurrentLogicalMonitor, intended: ApplyLogicalMonitor): boolean {
    return (
        current.x === intended.x &&
        current.y === intended.y &&
        Math.abs(current.scale - intended.scale) < SCALE_TOLERANCE &&
        current.transform === intended.transform &&
        current.primary === intended.primary &&
        current.assignedMonitors.length === intended.assignedMonitors.length &&
        intended.assignedMonitors.every(
            (assignment: MonitorAssignment) =>
                current.assignedMonitors.some((info: ConnectorInfo) => info.connector === assignment.connector) &&
                isModeActive(state, assignment)
        )
    );
}

/**
 * True when the compositor's state reflects every intended logical monitor. Matching is
 * existential, so the compositor may report logical monitors in any order.
 */
export function verifyAppliedConfig(state: CurrentState, intended: readonly ApplyLogicalMonitor[]): boolean {
    if (state.logicalMonitors.length !== intended.length) {
        return false;
    }

    return intended.every((logical: ApplyLogicalMonitor) =>
        state.logicalMonitors.some((current: CurrentLogicalMonitor) => reflects(state, current, logical))
    );
}
