import { formatAssignedMonitor } from "./formatAssignedMonitor";
import { formatLogicalMonitor } from "./formatLogicalMonitor";
import type { ApplyLogicalMonitor } from "./ApplyLogicalMonitor";
import type { Mode } from "./Mode";
import type { MonitorAssignment } from "./MonitorAssignment";
import type { PhysicalMonitor } from "./PhysicalMonitor";

export function formatPlannedLayout(
    layout: readonly ApplyLogicalMonitor[],
    monitors: readonly PhysicalMonitor[]
): string[] {
    return layout.flatMap((logical: ApplyLogicalMonitor, index: number) =>
        formatLogicalMonitor(
            index,
            logical,
            logical.assignedMonitors.map((assignment: MonitorAssignment) =>
                formatAssignedMonitor(assignment.connector, monitors, (mode: Mode) => mode.id === assignment.modeId)
            )
        )
    );
}
