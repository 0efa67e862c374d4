import type { ApplyLogicalMonitor } from "./ApplyLogicalMonitor";
import type { ApplyLogicalMonitorTuple, MonitorAssignmentTuple } from "./ApplyLogicalMonitorTuple";
import type { MonitorAssignment } from "./MonitorAssignment";

export function encodeLogicalMonitors(logicalMonitors: readonly ApplyLogicalMonitor[]): ApplyLogicalMonitorTuple[] {
    return logicalMonitors.map((logical: ApplyLogicalMonitor): ApplyLogicalMonitorTuple => [
        logical.x,
        logical.y,
        logical.scale,
        logical.transform,
        logical.primary,
        logical.assignedMonitors.map(
            (assignment: MonitorAssignment): MonitorAssignmentTuple => [
                assignment.connector,
                assignment.modeId,
                { ...assignment.properties }
            ]
        )
    ]);
}
