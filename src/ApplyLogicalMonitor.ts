import type { MonitorAssignment } from "./MonitorAssignment";

export interface ApplyLogicalMonitor {
    readonly x: number;
    readonly y: number;
    readonly scale: number;
    // Always 0 (normal); rotation is never requested
    readonly transform: number;
    readonly primary: boolean;
    readonly assignedMonitors: readonly MonitorAssignment[];
}
