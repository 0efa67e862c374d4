import type { PropertyMap } from "./PropertyMap";

// (ssa{sv}): connector, mode id, properties
export type MonitorAssignmentTuple = [string, string, PropertyMap];

// (iiduba(ssa{sv})): x, y, scale, transform, primary, monitors
export type ApplyLogicalMonitorTuple = [number, number, number, number, boolean, MonitorAssignmentTuple[]];
