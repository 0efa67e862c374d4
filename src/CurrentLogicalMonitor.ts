import type { ConnectorInfo } from "./ConnectorInfo";

export interface CurrentLogicalMonitor {
    readonly x: number;
    readonly y: number;
    readonly scale: number;
    readonly transform: number;
    readonly primary: boolean;
    readonly assignedMonitors: readonly ConnectorInfo[];
}
