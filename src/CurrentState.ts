import type { CurrentLogicalMonitor } from "./CurrentLogicalMonitor";
import type { PhysicalMonitor } from "./PhysicalMonitor";
import type { PropertyMap } from "./PropertyMap";

export interface CurrentState {
    /** Echoed back unchanged when applying, so the compositor can reject stale writes. */
    readonly serial: number;
    readonly monitors: readonly PhysicalMonitor[];
    readonly logicalMonitors: readonly CurrentLogicalMonitor[];
    readonly properties: PropertyMap;
}
