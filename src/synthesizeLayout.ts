import { buildJoinedLayout } from "./buildJoinedLayout";
import { buildMirroredLayout } from "./buildMirroredLayout";
import type { ApplyLogicalMonitor } from "./ApplyLogicalMonitor";
import type { DisplayMode } from "./DisplayMode";
import type { PhysicalMonitor } from "./PhysicalMonitor";

export function synthesizeLayout(mode: DisplayMode, monitors: readonly PhysicalMonitor[]): ApplyLogicalMonitor[] {
    return mode === "mirror" ? buildMirroredLayout(monitors) : buildJoinedLayout(monitors);
}
