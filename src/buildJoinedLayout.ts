import { DisplayError } from "./DisplayError";
import { preferredModeOf } from "./preferredModeOf";
import type { ApplyLogicalMonitor } from "./ApplyLogicalMonitor";
import type { PhysicalMonitor } from "./PhysicalMonitor";

/**
 * One logical monitor per physical monitor, left to right along y = 0. Each advances the next
 * position by its width in logical pixels, so a 3840 wide panel at scale 2 occupies 1920.
 */
export function buildJoinedLayout(monitors: readonly PhysicalMonitor[]): ApplyLogicalMonitor[] {
    const logicalMonitors: ApplyLogicalMonitor[] = [];
    let currentX = 0;

    for (const monitor of monitors) {
        const mode = preferredModeOf(monitor);
        if (!mode) {
            continue;
        }

        logicalMonitors.push({
            x: currentX,
            y: 0,
            scale: mode.preferredScale,
            transform: 0,
            primary: logicalMonitors.length === 0,
            assignedMonitors: [{ connector: monitor.connector, modeId: mode.id, properties: {} }]
        });

        currentX += Math.round(mode.width / mode.preferredScale);
    }

    if (logicalMonitors.length === 0) {
        throw new DisplayError({ kind: "no-valid-configuration" });
    }

    return logicalMonitors;
}
