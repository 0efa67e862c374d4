import { DisplayError } from "./DisplayError";
import { debug } from "./debug";
import { findCommonResolutions } from "./findCommonResolutions";
import type { ApplyLogicalMonitor } from "./ApplyLogicalMonitor";
import type { Mode } from "./Mode";
import type { MonitorAssignment } from "./MonitorAssignment";
import type { PhysicalMonitor } from "./PhysicalMonitor";
import type { Resolution } from "./Resolution";

function modesAt(monitor: PhysicalMonitor, resolution: Resolution): Mode[] {
    return monitor.modes.filter((mode: Mode) => mode.width === resolution.width && mode.height === resolution.height);
}

// First mode wins ties; NaN never compares greater, so it never replaces a candidate
function fastestMode(modes: readonly Mode[]): Mode | undefined {
    let best: Mode | undefined;
    for (const mode of modes) {
        if (best === undefined || mode.refreshRate > best.refreshRate) {
            best = mode;
        }
    }
    return best;
}

export function buildMirroredLayout(monitors: readonly PhysicalMonitor[]): ApplyLogicalMonitor[] {
    // The first external monitor, if any, picks the resolution
    const reference = monitors.find((monitor: PhysicalMonitor) => !monitor.isBuiltin) ?? monitors[0];
    if (!reference) {
        throw new DisplayError({ kind: "no-monitors-available", mode: "mirror" });
    }

    const [resolution] = findCommonResolutions(reference, monitors);
    if (!resolution) {
        throw new DisplayError({ kind: "no-common-resolutions" });
    }

    debug(`Using highest common resolution for mirroring: ${resolution.width}x${resolution.height}`);

    const assignedMonitors: MonitorAssignment[] = [];
    for (const monitor of monitors) {
        const mode = fastestMode(modesAt(monitor, resolution));
        if (!mode) {
            throw new DisplayError({ kind: "no-common-resolutions" });
        }
        assignedMonitors.push({ connector: monitor.connector, modeId: mode.id, properties: {} });
    }

    // Never mirror below scale 1
    const referenceMode = modesAt(reference, resolution)[0];
    const scale = Math.max(referenceMode?.preferredScale ?? 1, 1);

    return [
        {
            x: 0,
            y: 0,
            scale,
            transform: 0,
            primary: true,
            assignedMonitors
        }
    ];
}
