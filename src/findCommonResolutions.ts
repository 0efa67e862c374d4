import type { Mode } from "./Mode";
import type { PhysicalMonitor } from "./PhysicalMonitor";
import type { Resolution } from "./Resolution";

function hasResolution(monitor: PhysicalMonitor, resolution: Resolution): boolean {
    return monitor.modes.some((mode: Mode) => mode.width === resolution.width && mode.height === resolution.height);
}

/**
 * Resolutions of the reference monitor that every monitor offers, largest pixel count first.
 * Refresh rates are ignored. The sort is stable, so equal pixel counts keep the reference
 * monitor's mode order.
 */
export function findCommonResolutions(reference: PhysicalMonitor, monitors: readonly PhysicalMonitor[]): Resolution[] {
    const common: Resolution[] = [];
    for (const mode of reference.modes) {
        const resolution: Resolution = { width: mode.width, height: mode.height };
        const seen = common.some(
            (other: Resolution) => other.width === resolution.width && other.height === resolution.height
        );
        if (seen) {
            continue;
        }
        if (monitors.every((monitor: PhysicalMonitor) => hasResolution(monitor, resolution))) {
            common.push(resolution);
        }
    }

    return common.sort((a: Resolution, b: Resolution) => b.width * b.height - a.width * a.height);
}
