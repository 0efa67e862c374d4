import type { PhysicalMonitor } from "./PhysicalMonitor";

/**
 * Identity of the connected monitors. Mode and is-current changes (including the ones caused
 * by applying a layout) leave it unchanged; plugging or unplugging a monitor does not.
 */
export function topologyOf(monitors: readonly PhysicalMonitor[]): string {
    return JSON.stringify(
        monitors.map((monitor: PhysicalMonitor) => [monitor.connector, monitor.vendor, monitor.product, monitor.serial])
    );
}
