import { classifyMonitors } from "./classifyMonitors";
import { formatAssignedMonitor } from "./formatAssignedMonitor";
import { formatLogicalMonitor } from "./formatLogicalMonitor";
import { formatMode } from "./formatMode";
import { formatModes } from "./formatModes";
import type { ConnectorInfo } from "./ConnectorInfo";
import type { CurrentLogicalMonitor } from "./CurrentLogicalMonitor";
import type { CurrentState } from "./CurrentState";
import type { Mode } from "./Mode";
import type { PhysicalMonitor } from "./PhysicalMonitor";

function formatMonitor(index: number, monitor: PhysicalMonitor, showModes: boolean): string[] {
    const current = monitor.modes.find((mode: Mode) => mode.isCurrent);
    const lines = [
        `  ${index + 1}. ${monitor.displayName}`,
        `     Connector: ${monitor.connector}`,
        `     Vendor: ${monitor.vendor}`,
        `     Product: ${monitor.product}`,
        `     Serial: ${monitor.serial}`,
        `     Current Mode: ${current ? formatMode(current) : "disabled"}`
    ];
    if (monitor.isUnderscanning) {
        lines.push("     Underscanning: true");
    }
    if (showModes) {
        lines.push(...formatModes(monitor));
    }
    return lines;
}

function formatGroup(title: string, monitors: PhysicalMonitor[], showModes: boolean): string[] {
    return [
        `${title}: ${monitors.length}`,
        ...monitors.flatMap((monitor: PhysicalMonitor, index: number) => formatMonitor(index, monitor, showModes))
    ];
}

export function formatStatus(state: CurrentState, showModes: boolean): string[] {
    const { internal, external } = classifyMonitors(state.monitors);

    return [
        "=== Current Monitor Status ===",
        ...formatGroup("Internal Monitors", internal, showModes),
        "",
        ...formatGroup("External Monitors", external, showModes),
        "",
        `Logical Monitors: ${state.logicalMonitors.length}`,
        ...state.logicalMonitors.flatMap((logical: CurrentLogicalMonitor, index: number) =>
            formatLogicalMonitor(
                index,
                logical,
                logical.assignedMonitors.map((info: ConnectorInfo) =>
                    formatAssignedMonitor(info.connector, state.monitors, (mode: Mode) => mode.isCurrent)
                )
            )
        )
    ];
}
