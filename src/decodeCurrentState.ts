import { CurrentStateTupleSchema } from "./CurrentStateTupleSchema";
import { DisplayError } from "./DisplayError";
import { propertyAs } from "./propertyAs";
import { z } from "zod";
import type { ConnectorInfo } from "./ConnectorInfo";
import type { ConnectorTuple, LogicalMonitorTuple, ModeTuple, MonitorTuple } from "./CurrentStateTuple";
import type { CurrentLogicalMonitor } from "./CurrentLogicalMonitor";
import type { CurrentState } from "./CurrentState";
import type { Mode } from "./Mode";
import type { PhysicalMonitor } from "./PhysicalMonitor";

function decodeConnector([connector, vendor, product, serial]: ConnectorTuple): ConnectorInfo {
    return { connector, vendor, product, serial };
}

function decodeMode([id, width, height, refreshRate, preferredScale, supportedScales, properties]: ModeTuple): Mode {
    return {
        id,
        width,
        height,
        refreshRate,
        isCurrent: propertyAs(properties, "is-current", z.boolean()) ?? false,
        isPreferred: propertyAs(properties, "is-preferred", z.boolean()) ?? false,
        preferredScale,
        supportedScales
    };
}

function decodeMonitor([connectorTuple, modes, properties]: MonitorTuple): PhysicalMonitor {
    return {
        ...decodeConnector(connectorTuple),
        isBuiltin: propertyAs(properties, "is-builtin", z.boolean()) ?? false,
        isUnderscanning: propertyAs(properties, "is-underscanning", z.boolean()) ?? false,
        minRefreshRate: propertyAs(properties, "min-refresh-rate", z.number()) ?? null,
        displayName: propertyAs(properties, "display-name", z.string()) ?? "",
        modes: modes.map(decodeMode)
    };
}

function decodeLogicalMonitor([x, y, scale, transform, primary, monitors]: LogicalMonitorTuple): CurrentLogicalMonitor {
    return {
        x,
        y,
        scale,
        transform,
        primary,
        assignedMonitors: monitors.map(decodeConnector)
    };
}

/**
 * Turns the positional GetCurrentState reply into named records.
 */
export function decodeCurrentState(reply: unknown): CurrentState {
    const parsed = CurrentStateTupleSchema.safeParse(reply);
    if (!parsed.success) {
        throw new DisplayError({ kind: "transport", operation: "GetCurrentState (malformed reply)", cause: parsed.error });
    }

    const [serial, monitors, logicalMonitors, properties] = parsed.data;
    return {
        serial,
        monitors: monitors.map(decodeMonitor),
        logicalMonitors: logicalMonitors.map(decodeLogicalMonitor),
        properties
    };
}
