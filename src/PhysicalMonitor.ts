import type { ConnectorInfo } from "./ConnectorInfo";
import type { Mode } from "./Mode";

export interface PhysicalMonitor extends ConnectorInfo {
    readonly isBuiltin: boolean;
    readonly isUnderscanning: boolean;
    readonly minRefreshRate: number | null;
    readonly displayName: string;
    // Compositor order, not sorted
    readonly modes: readonly Mode[];
}
