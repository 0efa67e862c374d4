import type { ApplyLogicalMonitor } from "./ApplyLogicalMonitor";
import type { ApplyMethod } from "./ApplyMethod";
import type { CurrentState } from "./CurrentState";
import type { DisplayConfigEvent } from "./DisplayConfigEvent";

/**
 * The compositor's DisplayConfig service as the switcher sees it. Error replies reject with a
 * "rejected" DisplayError, lost connections with a "transport" one.
 */
export interface DisplayConfigService {
    getCurrentState(): Promise<CurrentState>;
    applyMonitorsConfig(
        serial: number,
        method: ApplyMethod,
        logicalMonitors: readonly ApplyLogicalMonitor[]
    ): Promise<unknown>;
    /** Returns a function that removes the listener. */
    subscribe(listener: (event: DisplayConfigEvent) => void): () => void;
    close(): void;
}
