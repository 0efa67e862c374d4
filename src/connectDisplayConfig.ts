import { DisplayConfigProxy } from "./DisplayConfigProxy";
import { isRetryable } from "./isRetryable";
import { withRetry } from "./withRetry";
import type { BusConfig } from "./BusConfig";

export function connectDisplayConfig(
    busConfig: BusConfig,
    attempts: number,
    delayMs: number
): Promise<DisplayConfigProxy> {
    return withRetry(() => DisplayConfigProxy.connect(busConfig), {
        attempts,
        delayMs,
        label: `Connecting to ${busConfig.service}`,
        isRetryable
    });
}
