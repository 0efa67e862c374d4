import type { ApplyMethod } from "./ApplyMethod";

export interface DisplaySwitcherOptions {
    dryRun: boolean;
    method: ApplyMethod;
    /** Resolve/apply/verify cycles before giving up */
    attempts: number;
    retryDelayMs: number;
    sleep?: (ms: number) => Promise<void>;
}
