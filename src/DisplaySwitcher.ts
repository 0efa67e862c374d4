import { DisplayError } from "./DisplayError";
import { classifyMonitors } from "./classifyMonitors";
import { createPromise } from "./createPromise";
import { debug } from "./debug";
import { error } from "./error";
import { formatPlannedLayout } from "./formatPlannedLayout";
import { isConnectionBreaking } from "./isConnectionBreaking";
import { isResolutionError } from "./isResolutionError";
import { isRetryable } from "./isRetryable";
import { log } from "./log";
import { modeBanner } from "./modeBanner";
import { monitorsForMode } from "./monitorsForMode";
import { resolveDisplayMode } from "./resolveDisplayMode";
import { synthesizeLayout } from "./synthesizeLayout";
import { topologyOf } from "./topologyOf";
import { verbose } from "./verbose";
import { verifyAppliedConfig } from "./verifyAppliedConfig";
import { withRetry } from "./withRetry";
import type { ApplyOutcome } from "./ApplyOutcome";
import type { CurrentState } from "./CurrentState";
import type { DisplayConfigEvent } from "./DisplayConfigEvent";
import type { DisplayConfigService } from "./DisplayConfigService";
import type { DisplayRule } from "./DisplayRule";
import type { DisplaySwitcherOptions } from "./DisplaySwitcherOptions";
import type { PromiseData } from "./PromiseData";

const WATCHING = "\nWatching for monitor configuration changes... (Press Ctrl+C to exit)\n";

export class DisplaySwitcher {
    #service: DisplayConfigService;
    #options: DisplaySwitcherOptions;
    #topology: string | null = null;
    #unsubscribe: (() => void) | null = null;
    #watch: PromiseData<void> | null = null;
    #busy = false;
    #pending = false;

    constructor(service: DisplayConfigService, options: DisplaySwitcherOptions) {
        this.#service = service;
        this.#options = options;
    }

    get isWatching(): boolean {
        return this.#watch !== null;
    }

    /**
     * Resolves the rules against the current monitors and applies the resulting layout.
     * Bus failures, compositor rejections and failed verification retry the whole cycle on a
     * fresh snapshot.
     */
    async applyRules(rules: readonly DisplayRule[], snapshot?: CurrentState): Promise<ApplyOutcome> {
        let initial = snapshot;
        return withRetry(
            async (attempt: number): Promise<ApplyOutcome> => {
                const state = initial ?? (await this.#service.getCurrentState());
                initial = undefined;
                verbose(`Apply attempt ${attempt} with serial ${state.serial}`);
                return this.#applyTo(rules, state);
            },
            {
                attempts: this.#options.attempts,
                delayMs: this.#options.retryDelayMs,
                label: "Applying monitor configuration",
                isRetryable,
                sleep: this.#options.sleep
            }
        );
    }

    /**
     * Applies the rules now and again whenever the set of connected monitors changes. Resolves
     * when stop() is called; rejects when the connection to the compositor breaks.
     */
    async watch(rules: readonly DisplayRule[]): Promise<void> {
        if (this.#watch) {
            throw new Error("Already watching");
        }

        const watch = createPromise<void>();
        this.#watch = watch;
        this.#unsubscribe = this.#service.subscribe((event: DisplayConfigEvent): void => {
            this.#onEvent(rules, event);
        });

        this.#busy = true;
        this.#drain(rules, true).catch((err: unknown) => {
            this.#finish(err);
        });

        return watch.promise;
    }

    stop(): void {
        this.#finish();
    }

    async #applyTo(rules: readonly DisplayRule[], state: CurrentState): Promise<ApplyOutcome> {
        this.#topology = topologyOf(state.monitors);

        const mode = resolveDisplayMode(rules, state.monitors);
        const layout = synthesizeLayout(mode, monitorsForMode(mode, classifyMonitors(state.monitors)));
        log(modeBanner(mode, this.#options.dryRun));

        if (this.#options.dryRun) {
            log("[DRY RUN] Would apply the following configuration:");
            for (const line of formatPlannedLayout(layout, state.monitors)) {
                log(line);
            }
            log("[DRY RUN] No changes were made");
            return "dry-run";
        }

        if (verifyAppliedConfig(state, layout)) {
            log("Monitor configuration is already active");
            return "unchanged";
        }

        const reply = await this.#service.applyMonitorsConfig(state.serial, this.#options.method, layout);
        const applied = await this.#service.getCurrentState();
        this.#topology = topologyOf(applied.monitors);
        if (!verifyAppliedConfig(applied, layout)) {
            throw new DisplayError({ kind: "failed-verification", reply });
        }

        log("Monitor configuration applied successfully!");
        return "applied";
    }

    #onEvent(rules: readonly DisplayRule[], event: DisplayConfigEvent): void {
        if (event.type === "disconnected") {
            this.#finish(new DisplayError({ kind: "transport", operation: "watching MonitorsChanged", cause: event.error }));
            return;
        }

        // Coalesce notifications that arrive while a cycle runs into one follow-up cycle
        if (this.#busy) {
            this.#pending = true;
            return;
        }
        this.#busy = true;
        this.#drain(rules, false).catch((err: unknown) => {
            this.#finish(err);
        });
    }

    async #drain(rules: readonly DisplayRule[], initial: boolean): Promise<void> {
        try {
            let first = initial;
            do {
                this.#pending = false;
                await this.#cycle(rules, first);
                first = false;
            } while (this.#pending && this.#watch);
        } finally {
            this.#busy = false;
        }
    }

    async #cycle(rules: readonly DisplayRule[], initial: boolean): Promise<void> {
        try {
            const state = await this.#service.getCurrentState();
            if (!initial) {
                if (topologyOf(state.monitors) === this.#topology) {
                    debug("Monitor notification without topology change, ignoring");
                    return;
                }
                log("Monitor configuration changed!");
            }
            await this.applyRules(rules, state);
        } catch (err: unknown) {
            if (isConnectionBreaking(err)) {
                throw err;
            }
            const message = err instanceof Error ? err.message : String(err);
            if (initial) {
                if (isResolutionError(err)) {
                    log("Waiting for matching monitors to be connected...");
                } else {
                    error(`Initial configuration failed: ${message}`);
                }
            } else if (isResolutionError(err)) {
                log(`No display configuration applied: ${message}`);
            } else {
                error(`Failed to apply display configuration: ${message}`);
            }
        }

        if (this.#watch) {
            log(WATCHING);
            if (this.#options.dryRun) {
                log("[DRY RUN] No actual changes will be made");
            }
        }
    }

    #finish(err?: unknown): void {
        const watch = this.#watch;
        if (!watch) {
            return;
        }
        this.#watch = null;
        this.#unsubscribe?.();
        this.#unsubscribe = null;
        if (err === undefined) {
            watch.resolve();
        } else {
            watch.reject(err);
        }
    }
}
