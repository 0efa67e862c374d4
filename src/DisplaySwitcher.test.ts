import { ApplyMethod } from "./ApplyMethod";
import { DisplayError } from "./DisplayError";
import { DisplaySwitcher } from "./DisplaySwitcher";
import { FakeDisplayConfig } from "./test/FakeDisplayConfig";
import { LogLevel } from "./LogLevel";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { makeMode } from "./test/makeMode";
import { makeMonitor } from "./test/makeMonitor";
import { makeState } from "./test/makeState";
import { setConsoleLevel } from "./consoleLevel";
import type { AppliedCall } from "./test/FakeDisplayConfig";
import type { DisplayRule } from "./DisplayRule";
import type { DisplaySwitcherOptions } from "./DisplaySwitcherOptions";

const laptop = makeMonitor("eDP-1", {
    isBuiltin: true,
    displayName: "Built-in display",
    modes: [
        makeMode(2560, 1600, 60, { isCurrent: true, isPreferred: true, preferredScale: 2 }),
        makeMode(1920, 1080, 60)
    ]
});
const external = makeMonitor("DP-1", {
    displayName: "Dell Inc. 27\"",
    modes: [makeMode(1920, 1080, 60, { isPreferred: true })]
});
const projector = makeMonitor("HDMI-1", {
    displayName: "Projector",
    modes: [makeMode(1280, 720, 60, { isPreferred: true })]
});
const laptopOnly = {
    x: 0,
    y: 0,
    scale: 2,
    transform: 0,
    primary: true,
    assignedMonitors: [{ connector: "eDP-1", vendor: "TST", product: "Test Panel", serial: "0x0001" }]
};

const join: DisplayRule[] = [{ mode: "join", pattern: {} }];
const invalidLayout =
    "Max attempts (2) reached for Applying monitor configuration, aborting: ApplyMonitorsConfig was rejected by the compositor (org.freedesktop.DBus.Error.InvalidArgs): Invalid logical monitor";

function transport(message: string): DisplayError {
    return new DisplayError({ kind: "transport", operation: "GetCurrentState", cause: new Error(message) });
}

describe("DisplaySwitcher", () => {
    const sleep = vi.fn(async (): Promise<void> => {});
    let options: DisplaySwitcherOptions;

    beforeEach(() => {
        setConsoleLevel(LogLevel.Silent);
        sleep.mockClear();
        options = { dryRun: false, method: ApplyMethod.Temporary, attempts: 2, retryDelayMs: 0, sleep };
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe("applyRules", () => {
        it("applies the synthesized layout and verifies it", async () => {
            const fake = new FakeDisplayConfig(makeState([laptop, external], [laptopOnly]));
            const switcher = new DisplaySwitcher(fake, options);

            await expect(switcher.applyRules(join)).resolves.toBe("applied");
            expect(fake.applied).toHaveLength(1);
            expect(fake.applied[0]?.serial).toBe(1);
            expect(fake.applied[0]?.method).toBe(ApplyMethod.Temporary);
            expect(fake.applied[0]?.layout.map((logical: { x: number }) => logical.x)).toEqual([0, 1280]);
            expect(fake.getCount).toBe(2);
        });

        it("skips the call when the layout is already active", async () => {
            const fake = new FakeDisplayConfig(makeState([laptop, external], [laptopOnly]));
            const switcher = new DisplaySwitcher(fake, options);

            await switcher.applyRules(join);
            await expect(switcher.applyRules(join)).resolves.toBe("unchanged");
            expect(fake.applied).toHaveLength(1);
        });

        it("prints the plan without applying in dry-run mode", async () => {
            setConsoleLevel(LogLevel.Log);
            const output = vi.spyOn(console, "log").mockImplementation((): void => {});
            const fake = new FakeDisplayConfig(makeState([laptop, external], [laptopOnly]));
            const switcher = new DisplaySwitcher(fake, { ...options, dryRun: true });

            await expect(switcher.applyRules([{ mode: "external", pattern: {} }])).resolves.toBe("dry-run");
            expect(fake.applied).toHaveLength(0);
            expect(output.mock.calls.map((call: unknown[]) => call[0])).toEqual([
                "[DRY RUN] Would switch to external monitor only",
                "[DRY RUN] Would apply the following configuration:",
                "  1. Position: (0, 0)",
                "     Scale: 1",
                "     Primary: true",
                "     Transform: 0",
                "     Assigned Monitors:",
                "       - DP-1 (Dell Inc. 27\") 1920x1080 @ 60.00Hz",
                "[DRY RUN] No changes were made"
            ]);
        });

        it("retries a cycle whose result does not verify", async () => {
            const fake = new FakeDisplayConfig(makeState([laptop, external], [laptopOnly]));
            fake.honorApply = false;
            const switcher = new DisplaySwitcher(fake, options);

            await expect(switcher.applyRules(join)).rejects.toThrow(
                "Max attempts (2) reached for Applying monitor configuration, aborting: Monitor configuration was applied but failed verification"
            );
            expect(fake.applied).toHaveLength(2);
            expect(sleep).toHaveBeenCalledTimes(1);
        });

        it("retries transport failures with a fresh snapshot", async () => {
            const fake = new FakeDisplayConfig(makeState([laptop, external], [laptopOnly]));
            fake.getFailures.push(transport("timeout"));
            const switcher = new DisplaySwitcher(fake, options);

            await expect(switcher.applyRules(join)).resolves.toBe("applied");
            expect(fake.getCount).toBe(3);
            expect(sleep).toHaveBeenCalledTimes(1);
        });

        it("retries a stale serial with a fresh snapshot", async () => {
            const fake = new FakeDisplayConfig(makeState([laptop, external], [laptopOnly], 5));
            const switcher = new DisplaySwitcher(fake, options);

            await expect(switcher.applyRules(join, makeState([laptop, external], [laptopOnly], 4))).resolves.toBe(
                "applied"
            );
            expect(fake.applied.map((call: AppliedCall) => call.serial)).toEqual([4, 5]);
            expect(sleep).toHaveBeenCalledTimes(1);
        });

        it("does not retry resolution failures", async () => {
            const fake = new FakeDisplayConfig(makeState([laptop], [laptopOnly]));
            const switcher = new DisplaySwitcher(fake, options);

            await expect(switcher.applyRules([{ mode: "external", pattern: {} }])).rejects.toThrow(
                "No monitors available for display mode: external"
            );
            expect(fake.getCount).toBe(1);
            expect(fake.applied).toHaveLength(0);
        });
    });

    describe("watch", () => {
        it("applies at start and resolves when stopped", async () => {
            const fake = new FakeDisplayConfig(makeState([laptop, external], [laptopOnly]));
            const switcher = new DisplaySwitcher(fake, options);

            const watching = switcher.watch(join);
            await vi.waitFor(() => expect(fake.applied).toHaveLength(1));
            expect(switcher.isWatching).toBe(true);

            switcher.stop();
            await expect(watching).resolves.toBeUndefined();
            expect(switcher.isWatching).toBe(false);
            expect(fake.listenerCount).toBe(0);
        });

        it("re-applies when a monitor is plugged in and ignores its own changes", async () => {
            const rules: DisplayRule[] = [
                { mode: "join", pattern: {} },
                { mode: "internal", pattern: {} }
            ];
            const fake = new FakeDisplayConfig(makeState([laptop], [laptopOnly]));
            const switcher = new DisplaySwitcher(fake, options);

            const watching = switcher.watch(rules);
            fake.plug([laptop, external]);

            await vi.waitFor(() => expect(fake.applied).toHaveLength(1));
            expect(fake.applied[0]?.serial).toBe(2);
            expect(fake.applied[0]?.layout).toHaveLength(2);
            await vi.waitFor(() => expect(fake.getCount).toBe(3));

            fake.emit({ type: "monitorsChanged" });
            await vi.waitFor(() => expect(fake.getCount).toBe(4));
            expect(fake.applied).toHaveLength(1);

            switcher.stop();
            await watching;
        });

        it("keeps watching after a rule set matches nothing", async () => {
            const rules: DisplayRule[] = [
                { mode: "mirror", pattern: {} },
                { mode: "internal", pattern: {} }
            ];
            const fake = new FakeDisplayConfig(makeState([external], []));
            const switcher = new DisplaySwitcher(fake, options);

            const watching = switcher.watch(rules);
            await vi.waitFor(() => expect(fake.getCount).toBe(1));
            expect(fake.applied).toHaveLength(0);

            fake.plug([laptop, external]);
            await vi.waitFor(() => expect(fake.applied).toHaveLength(1));
            expect(fake.applied[0]?.layout).toHaveLength(1);
            expect(fake.applied[0]?.layout[0]?.assignedMonitors).toHaveLength(2);

            switcher.stop();
            await watching;
        });

        it("rejects when the bus disconnects", async () => {
            const fake = new FakeDisplayConfig(makeState([laptop, external], [laptopOnly]));
            const switcher = new DisplaySwitcher(fake, options);

            const watching = switcher.watch(join);
            await vi.waitFor(() => expect(fake.applied).toHaveLength(1));
            fake.emit({ type: "disconnected", error: new Error("bus closed") });

            await expect(watching).rejects.toThrow("D-Bus watching MonitorsChanged failed: bus closed");
            expect(fake.listenerCount).toBe(0);
        });

        it("rejects when a cycle loses the connection", async () => {
            const fake = new FakeDisplayConfig(makeState([laptop, external], [laptopOnly]));
            const failure = transport("no reply");
            fake.getFailures.push(failure);
            const switcher = new DisplaySwitcher(fake, options);

            await expect(switcher.watch(join)).rejects.toBe(failure);
            expect(fake.applied).toHaveLength(0);
        });

        it("keeps watching when the compositor rejects the layout", async () => {
            setConsoleLevel(LogLevel.Error);
            const errors = vi.spyOn(console, "error").mockImplementation((): void => {});
            const fake = new FakeDisplayConfig(makeState([laptop, external], [laptopOnly]));
            fake.applyRejection = new DisplayError({
                kind: "rejected",
                operation: "ApplyMonitorsConfig",
                name: "org.freedesktop.DBus.Error.InvalidArgs",
                cause: new Error("Invalid logical monitor")
            });
            const switcher = new DisplaySwitcher(fake, options);

            const watching = switcher.watch(join);
            await vi.waitFor(() => expect(errors).toHaveBeenCalledWith(`Initial configuration failed: ${invalidLayout}`));
            expect(fake.applied).toHaveLength(2);
            expect(switcher.isWatching).toBe(true);

            fake.plug([laptop, external, projector]);
            await vi.waitFor(() =>
                expect(errors).toHaveBeenCalledWith(`Failed to apply display configuration: ${invalidLayout}`)
            );
            expect(fake.applied).toHaveLength(4);
            expect(switcher.isWatching).toBe(true);
            expect(fake.listenerCount).toBe(1);

            switcher.stop();
            await expect(watching).resolves.toBeUndefined();
        });

        it("refuses to watch twice", async () => {
            const fake = new FakeDisplayConfig(makeState([laptop, external], [laptopOnly]));
            const switcher = new DisplaySwitcher(fake, options);

            const watching = switcher.watch(join);
            await expect(switcher.watch(join)).rejects.toThrow("Already watching");
            switcher.stop();
            await watching;
        });
    });
});
