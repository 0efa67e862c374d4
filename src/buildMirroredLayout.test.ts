import { DisplayError } from "./DisplayError";
import { buildMirroredLayout } from "./buildMirroredLayout";
import { describe, expect, it } from "vitest";
import { makeMode } from "./test/makeMode";
import { makeMonitor } from "./test/makeMonitor";

const laptop = makeMonitor("eDP-1", {
    isBuiltin: true,
    modes: [
        makeMode(2880, 1800, 60, { isPreferred: true, preferredScale: 2 }),
        makeMode(1920, 1080, 60),
        makeMode(1920, 1080, 48)
    ]
});
const dell = makeMonitor("DP-1", {
    modes: [makeMode(3840, 2160, 60, { isPreferred: true }), makeMode(1920, 1080, 59.94), makeMode(1920, 1080, 60)]
});

describe("buildMirroredLayout", () => {
    it("mirrors at the highest common resolution with the fastest mode per monitor", () => {
        expect(buildMirroredLayout([laptop, dell])).toEqual([
            {
                x: 0,
                y: 0,
                scale: 1,
                transform: 0,
                primary: true,
                assignedMonitors: [
                    { connector: "eDP-1", modeId: "1920x1080@60.000", properties: {} },
                    { connector: "DP-1", modeId: "1920x1080@60.000", properties: {} }
                ]
            }
        ]);
    });

    it("keeps the first mode when refresh rates tie", () => {
        const twin = makeMonitor("HDMI-1", {
            modes: [makeMode(1920, 1080, 60, { id: "first" }), makeMode(1920, 1080, 60, { id: "second" })]
        });
        const [logical] = buildMirroredLayout([laptop, twin]);
        expect(logical?.assignedMonitors[1]?.modeId).toBe("first");
    });

    it("takes the scale from the reference monitor's mode but never below 1", () => {
        const hidpi = makeMonitor("DP-2", { modes: [makeMode(1920, 1080, 60, { preferredScale: 2 })] });
        expect(buildMirroredLayout([laptop, hidpi])[0]?.scale).toBe(2);

        const lowScale = makeMonitor("DP-3", { modes: [makeMode(1920, 1080, 60, { preferredScale: 0.5 })] });
        expect(buildMirroredLayout([laptop, lowScale])[0]?.scale).toBe(1);
    });

    it("uses the first monitor as reference when none is external", () => {
        const layout = buildMirroredLayout([laptop]);
        expect(layout[0]?.assignedMonitors).toEqual([
            { connector: "eDP-1", modeId: "2880x1800@60.000", properties: {} }
        ]);
        expect(layout[0]?.scale).toBe(2);
    });

    it("fails when the monitors share no resolution", () => {
        const old = makeMonitor("eDP-1", { isBuiltin: true, modes: [makeMode(1366, 768, 60)] });
        const wide = makeMonitor("DP-1", { modes: [makeMode(2560, 1080, 60)] });
        expect(() => buildMirroredLayout([old, wide])).toThrow(DisplayError);
        expect(() => buildMirroredLayout([old, wide])).toThrow(/Try using 'join' mode instead/);
    });

    it("fails without monitors", () => {
        expect(() => buildMirroredLayout([])).toThrow("No monitors available for display mode: mirror");
    });
});
