import { describe, expect, it } from "vitest";
import { makeMode } from "./test/makeMode";
import { makeMonitor } from "./test/makeMonitor";
import { synthesizeLayout } from "./synthesizeLayout";

const laptop = makeMonitor("eDP-1", { isBuiltin: true, modes: [makeMode(1920, 1080, 60)] });
const external = makeMonitor("DP-1", { modes: [makeMode(1920, 1080, 60)] });

describe("synthesizeLayout", () => {
    it("builds one logical monitor per physical monitor for join, internal and external", () => {
        expect(synthesizeLayout("join", [laptop, external])).toHaveLength(2);
        expect(synthesizeLayout("internal", [laptop])).toHaveLength(1);
        expect(synthesizeLayout("external", [external])).toHaveLength(1);
    });

    it("builds a single shared logical monitor for mirror", () => {
        const layout = synthesizeLayout("mirror", [laptop, external]);
        expect(layout).toHaveLength(1);
        expect(layout[0]?.assignedMonitors.map((assignment: { connector: string }) => assignment.connector)).toEqual([
            "eDP-1",
            "DP-1"
        ]);
    });
});
