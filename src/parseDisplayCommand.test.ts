import { CommandLineError } from "./CommandLineError";
import { describe, expect, it } from "vitest";
import { parseCommandLine } from "./parseCommandLine";
import { parseDisplayCommand } from "./parseDisplayCommand";
import { rulesForCommand } from "./rulesForCommand";
import type { DisplayCommand } from "./DisplayCommand";

function parse(...args: string[]): DisplayCommand {
    return parseDisplayCommand(parseCommandLine(args));
}

describe("parseCommandLine", () => {
    it("collects global flags wherever they appear", () => {
        const commandLine = parseCommandLine(["-w", "join", "-t", "-vv", "--desktop", "cinnamon"]);
        expect(commandLine.command).toBe("join");
        expect(commandLine.watch).toBe(true);
        expect(commandLine.test).toBe(true);
        expect(commandLine.verbose).toBe(2);
        expect(commandLine.desktop).toBe("cinnamon");
        expect(commandLine.persistent).toBe(false);
    });

    it("keeps serial numbers as strings", () => {
        expect(parseCommandLine(["external", "--serial", "0x714"]).serial).toBe("0x714");
    });
});

describe("parseDisplayCommand", () => {
    it("parses status with and without modes", () => {
        expect(parse("status")).toEqual({ kind: "status", modes: false });
        expect(parse("status", "-m")).toEqual({ kind: "status", modes: true });
    });

    it("parses mode commands with their pattern", () => {
        expect(parse("external", "--vendor", "DEL", "--product", "U2720Q")).toEqual({
            kind: "mode",
            mode: "external",
            pattern: { vendor: "DEL", product: "U2720Q" }
        });
        expect(parse("mirror")).toEqual({ kind: "mode", mode: "mirror", pattern: {} });
    });

    it("requires a pattern for test", () => {
        expect(() => parse("test")).toThrow(CommandLineError);
        expect(parse("test", "--connector", "HDMI-1")).toEqual({ kind: "test", pattern: { connector: "HDMI-1" } });
    });

    it("parses auto and its rules alias", () => {
        const expected = {
            kind: "auto",
            name: "desk",
            external: ["connector=DP-1"],
            internal: [],
            join: ["vendor=DEL", "Dell"],
            mirror: [],
            defaultMode: "internal"
        };
        const args = ["--name", "desk", "--external", "connector=DP-1", "--join", "vendor=DEL", "--join", "Dell"];
        expect(parse("auto", ...args, "--default", "internal")).toEqual(expected);
        expect(parse("rules", ...args, "--default", "internal")).toEqual(expected);
    });

    it("defaults auto to external and no name", () => {
        expect(parse("auto")).toMatchObject({ name: null, defaultMode: "external" });
    });

    it("rejects an unknown default mode", () => {
        expect(() => parse("auto", "--default", "sideways")).toThrow(
            "Invalid value 'sideways' for --default, expected one of: external, internal, join, mirror"
        );
    });

    it("rejects unknown and missing commands", () => {
        expect(() => parse("sideways")).toThrow("Unknown command 'sideways'");
        expect(() => parse()).toThrow("No command given");
        expect(() => parse("join", "extra")).toThrow("Unexpected argument 'extra'");
    });
});

describe("rulesForCommand", () => {
    it("turns a mode command into one rule", () => {
        expect(rulesForCommand({ kind: "mode", mode: "join", pattern: { connector: "DP-1" } })).toEqual([
            { mode: "join", pattern: { connector: "DP-1" } }
        ]);
    });

    it("orders auto rules mirror, join, external, internal, default", () => {
        const rules = rulesForCommand({
            kind: "auto",
            name: null,
            external: ["connector=DP-1"],
            internal: ["Built-in"],
            join: ["vendor=DEL"],
            mirror: ["product=Projector", "serial=0x1"],
            defaultMode: "external"
        });
        expect(rules).toEqual([
            { mode: "mirror", pattern: { product: "Projector" } },
            { mode: "mirror", pattern: { serial: "0x1" } },
            { mode: "join", pattern: { vendor: "DEL" } },
            { mode: "external", pattern: { connector: "DP-1" } },
            { mode: "internal", pattern: { name: "Built-in" } },
            { mode: "external", pattern: {} }
        ]);
    });
});
