import { CommandLineError } from "./CommandLineError";
import { DisplayModeSchema } from "./DisplayModeSchema";
import { isEmptyPattern } from "./isEmptyPattern";
import type { CommandLine } from "./CommandLine";
import type { DisplayCommand } from "./DisplayCommand";
import type { DisplayMode } from "./DisplayMode";
import type { MonitorPattern } from "./MonitorPattern";

function patternOf(commandLine: CommandLine): MonitorPattern {
    const pattern: MonitorPattern = {};
    if (commandLine.connector !== undefined) {
        pattern.connector = commandLine.connector;
    }
    if (commandLine.vendor !== undefined) {
        pattern.vendor = commandLine.vendor;
    }
    if (commandLine.product !== undefined) {
        pattern.product = commandLine.product;
    }
    if (commandLine.serial !== undefined) {
        pattern.serial = commandLine.serial;
    }
    if (commandLine.name !== undefined) {
        pattern.name = commandLine.name;
    }
    return pattern;
}

function defaultModeOf(value: string | undefined): DisplayMode {
    if (value === undefined) {
        return "external";
    }
    const parsed = DisplayModeSchema.safeParse(value);
    if (!parsed.success) {
        throw new CommandLineError(
            `Invalid value '${value}' for --default, expected one of: ${DisplayModeSchema.options.join(", ")}`
        );
    }
    return parsed.data;
}

export function parseDisplayCommand(commandLine: CommandLine): DisplayCommand {
    const { command } = commandLine;
    if (command === undefined) {
        throw new CommandLineError("No command given");
    }
    if (commandLine.extraArguments.length > 0) {
        throw new CommandLineError(`Unexpected argument '${commandLine.extraArguments.join(" ")}'`);
    }

    switch (command) {
        case "status":
            return { kind: "status", modes: commandLine.modes };

        case "test": {
            const pattern = patternOf(commandLine);
            if (isEmptyPattern(pattern)) {
                throw new CommandLineError(
                    "The test command needs at least one of --connector, --vendor, --product, --serial or --name"
                );
            }
            return { kind: "test", pattern };
        }

        case "auto":
        case "rules":
            return {
                kind: "auto",
                name: commandLine.name ?? null,
                external: commandLine.external,
                internal: commandLine.internal,
                join: commandLine.join,
                mirror: commandLine.mirror,
                defaultMode: defaultModeOf(commandLine.defaultMode)
            };
    }

    const mode = DisplayModeSchema.safeParse(command);
    if (!mode.success) {
        throw new CommandLineError(`Unknown command '${command}'`);
    }
    return { kind: "mode", mode: mode.data, pattern: patternOf(commandLine) };
}
