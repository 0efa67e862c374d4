import { patternFromString } from "./patternFromString";
import type { DisplayMode } from "./DisplayMode";
import type { DisplayRule } from "./DisplayRule";
import type { RuleCommand } from "./DisplayCommand";

function rulesFor(mode: DisplayMode, patterns: readonly string[]): DisplayRule[] {
    return patterns.map((pattern: string) => ({ mode, pattern: patternFromString(pattern) }));
}

/**
 * Rule list for a command. Auto rules are ordered mirror, join, external, internal and end with
 * the default mode under an empty pattern.
 */
export function rulesForCommand(command: RuleCommand): DisplayRule[] {
    if (command.kind === "mode") {
        return [{ mode: command.mode, pattern: command.pattern }];
    }

    return [
        ...rulesFor("mirror", command.mirror),
        ...rulesFor("join", command.join),
        ...rulesFor("external", command.external),
        ...rulesFor("internal", command.internal),
        { mode: command.defaultMode, pattern: {} }
    ];
}
