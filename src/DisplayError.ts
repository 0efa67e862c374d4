import { describePatternInline } from "./describePatternInline";
import { describeRule } from "./describeRule";
import type { DisplayErrorDetail, DisplayErrorKind } from "./DisplayErrorDetail";

function causeMessage(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause);
}

function messageFor(detail: DisplayErrorDetail): string {
    switch (detail.kind) {
        case "invalid-pattern":
            return `Invalid pattern: ${detail.pattern}`;
        case "max-attempts":
            return `Max attempts (${detail.attempts}) reached for ${detail.label}, aborting: ${causeMessage(detail.lastError)}`;
        case "no-monitors-available":
            return `No monitors available for display mode: ${detail.mode}`;
        case "filter-mismatch":
            return `No monitors match the specified filter criteria (${describePatternInline(detail.pattern)}) for display mode: ${detail.mode}`;
        case "insufficient-monitors":
            return `Insufficient monitors (${detail.available} of ${detail.required} monitor types available) for display mode: ${detail.mode}; both internal and external monitors are required`;
        case "no-common-resolutions":
            return "No common resolutions are available among the monitors for mirroring. Try using 'join' mode instead, or configure only certain monitors.";
        case "no-monitors-match":
            return `No matching monitor configuration found for the specified rules: ${detail.rules.map(describeRule).join(", ")}`;
        case "no-valid-configuration":
            return "No valid monitor configuration could be created: none of the monitors report any modes";
        case "failed-verification":
            return "Monitor configuration was applied but failed verification";
        case "unsupported-desktop":
            return `Unsupported desktop: ${detail.desktop || "(unset)"}`;
        case "rejected":
            return `${detail.operation} was rejected by the compositor (${detail.name}): ${causeMessage(detail.cause)}`;
        case "transport":
            return `D-Bus ${detail.operation} failed: ${causeMessage(detail.cause)}`;
    }
}

export class DisplayError extends Error {
    readonly detail: DisplayErrorDetail;

    constructor(detail: DisplayErrorDetail) {
        const cause = detail.kind === "max-attempts" ? detail.lastError : "cause" in detail ? detail.cause : undefined;
        super(messageFor(detail), cause === undefined ? undefined : { cause });
        this.name = "DisplayError";
        this.detail = detail;
    }

    get kind(): DisplayErrorKind {
        return this.detail.kind;
    }
}
