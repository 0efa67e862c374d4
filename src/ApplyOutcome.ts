export type ApplyOutcome = "applied" | "unchanged" | "dry-run";
