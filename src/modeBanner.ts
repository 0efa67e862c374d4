import type { DisplayMode } from "./DisplayMode";

export function modeBanner(mode: DisplayMode, dryRun: boolean): string {
    switch (mode) {
        case "internal":
            return dryRun ? "[DRY RUN] Would switch to internal monitor only" : "Switching to internal monitor...";
        case "external":
            return dryRun ? "[DRY RUN] Would switch to external monitor only" : "Switching to external monitor...";
        case "join":
            return dryRun ? "[DRY RUN] Would join internal and external monitors" : "Joining internal and external monitors...";
        case "mirror":
            return dryRun
                ? "[DRY RUN] Would mirror internal and external monitors"
                : "Mirroring internal and external monitors...";
    }
}
