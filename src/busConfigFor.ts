import { DisplayError } from "./DisplayError";
import type { BusConfig } from "./BusConfig";
import type { DesktopEnvironment } from "./DesktopEnvironment";

export function busConfigFor(environment: DesktopEnvironment): BusConfig {
    switch (environment.kind) {
        case "gnome":
            return {
                service: "org.gnome.Mutter.DisplayConfig",
                path: "/org/gnome/Mutter/DisplayConfig",
                interface: "org.gnome.Mutter.DisplayConfig"
            };
        case "cinnamon":
            return {
                service: "org.cinnamon.Muffin.DisplayConfig",
                path: "/org/cinnamon/Muffin/DisplayConfig",
                interface: "org.cinnamon.Muffin.DisplayConfig"
            };
        case "unknown":
            throw new DisplayError({ kind: "unsupported-desktop", desktop: environment.name });
    }
}
