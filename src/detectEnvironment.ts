import type { DesktopEnvironment } from "./DesktopEnvironment";

export function detectEnvironment(env: Readonly<Record<string, string | undefined>>): DesktopEnvironment {
    // XDG_CURRENT_DESKTOP may be a list such as "ubuntu:GNOME"
    const desktop = (env.XDG_SESSION_DESKTOP || env.XDG_CURRENT_DESKTOP || "").toLowerCase();

    if (desktop.includes("cinnamon")) {
        return { kind: "cinnamon" };
    }
    if (desktop.includes("gnome")) {
        return { kind: "gnome" };
    }
    return { kind: "unknown", name: desktop };
}
