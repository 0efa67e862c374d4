export type DesktopEnvironment = { kind: "gnome" } | { kind: "cinnamon" } | { kind: "unknown"; name: string };
