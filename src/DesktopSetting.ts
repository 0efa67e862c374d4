export type DesktopSetting = "auto" | "gnome" | "cinnamon";

export const desktopSettings: readonly DesktopSetting[] = ["auto", "gnome", "cinnamon"];
