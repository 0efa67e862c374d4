export type DisplayConfigEvent = { type: "monitorsChanged" } | { type: "disconnected"; error: Error };
