import { detectEnvironment } from "./detectEnvironment";
import type { DesktopEnvironment } from "./DesktopEnvironment";
import type { DesktopSetting } from "./DesktopSetting";

export function selectEnvironment(
    setting: DesktopSetting,
    env: Readonly<Record<string, string | undefined>>
): DesktopEnvironment {
    return setting === "auto" ? detectEnvironment(env) : { kind: setting };
}
