import type { DesktopSetting } from "./DesktopSetting";
import type { LogLevelName } from "./LogLevelName";

export interface ConfigType {
    logging: {
        level: LogLevelName;
        file: string | null;
    };
    desktop: {
        environment: DesktopSetting;
    };
    bus: {
        connectAttempts: number;
        retryDelayMs: number;
    };
    apply: {
        attempts: number;
        persistent: boolean;
    };
    run: {
        watch: boolean;
        dryRun: boolean;
    };
}
