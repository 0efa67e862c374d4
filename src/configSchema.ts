import { desktopSettings } from "./DesktopSetting";
import { format } from "util";
import convict from "convict";
import type { ConfigType } from "./ConfigType";

convict.addFormat({
    name: "nullable-string",
    validate: (val: unknown): void => {
        if (val === null) {
            return;
        }
        if (typeof val !== "string") {
            throw new Error("must be null or a string");
        }
    },
    coerce: (val: unknown): unknown => {
        if (val === null) {
            return null;
        }
        if (typeof val === "string") {
            return val;
        }
        return format(val);
    }
});

convict.addFormat({
    name: "positive-int",
    validate: (val: unknown): void => {
        if (typeof val !== "number" || val < 1 || !Number.isInteger(val)) {
            throw new Error("must be a positive integer");
        }
    },
    coerce: (val: unknown): number => Number(val)
});

export function createConfigSchema(env: NodeJS.ProcessEnv): convict.Config<ConfigType> {
    return convict<ConfigType>(
        {
            logging: {
                level: {
                    doc: "Console log level",
                    format: ["silent", "error", "log", "debug", "verbose"],
                    default: "log",
                    env: "MONITOR_MODE_LOG_LEVEL"
                },
                file: {
                    doc: "Append every log line to this file",
                    format: "nullable-string",
                    default: null,
                    env: "MONITOR_MODE_LOG_FILE"
                }
            },

            desktop: {
                environment: {
                    doc: "Desktop whose DisplayConfig service to talk to; auto reads XDG_SESSION_DESKTOP",
                    format: [...desktopSettings],
                    default: "auto",
                    env: "MONITOR_MODE_DESKTOP"
                }
            },

            bus: {
                connectAttempts: {
                    doc: "Session bus connection attempts before giving up",
                    format: "positive-int",
                    default: 5,
                    env: "MONITOR_MODE_CONNECT_ATTEMPTS"
                },
                retryDelayMs: {
                    doc: "Delay between connection attempts and before reconnecting a watch",
                    format: "nat",
                    default: 1000,
                    env: "MONITOR_MODE_RETRY_DELAY_MS"
                }
            },

            apply: {
                attempts: {
                    doc: "Resolve, apply and verify cycles before a layout change is reported as failed",
                    format: "positive-int",
                    default: 3,
                    env: "MONITOR_MODE_APPLY_ATTEMPTS"
                },
                persistent: {
                    doc: "Store applied layouts in monitors.xml instead of applying them temporarily",
                    format: Boolean,
                    default: false,
                    env: "MONITOR_MODE_PERSISTENT"
                }
            },

            run: {
                watch: {
                    doc: "Keep running and re-apply the rules when monitors change",
                    format: Boolean,
                    default: false
                },
                dryRun: {
                    doc: "Print what would be applied without changing anything",
                    format: Boolean,
                    default: false
                }
            }
        },
        { env, args: [] }
    );
}
