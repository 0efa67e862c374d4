import { ApplyMethod } from "./ApplyMethod";
import { createConfigSchema } from "./configSchema";
import { debug } from "./debug";
import { desktopSettings } from "./DesktopSetting";
import { error } from "./error";
import type { CommandLine } from "./CommandLine";
import type { ConfigType } from "./ConfigType";
import type { DesktopSetting } from "./DesktopSetting";
import type { LogLevelName } from "./LogLevelName";
import type convict from "convict";

const logLevelNames: readonly LogLevelName[] = ["silent", "error", "log", "debug", "verbose"];

export class Config {
    #convictConfig: convict.Config<ConfigType>;

    constructor(commandLine: CommandLine, env: NodeJS.ProcessEnv = process.env) {
        this.#convictConfig = createConfigSchema(env);
        this.#loadCommandLine(commandLine);
        this.#validate();
    }

    // Logging configuration
    get logLevel(): LogLevelName {
        return this.#oneOf("logging.level", logLevelNames);
    }

    get logFile(): string | null {
        return this.#string("logging.file");
    }

    // Desktop and bus configuration
    get desktop(): DesktopSetting {
        return this.#oneOf("desktop.environment", desktopSettings);
    }

    get connectAttempts(): number {
        return this.#integer("bus.connectAttempts");
    }

    get retryDelayMs(): number {
        return this.#integer("bus.retryDelayMs");
    }

    // Apply configuration
    get applyAttempts(): number {
        return this.#integer("apply.attempts");
    }

    get persistent(): boolean {
        return this.#boolean("apply.persistent");
    }

    get applyMethod(): ApplyMethod {
        return this.persistent ? ApplyMethod.Persistent : ApplyMethod.Temporary;
    }

    // Run configuration
    get watch(): boolean {
        return this.#boolean("run.watch");
    }

    get dryRun(): boolean {
        return this.#boolean("run.dryRun");
    }

    getAll(): ConfigType {
        return this.#convictConfig.getProperties();
    }

    toJSON(): string {
        return JSON.stringify(this.getAll(), null, 2);
    }

    #get(key: convict.Path<ConfigType>): unknown {
        return this.#convictConfig.get(key);
    }

    #string(key: convict.Path<ConfigType>): string | null {
        const value = this.#get(key);
        if (value === null) {
            return null;
        }
        if (typeof value === "string") {
            return value;
        }
        throw new Error(`Config key '${key}' is not a string`);
    }

    #integer(key: convict.Path<ConfigType>): number {
        const value = this.#get(key);
        if (typeof value === "number" && Number.isInteger(value)) {
            return value;
        }
        throw new Error(`Config key '${key}' is not an integer`);
    }

    #boolean(key: convict.Path<ConfigType>): boolean {
        const value = this.#get(key);
        if (typeof value === "boolean") {
            return value;
        }
        throw new Error(`Config key '${key}' is not a boolean`);
    }

    #oneOf<T extends string>(key: convict.Path<ConfigType>, allowed: readonly T[]): T {
        const value = this.#get(key);
        const match = allowed.find((candidate: T) => candidate === value);
        if (match === undefined) {
            throw new Error(`Config key '${key}' must be one of: ${allowed.join(", ")}`);
        }
        return match;
    }

    #loadCommandLine(commandLine: CommandLine): void {
        if (commandLine.verbose === 1) {
            this.#convictConfig.set("logging.level", "debug");
            debug("CLI override: 1 verbose flag - log-level = debug");
        } else if (commandLine.verbose >= 2) {
            this.#convictConfig.set("logging.level", "verbose");
            debug(`CLI override: ${commandLine.verbose} verbose flags - log-level = verbose`);
        }

        // An explicit level beats -v; validation rejects unknown names
        if (commandLine.logLevel !== undefined) {
            this.#convictConfig.load({ logging: { level: commandLine.logLevel } });
            debug(`CLI override: log-level = ${commandLine.logLevel}`);
        }

        if (commandLine.logFile !== undefined) {
            this.#convictConfig.set("logging.file", commandLine.logFile);
            debug(`CLI override: log-file = ${commandLine.logFile}`);
        }

        if (commandLine.desktop !== undefined) {
            this.#convictConfig.load({ desktop: { environment: commandLine.desktop } });
            debug(`CLI override: desktop = ${commandLine.desktop}`);
        }

        if (commandLine.persistent) {
            this.#convictConfig.set("apply.persistent", true);
            debug("CLI override: persistent = true");
        }

        this.#convictConfig.set("run.watch", commandLine.watch);
        this.#convictConfig.set("run.dryRun", commandLine.test);
    }

    #validate(): void {
        try {
            this.#convictConfig.validate({ allowed: "strict" });
        } catch (err: unknown) {
            error("Config validation failed:", err instanceof Error ? err.message : err);
            throw err;
        }
    }
}
