import { DisplaySwitcher } from "./DisplaySwitcher";
import { busConfigFor } from "./busConfigFor";
import { connectDisplayConfig } from "./connectDisplayConfig";
import { debug } from "./debug";
import { describeRule } from "./describeRule";
import { error } from "./error";
import { formatPatternTest } from "./formatPatternTest";
import { formatStatus } from "./formatStatus";
import { isConnectionBreaking } from "./isConnectionBreaking";
import { log } from "./log";
import { rulesForCommand } from "./rulesForCommand";
import { selectEnvironment } from "./selectEnvironment";
import { sleep } from "./sleep";
import { verbose } from "./verbose";
import type { BusConfig } from "./BusConfig";
import type { Config } from "./Config";
import type { DisplayCommand, RuleCommand } from "./DisplayCommand";
import type { DisplayConfigService } from "./DisplayConfigService";
import type { DisplayRule } from "./DisplayRule";

function logLines(lines: readonly string[]): void {
    for (const line of lines) {
        log(line);
    }
}

function messageOf(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

function createSwitcher(config: Config, service: DisplayConfigService): DisplaySwitcher {
    return new DisplaySwitcher(service, {
        dryRun: config.dryRun,
        method: config.applyMethod,
        attempts: config.applyAttempts,
        retryDelayMs: config.retryDelayMs
    });
}

async function inspect(config: Config, busConfig: BusConfig, command: DisplayCommand): Promise<void> {
    const service = await connectDisplayConfig(busConfig, config.connectAttempts, config.retryDelayMs);
    try {
        const state = await service.getCurrentState();
        if (command.kind === "status") {
            logLines(formatStatus(state, command.modes));
        } else if (command.kind === "test") {
            logLines(formatPatternTest(command.pattern, state.monitors));
        }
    } finally {
        service.close();
    }
}

async function applyOnce(config: Config, busConfig: BusConfig, rules: readonly DisplayRule[]): Promise<number> {
    const service = await connectDisplayConfig(busConfig, config.connectAttempts, config.retryDelayMs);
    try {
        await createSwitcher(config, service).applyRules(rules);
        return 0;
    } catch (err: unknown) {
        if (config.dryRun) {
            log(`[DRY RUN] Would exit with error: ${messageOf(err)}`);
            return 0;
        }
        error(`Error: ${messageOf(err)}`);
        return 1;
    } finally {
        service.close();
    }
}

async function watch(config: Config, busConfig: BusConfig, rules: readonly DisplayRule[]): Promise<number> {
    let stopping = false;
    let switcher: DisplaySwitcher | undefined;

    const shutdown = (): void => {
        log("\nShutting down...");
        stopping = true;
        switcher?.stop();
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);

    try {
        while (!stopping) {
            const service = await connectDisplayConfig(busConfig, config.connectAttempts, config.retryDelayMs);
            try {
                if (stopping) {
                    break;
                }
                switcher = createSwitcher(config, service);
                await switcher.watch(rules);
            } catch (err: unknown) {
                if (!isConnectionBreaking(err)) {
                    throw err;
                }
                error(`Lost connection to ${busConfig.service}: ${messageOf(err)}`);
                if (!stopping) {
                    log(`Reconnecting in ${config.retryDelayMs}ms...`);
                    await sleep(config.retryDelayMs);
                }
            } finally {
                switcher = undefined;
                service.close();
            }
        }
        return 0;
    } finally {
        process.off("SIGINT", shutdown);
        process.off("SIGTERM", shutdown);
    }
}

async function runRules(config: Config, busConfig: BusConfig, command: RuleCommand): Promise<number> {
    const rules = rulesForCommand(command);
    if (command.kind === "auto" && command.name !== null) {
        log(`Using rule set: ${command.name}`);
    }
    for (const rule of rules) {
        verbose(`Rule: ${describeRule(rule)}`);
    }

    if (config.dryRun) {
        log("=== Test Mode Enabled (Dry Run) ===");
        log("Changes will be previewed but not applied\n");
    }

    return config.watch ? watch(config, busConfig, rules) : applyOnce(config, busConfig, rules);
}

export async function main(
    config: Config,
    command: DisplayCommand,
    env: Readonly<Record<string, string | undefined>> = process.env
): Promise<number> {
    const busConfig = busConfigFor(selectEnvironment(config.desktop, env));
    debug(`Using ${busConfig.service} at ${busConfig.path}`);

    switch (command.kind) {
        case "status":
        case "test":
            await inspect(config, busConfig, command);
            return 0;
        case "mode":
        case "auto":
            return runRules(config, busConfig, command);
    }
}
