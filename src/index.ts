#!/usr/bin/env node

import { CommandLineError } from "./CommandLineError";
import { Config } from "./Config";
import { closeLogger } from "./closeLogger";
import { debug } from "./debug";
import { error } from "./error";
import { logLevelFromName } from "./logLevelFromName";
import { main } from "./main";
import { parseCommandLine } from "./parseCommandLine";
import { parseDisplayCommand } from "./parseDisplayCommand";
import { setConsoleLevel } from "./consoleLevel";
import { setLogFile } from "./logFile";
import { usage } from "./usage";
import type { CommandLine } from "./CommandLine";
import type { DisplayCommand } from "./DisplayCommand";

let commandLine: CommandLine;
let command: DisplayCommand;
try {
    commandLine = parseCommandLine(process.argv.slice(2));
    if (commandLine.help) {
        console.log(usage);
        process.exit(0);
    }
    if (commandLine.version) {
        console.log("monitor-mode version 0.1.0");
        process.exit(0);
    }
    command = parseDisplayCommand(commandLine);
} catch (err: unknown) {
    if (err instanceof CommandLineError) {
        console.error(`Error: ${err.message}\n`);
        console.error(usage);
        process.exit(2);
    }
    throw err;
}

let config: Config;
try {
    config = new Config(commandLine);
} catch (err: unknown) {
    console.error("Failed to load configuration:", err instanceof Error ? err.message : err);
    process.exit(1);
}

setConsoleLevel(logLevelFromName(config.logLevel));
const logFile = config.logFile;
if (logFile) {
    setLogFile(logFile);
}
debug("Configuration:", config.toJSON());

(async (): Promise<void> => {
    let code: number;
    try {
        code = await main(config, command);
    } catch (err: unknown) {
        error("Error:", err instanceof Error ? err.message : err);
        code = 1;
    }
    await closeLogger();
    process.exit(code);
})();
