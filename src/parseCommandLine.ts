import yargs from "yargs";
import type { CommandLine } from "./CommandLine";

function strings(values: readonly (string | number)[] | undefined): string[] {
    return (values ?? []).map((value: string | number) => String(value));
}

export function parseCommandLine(args: readonly string[]): CommandLine {
    const argv = yargs([...args])
        .option("help", { alias: "h", type: "boolean", default: false })
        .option("version", { type: "boolean", default: false })
        .option("watch", { alias: "w", type: "boolean", default: false })
        .option("test", { alias: "t", type: "boolean", default: false })
        .option("persistent", { alias: "P", type: "boolean", default: false })
        .option("verbose", { alias: "v", type: "count" })
        .option("log-level", { alias: "l", type: "string" })
        .option("log-file", { alias: "f", type: "string" })
        .option("desktop", { type: "string" })
        .option("modes", { alias: "m", type: "boolean", default: false })
        .option("connector", { type: "string" })
        .option("vendor", { type: "string" })
        .option("product", { type: "string" })
        .option("serial", { type: "string" })
        .option("name", { alias: "n", type: "string" })
        .option("external", { type: "array" })
        .option("internal", { type: "array" })
        .option("join", { type: "array" })
        .option("mirror", { type: "array" })
        .option("default", { type: "string" })
        .parserConfiguration({ "parse-numbers": false, "parse-positional-numbers": false })
        .help(false)
        .version(false)
        .parseSync();

    const [command, ...extraArguments] = strings(argv._);
    return {
        command,
        extraArguments,
        help: argv.help,
        version: argv.version,
        watch: argv.watch,
        test: argv.test,
        persistent: argv.persistent,
        verbose: argv.verbose,
        logLevel: argv["log-level"],
        logFile: argv["log-file"],
        desktop: argv.desktop,
        modes: argv.modes,
        connector: argv.connector,
        vendor: argv.vendor,
        product: argv.product,
        serial: argv.serial,
        name: argv.name,
        external: strings(argv.external),
        internal: strings(argv.internal),
        join: strings(argv.join),
        mirror: strings(argv.mirror),
        defaultMode: argv.default
    };
}
