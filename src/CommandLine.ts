/** Every option the tool accepts, parsed once so global flags never swallow the command word. */
export interface CommandLine {
    command: string | undefined;
    extraArguments: string[];

    help: boolean;
    version: boolean;
    watch: boolean;
    test: boolean;
    persistent: boolean;
    verbose: number;
    logLevel: string | undefined;
    logFile: string | undefined;
    desktop: string | undefined;

    modes: boolean;
    connector: string | undefined;
    vendor: string | undefined;
    product: string | undefined;
    serial: string | undefined;
    name: string | undefined;
    external: string[];
    internal: string[];
    join: string[];
    mirror: string[];
    defaultMode: string | undefined;
}
